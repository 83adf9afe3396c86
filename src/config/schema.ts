import { z } from 'zod'
import { parseInterval } from '../shared/formatTime.js'

const TIME_OF_DAY = /^([01]?\d|2[0-3]):[0-5]\d$/
const INTERVAL = /^\d+[smhd]$/
// setTimeout 的上限 (2^31-1 ms)，超出会立即触发
const MAX_TIMER_MS = 2_147_483_647

export const checkersConfigSchema = z.object({
  /** 导出 registerCheckers(registry) 的模块，相对 cwd */
  module: z.string().default('./checkers.js'),
  /** 全局开关：为 true 时 dispatch 不做任何事 */
  killSwitch: z.boolean().default(false),
  /** 不参与调度的 checker 名 */
  disabled: z.array(z.string()).default([]),
})

export const scheduleConfigSchema = z.object({
  /** DAILY cadence 的触发时间 (HH:mm) */
  dailyAt: z.string().regex(TIME_OF_DAY, 'expected HH:mm').default('09:30'),
  /** 单次 checker 运行的墙钟超时 */
  runTimeout: z
    .string()
    .regex(INTERVAL, 'expected e.g. 30m, 1h')
    .refine(
      value => !INTERVAL.test(value) || (parseInterval(value) > 0 && parseInterval(value) <= MAX_TIMER_MS),
      'must be between 1s and 24d'
    )
    .default('1h'),
})

export const queuesConfigSchema = z.object({
  /** EVERY_TEN_MINUTES */
  short: z.number().int().positive().default(2),
  /** HOURLY */
  medium: z.number().int().positive().default(2),
  /** DAILY */
  long: z.number().int().positive().default(1),
})

export const notifyConfigSchema = z.object({
  fromEmail: z.string().default('checkwatch@localhost'),
  adminEmails: z.array(z.string().email()).default([]),
  /** HIGH severity 额外通知的地址 */
  pagingEmail: z.string().email().optional(),
  /** 邮件正文中链接的前缀 */
  siteUrl: z.string().default('http://localhost:8000'),
  alertChannel: z.string().default('#alerts'),
  /** channel -> 飞书自定义机器人 webhook */
  webhooks: z.record(z.string(), z.string().url()).default({}),
  /** 邮件 spool 文件，默认在数据目录下 */
  outboxFile: z.string().optional(),
})

export const configSchema = z.object({
  checkers: checkersConfigSchema.default({}),
  schedule: scheduleConfigSchema.default({}),
  queues: queuesConfigSchema.default({}),
  notify: notifyConfigSchema.default({}),
})

export type CheckersConfig = z.infer<typeof checkersConfigSchema>
export type ScheduleConfig = z.infer<typeof scheduleConfigSchema>
export type QueuesConfig = z.infer<typeof queuesConfigSchema>
export type NotifyConfig = z.infer<typeof notifyConfigSchema>
export type Config = z.infer<typeof configSchema>
