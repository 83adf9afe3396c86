/**
 * 时间处理工具
 * 基于 date-fns 的轻量封装
 */

import { format, formatDistanceToNow, parseISO } from 'date-fns'

// ISO 时间戳
export function now(): string {
  return new Date().toISOString()
}

export function formatTime(isoString: string, pattern: string = 'yyyy-MM-dd HH:mm:ss'): string {
  return format(parseISO(isoString), pattern)
}

// 相对时间（如 "3 minutes ago"）
export function formatRelative(isoString: string): string {
  return formatDistanceToNow(parseISO(isoString), { addSuffix: true })
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  if (ms < 3600000) return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`
  return `${Math.floor(ms / 3600000)}h ${Math.floor((ms % 3600000) / 60000)}m`
}

const INTERVAL_MULTIPLIERS: Record<string, number> = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
}

// 解析时间间隔字符串（如 "5m", "1h", "1d"）
export function parseInterval(interval: string): number {
  const match = interval.match(/^(\d+)([smhd])$/)
  const multiplier = match?.[2] ? INTERVAL_MULTIPLIERS[match[2]] : undefined
  if (!match?.[1] || multiplier === undefined) {
    throw new Error(`Invalid interval format: ${interval}`)
  }
  return parseInt(match[1], 10) * multiplier
}

/**
 * "HH:mm" -> 每日 cron 表达式
 * @example dailyAtToCron('09:30') // '30 9 * * *'
 */
export function dailyAtToCron(time: string): string {
  const match = time.match(/^([01]?\d|2[0-3]):([0-5]\d)$/)
  if (!match?.[1] || !match[2]) throw new Error(`Invalid time of day: ${time}`)
  return `${parseInt(match[2], 10)} ${parseInt(match[1], 10)} * * *`
}
