/**
 * 统一日志系统
 *
 * 功能：
 * - 分级日志（debug/info/warn/error）
 * - 前台/后台模式切换
 * - 结构化上下文信息
 *
 * 使用：
 * - createLogger('scope').info(...)
 * - setLogLevel('debug'|'info'|'warn'|'error'|'silent')
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
export type LogMode = 'foreground' | 'background'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
}

const LEVEL_LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

// ============ 全局状态 ============

function initLogLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent'
  if (process.env.SILENT === '1') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const level = process.env.LOG_LEVEL
  if (level && isLogLevel(level)) return level
  return 'info'
}

function initLogMode(): LogMode {
  if (process.env.CHECKWATCH_BACKGROUND === '1') return 'background'
  return process.stdout.isTTY ? 'foreground' : 'background'
}

let currentLevel: LogLevel = initLogLevel()
let currentMode: LogMode = initLogMode()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function setLogMode(mode: LogMode): void {
  currentMode = mode
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel]
}

function formatClock(): string {
  const date = new Date()
  const pad = (n: number) => n.toString().padStart(2, '0')
  return chalk.dim(`${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`)
}

/**
 * 前台模式：时间 + 级别 + 消息
 * 后台模式：额外带 scope，便于 daemon 日志诊断
 */
function formatMessage(
  level: Exclude<LogLevel, 'silent'>,
  scope: string,
  message: string,
  mode: LogMode
): string {
  const color = LEVEL_COLORS[level]
  const label = LEVEL_LABELS[level]

  if (mode === 'foreground') {
    return `${formatClock()} ${color(label)} ${message}`
  }

  const scopeStr = scope ? chalk.cyan(`[${scope}]`) : ''
  return `${new Date().toISOString()} ${color(label)} ${scopeStr} ${message}`
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export function createLogger(scope: string = ''): Logger {
  function logWithLevel(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]) {
    if (!shouldLog(level)) return
    const output = formatMessage(level, scope, message, currentMode)
    const logFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    logFn(output, ...args)
  }

  return {
    debug(message: string, ...args: unknown[]) {
      logWithLevel('debug', message, args)
    },
    info(message: string, ...args: unknown[]) {
      logWithLevel('info', message, args)
    },
    warn(message: string, ...args: unknown[]) {
      logWithLevel('warn', message, args)
    },
    error(message: string, ...args: unknown[]) {
      logWithLevel('error', message, args)
    },
  }
}

export const logger = createLogger()

// ============ 错误日志增强 ============

/** 错误上下文信息，用于增强错误诊断 */
export interface ErrorContext {
  checker?: string
  runId?: number
  cadence?: string
  attempt?: number
  [key: string]: unknown
}

/**
 * 记录带上下文的错误日志
 *
 * @example
 * logError(logger, 'Checker run failed', err, { checker: 'disk_space', attempt: 2 })
 */
export function logError(
  loggerInstance: Logger,
  message: string,
  error: unknown,
  context?: ErrorContext
): void {
  const errorMessage = error instanceof Error ? error.message : String(error)
  const errorStack = error instanceof Error ? error.stack : undefined

  const data: Record<string, unknown> = {}
  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value !== undefined) data[key] = value
    }
  }

  // 堆栈只保留前 5 帧
  if (errorStack) {
    data.stack = errorStack.split('\n').slice(0, 6).join('\n')
  }

  if (Object.keys(data).length > 0) {
    loggerInstance.error(`${message}: ${errorMessage}`, data)
  } else {
    loggerInstance.error(`${message}: ${errorMessage}`)
  }
}
