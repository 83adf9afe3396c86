/**
 * @entry Shared 公共基础设施模块
 *
 * 底层工具函数，无业务逻辑依赖
 *
 * 能力分组：
 * - Result<T,E>: 函数式错误处理（ok/err/unwrap/fromPromise）
 * - AppError: 统一错误类型（assertNever/printError）
 * - Logger: 日志系统（createLogger/setLogLevel/setLogMode/logError）
 * - 错误守卫: isError/getErrorMessage/getErrorTrace
 * - 时间: now/formatTime/formatRelative/formatDuration/parseInterval/dailyAtToCron
 */

export { type Result, ok, err, unwrap, fromPromise } from './result.js'

export { type ErrorCode, type ErrorCategory, AppError, assertNever, printError } from './error.js'

export {
  type LogLevel,
  type LogMode,
  type Logger,
  type ErrorContext,
  setLogLevel,
  setLogMode,
  createLogger,
  logger,
  logError,
} from './logger.js'

export { isError, getErrorMessage, getErrorTrace } from './assertError.js'

export {
  now,
  formatTime,
  formatRelative,
  formatDuration,
  parseInterval,
  dailyAtToCron,
} from './formatTime.js'
