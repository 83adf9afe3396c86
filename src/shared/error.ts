/**
 * 统一错误处理系统
 * 支持错误分类、上下文信息和修复建议
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

export type ErrorCategory =
  | 'CONFIG' // 配置错误
  | 'CHECKER' // checker 注册/加载错误
  | 'RESOURCE' // 资源不存在
  | 'SCHEDULER' // 调度/锁
  | 'VALIDATION' // 输入验证错误
  | 'TIMEOUT' // 超时错误
  | 'UNKNOWN'

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'CHECKER_NOT_REGISTERED'
  | 'CHECKER_DUPLICATE'
  | 'CHECKER_INVALID'
  | 'CHECKER_LOCKED'
  | 'REGISTRY_LOAD_FAILED'
  | 'STORE_NOT_FOUND'
  | 'DAEMON_ALREADY_RUNNING'
  | 'ERR_TIMEOUT'
  | 'ERR_VALIDATION'
  | 'UNKNOWN'

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /**
   * 格式化错误输出到终端
   */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(this.category)}]`)
    lines.push('')
    lines.push(chalk.dim(`  code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Suggestion:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ 工厂方法 ============

  static configInvalid(reason: string): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Invalid config: ${reason}`,
      'CONFIG',
      undefined,
      'Compare .checkwatch.yaml against the documented fields'
    )
  }

  static checkerNotRegistered(name: string): AppError {
    return new AppError(
      'CHECKER_NOT_REGISTERED',
      `No checker registered under "${name}"`,
      'CHECKER',
      undefined,
      'List known checkers: checkwatch list'
    )
  }

  static checkerDuplicate(names: string[]): AppError {
    return new AppError(
      'CHECKER_DUPLICATE',
      `Checker names registered more than once: ${names.join(', ')}`,
      'CHECKER',
      undefined,
      'Rename one of the checker functions or pass an explicit name'
    )
  }

  static checkerInvalid(name: string, reason: string): AppError {
    return new AppError('CHECKER_INVALID', `Invalid checker "${name}": ${reason}`, 'VALIDATION')
  }

  static checkerLocked(name: string, pid: number): AppError {
    return new AppError(
      'CHECKER_LOCKED',
      `Checker "${name}" is already running (PID: ${pid})`,
      'SCHEDULER',
      undefined,
      'Wait for the running check to finish'
    )
  }

  static registryLoadFailed(modulePath: string, cause: unknown): AppError {
    return new AppError(
      'REGISTRY_LOAD_FAILED',
      `Failed to load checkers from ${modulePath}: ${getErrorMessage(cause)}`,
      'CHECKER',
      cause,
      'The module must export registerCheckers(registry)'
    )
  }

  static storeNotFound(entity: string, id: string | number): AppError {
    return new AppError(
      'STORE_NOT_FOUND',
      `${entity} not found: ${id}`,
      'RESOURCE',
      undefined,
      'Check the name or id'
    )
  }

  static daemonAlreadyRunning(pid: number): AppError {
    return new AppError(
      'DAEMON_ALREADY_RUNNING',
      `Daemon already running (PID: ${pid})`,
      'SCHEDULER',
      undefined,
      `Stop it first: kill ${pid}`
    )
  }

  static invalidInput(message: string, suggestion?: string): AppError {
    return new AppError('ERR_VALIDATION', message, 'VALIDATION', undefined, suggestion)
  }

  static timeout(message?: string): AppError {
    return new AppError('ERR_TIMEOUT', message || 'Operation timed out', 'TIMEOUT')
  }

  static unknown(cause: unknown): AppError {
    return new AppError('UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  CONFIG: chalk.yellow,
  CHECKER: chalk.red,
  RESOURCE: chalk.yellow,
  SCHEDULER: chalk.magenta,
  VALIDATION: chalk.yellow,
  TIMEOUT: chalk.magenta,
  UNKNOWN: chalk.gray,
}

/**
 * 打印错误到终端
 */
export function printError(error: unknown): void {
  const appError = error instanceof AppError ? error : AppError.unknown(error)
  console.error(appError.format())
}

export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${String(x)}`)
}
