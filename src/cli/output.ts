/**
 * CLI 用户输出工具
 * 用于面向用户的终端输出，简洁友好，无时间戳
 *
 * 使用场景：CLI 命令的用户反馈和 checker 详情展示
 *
 * 注意：这些函数仅用于终端用户交互，不用于诊断日志
 * 诊断日志请使用 shared/logger.ts
 */

import chalk from 'chalk'

// ============ 基础输出 ============

/** 成功消息 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message)
}

/** 警告消息 */
export function warn(message: string): void {
  console.warn(chalk.yellow('!'), message)
}

/** 信息消息 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message)
}

// ============ 结构化输出 ============

/** 输出标题行 */
export function header(title: string): void {
  console.log()
  console.log(chalk.bold(title))
  console.log(chalk.dim('─'.repeat(Math.min(title.length + 4, 40))))
}

// ============ 列表输出 ============

export interface ListItem {
  label: string
  value: string | number | undefined
}

/** 输出键值对列表 */
export function list(items: ListItem[], indent = 2): void {
  const prefix = ' '.repeat(indent)
  const maxLabelLen = Math.max(...items.map(i => i.label.length))

  for (const item of items) {
    const label = chalk.gray(item.label.padEnd(maxLabelLen) + ':')
    console.log(`${prefix}${label} ${item.value ?? '-'}`)
  }
}
