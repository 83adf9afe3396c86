/**
 * 文件读写工具
 */

import { existsSync, mkdirSync, appendFileSync } from 'fs'
import { dirname } from 'path'

/**
 * 追加内容到文件，父目录不存在时自动创建
 */
export function appendToFile(filepath: string, content: string): void {
  ensureDir(dirname(filepath))
  appendFileSync(filepath, content, 'utf-8')
}

/**
 * 追加一行 JSON（JSON Lines 格式）
 */
export function appendJsonLine(filepath: string, data: unknown): void {
  appendToFile(filepath, JSON.stringify(data) + '\n')
}

export function ensureDir(dirpath: string): void {
  if (!existsSync(dirpath)) {
    mkdirSync(dirpath, { recursive: true })
  }
}
