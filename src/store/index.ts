/**
 * @entry Store 存储层
 *
 * - CheckerStore: 存储接口
 * - SqliteCheckerStore: better-sqlite3 实现
 * - getStore/resetStore: 进程内单例
 */

import { SqliteCheckerStore } from './SqliteCheckerStore.js'
import { DB_FILE } from './paths.js'
import type { CheckerStore } from './types.js'

export * from './types.js'
export { SqliteCheckerStore } from './SqliteCheckerStore.js'
export { DATA_DIR, DB_FILE, LOCKS_DIR, DEFAULT_OUTBOX_FILE } from './paths.js'
export { appendToFile, appendJsonLine, ensureDir } from './readWriteJson.js'

// 单例
let storeInstance: CheckerStore | null = null

export function getStore(): CheckerStore {
  if (!storeInstance) {
    storeInstance = new SqliteCheckerStore(DB_FILE)
  }
  return storeInstance
}

// 重置（用于测试）
export function resetStore(): void {
  storeInstance?.close()
  storeInstance = null
}
