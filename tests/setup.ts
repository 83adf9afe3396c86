/**
 * Vitest 全局设置
 * 所有测试结束后清理测试产生的锁文件
 *
 * 注意：CHECKWATCH_DATA_DIR 由 vitest.config.ts 设置为临时目录，
 * 确保测试绝不会删除生产数据。
 */

import { rmSync, existsSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { afterAll } from 'vitest'

const DATA_DIR = process.env.CHECKWATCH_DATA_DIR || join(tmpdir(), 'checkwatch-test-data')
const LOCKS_DIR = join(DATA_DIR, 'locks')

// 安全检查：拒绝清理非临时目录
const isSafeDir = DATA_DIR.startsWith(tmpdir()) || DATA_DIR.includes('checkwatch-test')

afterAll(() => {
  if (!isSafeDir) {
    console.warn(`[setup] Refusing to clean non-temp data dir: ${DATA_DIR}`)
    return
  }
  if (existsSync(LOCKS_DIR)) {
    rmSync(LOCKS_DIR, { recursive: true, force: true })
  }
})
