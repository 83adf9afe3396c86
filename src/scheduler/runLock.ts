/**
 * PID 文件锁
 *
 * - daemon: 防止多个守护进程同时运行
 * - checker-<name>: 同一个 checker 同时只有一个运行
 *
 * 锁文件先写临时文件再 link 过去，独占创建且内容完整；
 * 持有者进程已退出的锁视为过期，回收时持有 <key>.reclaim 守护锁，同一时刻只有一个进程回收
 */

import { join } from 'path'
import { existsSync, linkSync, readFileSync, writeFileSync, unlinkSync } from 'fs'
import { z } from 'zod'
import { LOCKS_DIR } from '../store/paths.js'
import { ensureDir } from '../store/readWriteJson.js'
import { AppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'

const logger = createLogger('run-lock')

export const DAEMON_LOCK = 'daemon'

const lockInfoSchema = z.object({
  pid: z.number().int(),
  startedAt: z.string(),
  cwd: z.string(),
  command: z.string(),
})

export type LockInfo = z.infer<typeof lockInfoSchema>

export type AcquireResult = { success: true } | { success: false; existingLock: LockInfo }

export function checkerLockKey(name: string): string {
  return `checker-${name.replace(/[^\w.-]/g, '_')}`
}

function lockFile(key: string): string {
  return join(LOCKS_DIR, `${key}.pid`)
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

/**
 * 检查进程是否在运行
 */
export function isProcessRunning(pid: number): boolean {
  try {
    // 发送信号 0 不会杀死进程，只是检查进程是否存在
    process.kill(pid, 0)
    return true
  } catch (error) {
    // EPERM: 进程存在但无权限发信号
    return hasErrorCode(error, 'EPERM')
  }
}

/**
 * 获取锁信息
 */
export function getLock(key: string = DAEMON_LOCK): LockInfo | null {
  const file = lockFile(key)
  if (!existsSync(file)) {
    return null
  }

  try {
    const parsed = lockInfoSchema.safeParse(JSON.parse(readFileSync(file, 'utf-8')))
    if (parsed.success) return parsed.data
    logger.warn(`Malformed lock file: ${file}`)
    return null
  } catch (error) {
    logger.warn(`Failed to read lock file ${file}: ${error}`)
    return null
  }
}

function writeLock(key: string, info: LockInfo): boolean {
  const file = lockFile(key)
  const tmp = `${file}.${process.pid}.tmp`
  writeFileSync(tmp, JSON.stringify(info, null, 2), 'utf-8')
  try {
    // link 在目标已存在时失败，读者不会看到写了一半的锁
    linkSync(tmp, file)
    return true
  } catch (error) {
    if (hasErrorCode(error, 'EEXIST')) return false
    throw error
  } finally {
    unlinkSync(tmp)
  }
}

export function reclaimGuardKey(key: string): string {
  return `${key}.reclaim`
}

/**
 * 在守护锁内回收过期锁：重新读取，确认持有者仍已退出后才删除并写入自己的锁
 */
function reclaimStaleLock(key: string, lockInfo: LockInfo, seen: LockInfo | null): AcquireResult {
  const guard = reclaimGuardKey(key)
  if (!writeLock(guard, lockInfo)) {
    const reclaimer = getLock(guard)
    if (!reclaimer || !isProcessRunning(reclaimer.pid)) {
      // 回收者中途退出，清掉守护锁，留给下一次获取
      releaseLock(guard)
    }
    return { success: false, existingLock: reclaimer ?? seen ?? lockInfo }
  }

  try {
    const current = getLock(key)
    if (current && isProcessRunning(current.pid)) {
      return { success: false, existingLock: current }
    }

    logger.info(`Cleaning up stale lock ${key}${current ? ` (PID ${current.pid} is not running)` : ''}`)
    releaseLock(key)
    if (writeLock(key, lockInfo)) {
      return { success: true }
    }
    return { success: false, existingLock: getLock(key) ?? lockInfo }
  } finally {
    releaseLock(guard)
  }
}

/**
 * 尝试获取锁
 */
export function acquireLock(key: string = DAEMON_LOCK): AcquireResult {
  ensureDir(LOCKS_DIR)

  const lockInfo: LockInfo = {
    pid: process.pid,
    startedAt: new Date().toISOString(),
    cwd: process.cwd(),
    command: process.argv.join(' '),
  }

  if (writeLock(key, lockInfo)) {
    logger.debug(`Lock acquired: ${key}`)
    return { success: true }
  }

  const existingLock = getLock(key)
  if (existingLock && isProcessRunning(existingLock.pid)) {
    return { success: false, existingLock }
  }

  // 过期或损坏的锁
  return reclaimStaleLock(key, lockInfo, existingLock)
}

/**
 * 释放锁
 */
export function releaseLock(key: string = DAEMON_LOCK): void {
  try {
    unlinkSync(lockFile(key))
    logger.debug(`Lock released: ${key}`)
  } catch (error) {
    if (!hasErrorCode(error, 'ENOENT')) {
      logger.warn(`Failed to delete lock file for ${key}: ${error}`)
    }
  }
}

/**
 * 检查锁持有者是否在运行
 */
export function isLockHeld(key: string = DAEMON_LOCK): { running: boolean; lock?: LockInfo } {
  const lock = getLock(key)
  if (!lock) {
    return { running: false }
  }
  return { running: isProcessRunning(lock.pid), lock }
}

/**
 * 持有 checker 锁执行 fn，锁被占用时抛 CHECKER_LOCKED
 */
export async function withCheckerLock<T>(name: string, fn: () => Promise<T>): Promise<T> {
  const key = checkerLockKey(name)
  const acquired = acquireLock(key)
  if (!acquired.success) {
    throw AppError.checkerLocked(name, acquired.existingLock.pid)
  }

  try {
    return await fn()
  } finally {
    releaseLock(key)
  }
}
