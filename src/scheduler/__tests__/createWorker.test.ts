/**
 * createWorker 测试
 */

import { describe, it, expect, vi } from 'vitest'
import { createWorker, type WorkerContext } from '../createWorker.js'
import { AppError } from '../../shared/error.js'

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

describe('createWorker', () => {
  it('should execute a task and return Result.ok', async () => {
    const handler = vi.fn(async (ctx: WorkerContext<string>) => `done:${ctx.task}`)
    const worker = createWorker({ name: 'test-worker', timeout: 5000 }, handler)

    const result = await worker.execute('disk_space')
    expect(result).toEqual({ ok: true, value: 'done:disk_space' })
    expect(handler).toHaveBeenCalledTimes(1)
  })

  it('should return Result.err when the handler throws', async () => {
    const worker = createWorker({ name: 'test-worker', timeout: 5000 }, async () => {
      throw new Error('task failed')
    })

    const result = await worker.execute('data')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe('task failed')
    }
  })

  it('should report a timeout and abort the signal with it', async () => {
    const seen: { signal?: AbortSignal } = {}
    const handler = vi.fn(async (ctx: WorkerContext<string>) => {
      seen.signal = ctx.signal
      await sleep(500)
      return 'late'
    })
    const worker = createWorker({ name: 'test-worker', timeout: 30 }, handler)

    const result = await worker.execute('slow')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(AppError)
      expect(result.error instanceof AppError && result.error.code).toBe('ERR_TIMEOUT')
      expect(result.error.message).toBe('Task timed out after 30ms')
    }
    expect(handler).toHaveBeenCalledTimes(1)
    expect(seen.signal?.aborted).toBe(true)
    expect(seen.signal?.reason).toBe(result.ok ? null : result.error)
  })

  it('stop() should abort running tasks', async () => {
    let aborted = false
    const worker = createWorker({ name: 'test-worker', timeout: 10000 }, async ctx => {
      ctx.signal.addEventListener('abort', () => {
        aborted = true
      })
      await sleep(2000)
      return 'done'
    })

    const taskPromise = worker.execute('data')
    await sleep(20)
    await worker.stop()

    expect(aborted).toBe(true)
    const result = await taskPromise
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe('Worker stopped')
    }
  })

  it('should refuse tasks once stopped', async () => {
    const handler = vi.fn(async () => 'ok')
    const worker = createWorker({ name: 'test-worker', timeout: 5000 }, handler)
    await worker.stop()

    const result = await worker.execute('data')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe('Worker is stopped')
    }
    expect(handler).not.toHaveBeenCalled()
  })
})
