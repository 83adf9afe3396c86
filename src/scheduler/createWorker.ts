/**
 * Worker 抽象
 * 带墙钟超时的任务执行器，并发由调用方控制
 *
 * 超时后任务立即以 ERR_TIMEOUT 结束；handler 本身无法被强制中断，
 * 通过 ctx.signal 感知取消
 */

import { type Result, err, fromPromise } from '../shared/result.js'
import { AppError } from '../shared/error.js'
import { formatDuration } from '../shared/formatTime.js'
import { createLogger } from '../shared/logger.js'

export interface WorkerConfig {
  name: string
  // 任务超时（毫秒）
  timeout: number
}

export interface Worker<T, R> {
  // 停止并取消进行中的任务
  stop(): Promise<void>
  execute(task: T): Promise<Result<R, Error>>
}

export interface WorkerContext<T> {
  task: T
  signal: AbortSignal
}

export type TaskHandler<T, R> = (ctx: WorkerContext<T>) => Promise<R>

export function createWorker<T, R>(config: WorkerConfig, handler: TaskHandler<T, R>): Worker<T, R> {
  const logger = createLogger(config.name)
  const aborters = new Set<(reason: Error) => void>()
  let stopped = false

  return {
    async stop(): Promise<void> {
      stopped = true
      for (const abort of aborters) {
        abort(new Error('Worker stopped'))
      }
      aborters.clear()
      logger.debug('Worker stopped')
    },

    async execute(task: T): Promise<Result<R, Error>> {
      if (stopped) {
        return err(new Error('Worker is stopped'))
      }

      const controller = new AbortController()
      let rejectAborted: (reason: Error) => void = () => undefined
      const aborted = new Promise<never>((_, reject) => {
        rejectAborted = reject
      })
      const abort = (reason: Error) => {
        rejectAborted(reason)
        controller.abort(reason)
      }
      aborters.add(abort)

      const timeoutId = setTimeout(
        () => abort(AppError.timeout(`Task timed out after ${formatDuration(config.timeout)}`)),
        config.timeout
      )

      try {
        return await fromPromise(Promise.race([handler({ task, signal: controller.signal }), aborted]))
      } finally {
        clearTimeout(timeoutId)
        aborters.delete(abort)
      }
    },
  }
}
