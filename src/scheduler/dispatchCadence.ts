/**
 * Cadence 分发
 *
 * 每个 cadence 对应一条队列（short / medium / long），由 pump 控制并发，Worker 负责超时。
 * kill switch 和禁用列表在每次 dispatch 时读取；同一 checker 在队列中只排一次，
 * 正在运行的 checker 由 checker 锁挡住
 */

import type { Cadence, RegisteredChecker } from '../types/checker.js'
import type { QueuesConfig } from '../config/schema.js'
import type { CheckerRegistry } from '../checker/registry.js'
import { runChecker, type RunCheckerDeps, type RunOutcome } from '../checker/runChecker.js'
import { AppError } from '../shared/error.js'
import type { Result } from '../shared/result.js'
import { createLogger, logError } from '../shared/logger.js'
import { createQueue, type Queue } from './createQueue.js'
import { createWorker, type Worker } from './createWorker.js'
import { withCheckerLock } from './runLock.js'

const logger = createLogger('dispatch')

export type QueueName = keyof QueuesConfig

export const CADENCE_QUEUES = {
  EVERY_TEN_MINUTES: 'short',
  HOURLY: 'medium',
  DAILY: 'long',
} as const satisfies Record<Cadence, QueueName>

const QUEUE_NAMES: readonly QueueName[] = ['short', 'medium', 'long']

export interface DispatchSettings {
  killSwitch: boolean
  disabled: readonly string[]
}

export interface DispatcherOptions {
  registry: CheckerRegistry
  run: RunCheckerDeps
  concurrency: QueuesConfig
  runTimeoutMs: number
  /** 每次 dispatch 时调用 */
  getSettings: () => Promise<DispatchSettings>
  onSettled?: (name: string, result: Result<RunOutcome, Error>) => void
}

export interface DispatchResult {
  cadence: Cadence
  enqueued: string[]
  /** 已在队列中等待 */
  skipped: string[]
  killSwitch: boolean
}

export interface Dispatcher {
  dispatch(cadence: Cadence): Promise<DispatchResult>
  /** 单独排入一个 checker，已在队列中时返回 false */
  enqueue(checker: RegisteredChecker): boolean
  pending(): Record<QueueName, number>
  /** 等待所有队列清空且没有运行中的任务 */
  whenIdle(): Promise<void>
  stop(): Promise<void>
}

interface Lane {
  name: QueueName
  queue: Queue<RegisteredChecker>
  worker: Worker<RegisteredChecker, RunOutcome>
  concurrency: number
  active: number
}

export function createDispatcher(options: DispatcherOptions): Dispatcher {
  const inflight = new Set<Promise<void>>()
  let stopped = false

  function createLane(name: QueueName): Lane {
    // 超时后 runChecker 通过 signal 把 run 记为 ERRORED，不做状态迁移
    const worker = createWorker<RegisteredChecker, RunOutcome>(
      { name: `queue:${name}`, timeout: options.runTimeoutMs },
      ctx => withCheckerLock(ctx.task.name, () => runChecker(ctx.task, { ...options.run, signal: ctx.signal }))
    )
    return {
      name,
      queue: createQueue<RegisteredChecker>(),
      worker,
      concurrency: options.concurrency[name],
      active: 0,
    }
  }

  const lanes: Record<QueueName, Lane> = {
    short: createLane('short'),
    medium: createLane('medium'),
    long: createLane('long'),
  }

  function report(lane: Lane, checker: RegisteredChecker, result: Result<RunOutcome, Error>): void {
    if (result.ok) {
      const outcome = result.value
      const status = outcome.dryRun ? outcome.status : outcome.run.status
      logger.info(`${checker.name} finished: ${status}`)
    } else if (result.error instanceof AppError && result.error.code === 'CHECKER_LOCKED') {
      logger.warn(`Skipping ${checker.name}: ${result.error.message}`)
    } else {
      logError(logger, `Job ${checker.name} failed`, result.error, {
        checker: checker.name,
        cadence: checker.cadence,
        queue: lane.name,
      })
    }
    options.onSettled?.(checker.name, result)
  }

  function pump(lane: Lane): void {
    while (!stopped && lane.active < lane.concurrency) {
      const item = lane.queue.dequeue()
      if (!item) return

      lane.active++
      const job: Promise<void> = lane.worker
        .execute(item.data)
        .then(result => report(lane, item.data, result))
        .finally(() => {
          lane.active--
          inflight.delete(job)
          pump(lane)
        })
      inflight.add(job)
    }
  }

  async function whenIdle(): Promise<void> {
    while (inflight.size > 0) {
      await Promise.all([...inflight])
    }
  }

  function enqueueInto(lane: Lane, checker: RegisteredChecker): boolean {
    if (stopped) return false
    const added = lane.queue.enqueue(checker.name, checker)
    pump(lane)
    return added
  }

  return {
    async dispatch(cadence: Cadence): Promise<DispatchResult> {
      const result: DispatchResult = { cadence, enqueued: [], skipped: [], killSwitch: false }

      const settings = await options.getSettings()
      if (stopped) return result
      if (settings.killSwitch) {
        logger.warn(`Checkers are disabled, not dispatching ${cadence}`)
        return { ...result, killSwitch: true }
      }

      const lane = lanes[CADENCE_QUEUES[cadence]]
      for (const checker of options.registry.forCadence(cadence, settings.disabled)) {
        if (lane.queue.enqueue(checker.name, checker)) {
          result.enqueued.push(checker.name)
        } else {
          result.skipped.push(checker.name)
        }
      }
      pump(lane)

      logger.info(
        `Dispatched ${result.enqueued.length} ${cadence} checker(s) to the ${lane.name} queue` +
          (result.skipped.length > 0 ? `, ${result.skipped.length} already queued` : '')
      )
      return result
    },

    enqueue(checker: RegisteredChecker): boolean {
      return enqueueInto(lanes[CADENCE_QUEUES[checker.cadence]], checker)
    },

    pending(): Record<QueueName, number> {
      return {
        short: lanes.short.queue.size(),
        medium: lanes.medium.queue.size(),
        long: lanes.long.queue.size(),
      }
    },

    whenIdle,

    async stop(): Promise<void> {
      stopped = true
      for (const name of QUEUE_NAMES) {
        lanes[name].queue.clear()
      }
      await Promise.all(QUEUE_NAMES.map(name => lanes[name].worker.stop()))
      await whenIdle()
    },
  }
}
