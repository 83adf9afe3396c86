/**
 * @entry Scheduler 调度模块
 *
 * 能力分组：
 * - 队列: createQueue（FIFO，按 id 去重）
 * - Worker: createWorker（墙钟超时 + AbortSignal）
 * - 锁: acquireLock/releaseLock/withCheckerLock（PID 文件锁）
 * - 分发: createDispatcher（cadence → short/medium/long 队列）
 * - 守护进程: registerCadenceJobs/startDaemon
 */

export { type QueueItem, type Queue, createQueue } from './createQueue.js'

export {
  type WorkerConfig,
  type Worker,
  type WorkerContext,
  type TaskHandler,
  createWorker,
} from './createWorker.js'

export {
  type LockInfo,
  type AcquireResult,
  DAEMON_LOCK,
  checkerLockKey,
  isProcessRunning,
  getLock,
  acquireLock,
  releaseLock,
  isLockHeld,
  withCheckerLock,
} from './runLock.js'

export {
  type QueueName,
  type DispatchSettings,
  type DispatcherOptions,
  type DispatchResult,
  type Dispatcher,
  CADENCE_QUEUES,
  createDispatcher,
} from './dispatchCadence.js'

export { cadenceCronExpressions, registerCadenceJobs, stopAllJobs } from './cadenceJobs.js'
export { startDaemon, type DaemonDeps } from './startDaemon.js'
