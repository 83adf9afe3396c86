/**
 * Checker 执行器
 *
 * 1. 按名称 get-or-create Checker，同步注册信息（dry run 也会同步）
 * 2. 非 dry run 先建 IN_PROGRESS run
 * 3. 最多 tries 次：成功或过滤后无 failure 即停；只有最后一次的 failure 计入
 * 4. 结束 run（FAILED 时同事务写入 failure），抛错则 ERRORED 并保存堆栈
 * 5. 非 IGNORED 时走状态迁移，实际迁移才触发通知
 *
 * deps.signal 中止（超时）后 run 记为 ERRORED，跳过状态迁移和通知
 */

import { createLogger, logError } from '../shared/logger.js'
import { getErrorTrace } from '../shared/assertError.js'
import { now } from '../shared/formatTime.js'
import type {
  Checker,
  CheckerFailure,
  CheckerFailureInput,
  CheckerRun,
  FailureStream,
  FinalRunStatus,
  RegisteredChecker,
  StatusTransition,
} from '../types/checker.js'
import type { CheckerStore, CheckerUpdate, OverrideSet } from '../store/types.js'
import { MAX_FAILURES, parseFailureRecord, toCheckOutcome } from './outcome.js'
import { isSuppressed } from './matchOverride.js'
import { applyRunOutcome } from './transitionStatus.js'
import type { Escalator } from './escalateTransition.js'

const logger = createLogger('runner')

export interface RunCheckerDeps {
  store: CheckerStore
  /** 未提供时不发通知 */
  escalator?: Escalator
  /** ISO 时间戳来源，测试可替换 */
  clock?: () => string
  signal?: AbortSignal
}

export interface RunCheckerOptions {
  dryRun?: boolean
}

export interface DryRunOutcome {
  dryRun: true
  checker: Checker
  status: FinalRunStatus
  failures: CheckerFailureInput[]
  trace: string | null
}

export interface PersistedRunOutcome {
  dryRun: false
  checker: Checker
  run: CheckerRun
  failures: CheckerFailure[]
  transition: StatusTransition | null
  notificationsSent: number
}

export type RunOutcome = DryRunOutcome | PersistedRunOutcome

/**
 * 同步注册信息，只写有变化的字段
 */
export function syncChecker(store: CheckerStore, registered: RegisteredChecker): Checker {
  const description = registered.description.trim()
  const { checker } = store.getOrCreateChecker({
    name: registered.name,
    section: registered.section,
    description,
    severity: registered.severity,
    cadence: registered.cadence,
  })

  const updates: CheckerUpdate = {}
  if (checker.section !== registered.section) updates.section = registered.section
  if (checker.description !== description) updates.description = description
  if (checker.severity !== registered.severity) updates.severity = registered.severity
  if (checker.cadence !== registered.cadence) updates.cadence = registered.cadence

  if (Object.keys(updates).length === 0) return checker
  logger.debug(`Syncing ${checker.name}: ${Object.keys(updates).join(', ')}`)
  return store.updateChecker(checker.id, updates)
}

/**
 * 惰性消费 failure 流，跳过被 override 抑制的，收满 MAX_FAILURES 即停
 */
export async function collectRelevantFailures(
  stream: FailureStream,
  overrides: OverrideSet,
  signal?: AbortSignal
): Promise<CheckerFailureInput[]> {
  const collected: CheckerFailureInput[] = []
  for await (const record of stream) {
    signal?.throwIfAborted()
    const failure = parseFailureRecord(record)
    if (isSuppressed(failure, overrides)) continue
    collected.push(failure)
    if (collected.length >= MAX_FAILURES) break
  }
  return collected
}

interface AttemptResult {
  status: FinalRunStatus
  failures: CheckerFailureInput[]
  trace: string | null
}

function abortedResult(signal: AbortSignal): AttemptResult {
  return { status: 'ERRORED', failures: [], trace: getErrorTrace(signal.reason) }
}

async function attemptChecks(
  registered: RegisteredChecker,
  overrides: OverrideSet,
  signal?: AbortSignal
): Promise<AttemptResult> {
  const tries = Math.max(1, registered.tries)
  let failures: CheckerFailureInput[] = []

  try {
    for (let attempt = 1; attempt <= tries; attempt++) {
      signal?.throwIfAborted()
      const outcome = toCheckOutcome(await registered.check())
      if (outcome.kind === 'success') {
        failures = []
        break
      }
      failures = await collectRelevantFailures(outcome.failures, overrides, signal)
      if (failures.length === 0) break
      logger.debug(`${registered.name} attempt ${attempt}/${tries}: ${failures.length} failure(s)`)
    }
  } catch (error) {
    if (signal?.aborted) return abortedResult(signal)
    logError(logger, `${registered.name} raised`, error, { checker: registered.name })
    return { status: 'ERRORED', failures: [], trace: getErrorTrace(error) }
  }

  return { status: failures.length > 0 ? 'FAILED' : 'SUCCEEDED', failures, trace: null }
}

export function runChecker(
  registered: RegisteredChecker,
  deps: RunCheckerDeps,
  options: { dryRun: true }
): Promise<DryRunOutcome>
export function runChecker(
  registered: RegisteredChecker,
  deps: RunCheckerDeps,
  options?: RunCheckerOptions
): Promise<RunOutcome>
export async function runChecker(
  registered: RegisteredChecker,
  deps: RunCheckerDeps,
  options: RunCheckerOptions = {}
): Promise<RunOutcome> {
  const { store, escalator, clock = now, signal } = deps
  const checker = syncChecker(store, registered)
  const overrides = store.getOverrides(checker.id)

  if (options.dryRun) {
    const result = await attemptChecks(registered, overrides, signal)
    return { dryRun: true, checker, ...result }
  }

  const started = store.createRun(checker.id, clock())
  const attempted = await attemptChecks(registered, overrides, signal)
  // check 在中止后才返回时，结果作废
  const result = signal?.aborted ? abortedResult(signal) : attempted
  const completedAt = clock()

  const { run, failures } = store.transaction(() => ({
    run: store.finalizeRun(started.id, {
      status: result.status,
      completionDate: completedAt,
      data: result.trace !== null ? { exception: result.trace } : null,
    }),
    failures: result.status === 'FAILED' ? store.createFailures(started.id, result.failures) : [],
  }))
  logger.info(`${checker.name} run ${run.id}: ${run.status}`)

  // 运行期间可能被 operator 修改，重新读取
  const current = store.getChecker(checker.id) ?? checker
  if (signal?.aborted) {
    logger.warn(`${checker.name} run ${run.id} was aborted, status left unchanged`)
    return { dryRun: false, checker: current, run, failures, transition: null, notificationsSent: 0 }
  }
  if (current.status === 'IGNORED') {
    logger.debug(`${checker.name} is ignored, status left unchanged`)
    return { dryRun: false, checker: current, run, failures, transition: null, notificationsSent: 0 }
  }

  const next = applyRunOutcome(current, result.status, completedAt)
  const { updated, transition } = store.transaction(() => ({
    updated: store.updateChecker(current.id, {
      status: next.status,
      latestRunDate: next.latestRunDate,
      latestStatusChange: next.latestStatusChange,
    }),
    transition: next.changed
      ? store.appendTransition({
          checkerId: current.id,
          oldStatus: next.previousStatus,
          newStatus: next.status,
          changedAt: completedAt,
        })
      : null,
  }))

  const notificationsSent =
    transition && escalator
      ? await escalator.escalate({ checker: updated, previousStatus: next.previousStatus, run, failures })
      : 0

  return { dryRun: false, checker: updated, run, failures, transition, notificationsSent }
}
