/**
 * Checker 存储接口
 *
 * 同步接口（better-sqlite3），runner 与 CLI 只依赖这里的定义，
 * 测试可以换成内存数据库。
 */

import type {
  Cadence,
  Checker,
  CheckerFailure,
  CheckerFailureInput,
  CheckerOverride,
  CheckerRun,
  CheckerStatus,
  FailureData,
  FinalRunStatus,
  RunData,
  Severity,
  StatusTransition,
} from '../types/checker.js'

/** 注册信息中需要同步到数据库的字段 */
export interface CheckerMetadata {
  name: string
  section: string
  description: string
  severity: Severity
  cadence: Cadence
}

export type CheckerUpdate = Partial<
  Pick<
    Checker,
    | 'section'
    | 'description'
    | 'severity'
    | 'cadence'
    | 'status'
    | 'owner'
    | 'latestRunDate'
    | 'latestStatusChange'
  >
>

export interface CheckerFilter {
  status?: CheckerStatus
  cadence?: Cadence
}

export interface RunCompletion {
  status: FinalRunStatus
  completionDate: string
  data?: RunData | null
}

export interface OverrideInput {
  checkerId: number | null
  applyToAllCheckers: boolean
  data: FailureData
  note?: string
  owner?: string | null
}

export interface OverrideSet {
  /** 作用于单个 checker 的 override */
  scoped: CheckerOverride[]
  /** applyToAllCheckers 的全局 override */
  global: CheckerOverride[]
}

export interface TransitionInput {
  checkerId: number
  oldStatus: CheckerStatus
  newStatus: CheckerStatus
  changedAt: string
}

export interface CheckerStore {
  /** 在单个事务中执行 fn，抛错时回滚 */
  transaction<T>(fn: () => T): T

  // Checker
  getOrCreateChecker(metadata: CheckerMetadata): { checker: Checker; created: boolean }
  getChecker(id: number): Checker | null
  getCheckerByName(name: string): Checker | null
  listCheckers(filter?: CheckerFilter): Checker[]
  updateChecker(id: number, updates: CheckerUpdate): Checker

  // Run
  createRun(checkerId: number, creationDate: string): CheckerRun
  finalizeRun(runId: number, completion: RunCompletion): CheckerRun
  getRun(runId: number): CheckerRun | null
  /** 最近一次运行，可排除当前正在处理的 run */
  getLatestRun(checkerId: number, options?: { excludeRunId?: number }): CheckerRun | null
  listRuns(checkerId: number, limit?: number): CheckerRun[]

  // Failure
  createFailures(runId: number, failures: CheckerFailureInput[]): CheckerFailure[]
  listFailures(runId: number): CheckerFailure[]

  // Override
  getOverrides(checkerId: number): OverrideSet
  createOverride(input: OverrideInput): CheckerOverride
  deleteOverride(id: number): boolean
  listOverrides(): CheckerOverride[]

  // Transition
  appendTransition(input: TransitionInput): StatusTransition
  listTransitions(checkerId: number): StatusTransition[]

  close(): void
}
