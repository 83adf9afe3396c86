/**
 * 状态迁移引擎（纯函数，持久化由 runner 负责）
 *
 * 首次运行或 NEW 状态时直接取 run 结果对应的状态；之后只有结果类别
 * 与当前状态不同才迁移。结果状态不会是 NEW，所以两种情况都归结为
 * "目标状态 != 当前状态"。
 */

import type { CheckerStatus, FinalRunStatus } from '../types/checker.js'

const OUTCOME_STATUS: Record<FinalRunStatus, CheckerStatus> = {
  SUCCEEDED: 'SUCCEEDING',
  FAILED: 'FAILING',
  ERRORED: 'ERRORED',
}

export function statusForOutcome(runStatus: FinalRunStatus): CheckerStatus {
  return OUTCOME_STATUS[runStatus]
}

export interface CheckerState {
  status: CheckerStatus
  latestStatusChange: string | null
}

export interface TransitionResult {
  previousStatus: CheckerStatus
  status: CheckerStatus
  changed: boolean
  latestRunDate: string
  latestStatusChange: string | null
}

/**
 * @param at - 本次 run 的完成时间
 */
export function applyRunOutcome(
  state: CheckerState,
  runStatus: FinalRunStatus,
  at: string
): TransitionResult {
  const target = statusForOutcome(runStatus)
  const changed = state.status !== target

  return {
    previousStatus: state.status,
    status: target,
    changed,
    latestRunDate: at,
    latestStatusChange: changed ? at : state.latestStatusChange,
  }
}
