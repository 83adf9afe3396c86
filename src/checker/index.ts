/**
 * @entry Checker 核心
 *
 * - registry: 注册表
 * - runChecker: 执行 + 持久化 + 状态迁移
 * - matchOverride: override 抑制
 * - transitionStatus: 状态迁移（纯函数）
 * - escalateTransition: 迁移时的通知策略
 * - manageCheckers: ignore / owner / override 等运维操作
 */

export {
  createCheckerRegistry,
  registerOptionsSchema,
  type CheckerRegistry,
  type RegisterOptions,
} from './registry.js'
export {
  runChecker,
  syncChecker,
  collectRelevantFailures,
  type RunCheckerDeps,
  type RunCheckerOptions,
  type RunOutcome,
  type DryRunOutcome,
  type PersistedRunOutcome,
} from './runChecker.js'
export { loadCheckerRegistry } from './loadRegistry.js'
export { previewAllCheckers, type PreviewResult, type PreviewOptions } from './previewCheckers.js'
export {
  STATUS_ORDER,
  findChecker,
  ignoreChecker,
  unignoreChecker,
  assignOwner,
  addOverride,
  removeOverride,
  parseDataPairs,
  groupCheckersByStatus,
  listCurrentFailures,
  type OverrideRequest,
  type CheckerGroup,
  type CurrentFailure,
} from './manageCheckers.js'
export { success, failures, toCheckOutcome, isFailureStream, MAX_FAILURES } from './outcome.js'
export { isSuppressed, isSubset, findSuppressingOverride } from './matchOverride.js'
export { applyRunOutcome, statusForOutcome, type TransitionResult } from './transitionStatus.js'
export {
  createEscalator,
  type Escalator,
  type EscalatorOptions,
  type EscalationContext,
} from './escalateTransition.js'
export { checkerUrl } from './renderMessages.js'
