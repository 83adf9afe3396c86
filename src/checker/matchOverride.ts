/**
 * Override 匹配
 *
 * failure.data 为空时永远视为相关；否则只要某个 override 的 data
 * 是 failure.data 的子集（键存在且值严格相等）就被抑制。
 * 空 override data `{}` 会匹配所有带 data 的 failure，创建方负责避免。
 */

import type { CheckerFailureInput, CheckerOverride, FailureData } from '../types/checker.js'
import type { OverrideSet } from '../store/types.js'

export function isSubset(subset: FailureData, data: FailureData): boolean {
  return Object.entries(subset).every(([key, value]) => key in data && data[key] === value)
}

/**
 * 返回第一个匹配的 override，checker 自身的优先于全局的
 */
export function findSuppressingOverride(
  failure: CheckerFailureInput,
  overrides: OverrideSet
): CheckerOverride | null {
  const data = failure.data
  if (!data || Object.keys(data).length === 0) return null

  return (
    overrides.scoped.find(override => isSubset(override.data, data)) ??
    overrides.global.find(override => isSubset(override.data, data)) ??
    null
  )
}

export function isSuppressed(failure: CheckerFailureInput, overrides: OverrideSet): boolean {
  return findSuppressingOverride(failure, overrides) !== null
}
