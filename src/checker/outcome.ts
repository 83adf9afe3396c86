/**
 * Check 函数返回值的归一化
 */

import { z } from 'zod'
import { AppError } from '../shared/error.js'
import type {
  CheckerFailureInput,
  CheckOutcome,
  CheckResult,
  FailureStream,
} from '../types/checker.js'

/** 单次运行最多收集的 failure 数 */
export const MAX_FAILURES = 100

export const failureInputSchema = z.object({
  text: z.string(),
  subtext: z.string().optional(),
  // 只接受扁平的 key/value
  data: z.record(z.union([z.string(), z.number().finite(), z.boolean(), z.null()])).nullish(),
})

/**
 * 校验 check 函数产出的单条 failure，不合法时抛错（run 记为 ERRORED）
 */
export function parseFailureRecord(value: unknown): CheckerFailureInput {
  const parsed = failureInputSchema.safeParse(value)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`)
    throw AppError.invalidInput(
      `Malformed failure record: ${issues.join('; ')}`,
      'Yield { text, subtext?, data? } with flat string/number/boolean/null data'
    )
  }
  return parsed.data
}

export function success(): CheckOutcome {
  return { kind: 'success' }
}

export function failures(stream: FailureStream): CheckOutcome {
  return { kind: 'failures', failures: stream }
}

export function isFailureStream(value: unknown): value is FailureStream {
  return (
    typeof value === 'object' &&
    value !== null &&
    (Symbol.iterator in value || Symbol.asyncIterator in value)
  )
}

function isCheckOutcome(value: unknown): value is CheckOutcome {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    (value.kind === 'success' || value.kind === 'failures')
  )
}

/**
 * 返回 undefined 视为成功，裸 iterable 视为 failures
 */
export function toCheckOutcome(result: CheckResult): CheckOutcome {
  if (isFailureStream(result)) return failures(result)
  if (isCheckOutcome(result)) return result
  return success()
}
