/**
 * 预览所有 checker：按 DAILY → HOURLY → EVERY_TEN_MINUTES 依次 dry run
 *
 * 不建 run、不改状态、不发通知（checker 行仍会同步）
 */

import type { Cadence, FinalRunStatus, RegisteredChecker } from '../types/checker.js'
import type { CheckerRegistry } from './registry.js'
import { runChecker, type RunCheckerDeps } from './runChecker.js'

const PREVIEW_ORDER: readonly Cadence[] = ['DAILY', 'HOURLY', 'EVERY_TEN_MINUTES']

export interface PreviewResult {
  name: string
  cadence: Cadence
  status: FinalRunStatus
  failureCount: number
  trace: string | null
}

export interface PreviewOptions {
  disabled?: readonly string[]
  onStart?: (checker: RegisteredChecker) => void
  onResult?: (result: PreviewResult) => void
}

export async function previewAllCheckers(
  registry: CheckerRegistry,
  deps: Pick<RunCheckerDeps, 'store'>,
  options: PreviewOptions = {}
): Promise<PreviewResult[]> {
  const results: PreviewResult[] = []

  for (const cadence of PREVIEW_ORDER) {
    for (const checker of registry.forCadence(cadence, options.disabled)) {
      options.onStart?.(checker)
      const outcome = await runChecker(checker, { store: deps.store }, { dryRun: true })
      const result: PreviewResult = {
        name: checker.name,
        cadence,
        status: outcome.status,
        failureCount: outcome.failures.length,
        trace: outcome.trace,
      }
      results.push(result)
      options.onResult?.(result)
    }
  }

  return results
}
