import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { fileURLToPath } from 'url'
import { previewAllCheckers, type PreviewResult } from '../previewCheckers.js'
import { loadCheckerRegistry } from '../loadRegistry.js'
import type { CheckerRegistry } from '../registry.js'
import { unwrap } from '../../shared/result.js'
import type { SqliteCheckerStore } from '../../store/SqliteCheckerStore.js'
import { createTestStore } from '../../../tests/helpers/index.js'

const FIXTURE = fileURLToPath(new URL('../../../tests/fixtures/checkers.ts', import.meta.url))

let store: SqliteCheckerStore
let registry: CheckerRegistry

beforeEach(async () => {
  store = createTestStore()
  registry = unwrap(await loadCheckerRegistry(FIXTURE))
})

afterEach(() => {
  store.close()
})

describe('previewAllCheckers', () => {
  it('dry-runs every enabled checker, daily first', async () => {
    const seen: PreviewResult[] = []
    const results = await previewAllCheckers(registry, { store }, { onResult: result => seen.push(result) })

    expect(results.map(r => [r.name, r.cadence, r.status, r.failureCount])).toEqual([
      ['healthy_checker', 'DAILY', 'SUCCEEDED', 0],
      ['broken_checker', 'DAILY', 'ERRORED', 0],
      ['basic_checker', 'HOURLY', 'FAILED', 1],
      ['empty_failures', 'EVERY_TEN_MINUTES', 'SUCCEEDED', 0],
    ])
    expect(results.find(r => r.name === 'broken_checker')?.trace).toContain('Error: database unreachable')
    expect(seen).toEqual(results)
  })

  it('skips disabled checkers and leaves no runs behind', async () => {
    const results = await previewAllCheckers(registry, { store }, { disabled: ['broken_checker'] })

    expect(results.map(r => r.name)).not.toContain('broken_checker')
    for (const checker of store.listCheckers()) {
      expect(checker.status).toBe('NEW')
      expect(store.listRuns(checker.id)).toEqual([])
    }
  })
})
