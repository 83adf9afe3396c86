import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { SqliteCheckerStore } from '../SqliteCheckerStore.js'

const METADATA = {
  name: 'disk_space',
  section: 'infra',
  description: 'Checks free disk',
  severity: 'LOW',
  cadence: 'HOURLY',
} as const

let store: SqliteCheckerStore

beforeEach(() => {
  store = new SqliteCheckerStore(':memory:')
})

afterEach(() => {
  store.close()
})

describe('SqliteCheckerStore', () => {
  describe('checkers', () => {
    it('creates once and returns the existing row afterwards', () => {
      const first = store.getOrCreateChecker(METADATA)
      const second = store.getOrCreateChecker({ ...METADATA, description: 'changed' })

      expect(first.created).toBe(true)
      expect(first.checker).toMatchObject({ ...METADATA, status: 'NEW', owner: null, latestRunDate: null })
      expect(second.created).toBe(false)
      expect(second.checker.id).toBe(first.checker.id)
      expect(second.checker.description).toBe('Checks free disk')
    })

    it('updates only the given fields', () => {
      const { checker } = store.getOrCreateChecker(METADATA)
      const updated = store.updateChecker(checker.id, { status: 'FAILING', owner: 'ops@example.com' })
      expect(updated.status).toBe('FAILING')
      expect(updated.owner).toBe('ops@example.com')
      expect(updated.description).toBe('Checks free disk')

      const cleared = store.updateChecker(checker.id, { owner: null })
      expect(cleared.owner).toBeNull()
      expect(cleared.status).toBe('FAILING')
    })

    it('throws when updating a missing checker', () => {
      expect(() => store.updateChecker(999, { status: 'NEW' })).toThrow('Checker not found: 999')
    })

    it('filters the listing', () => {
      store.getOrCreateChecker(METADATA)
      const { checker } = store.getOrCreateChecker({ ...METADATA, name: 'queue_depth', cadence: 'DAILY' })
      store.updateChecker(checker.id, { status: 'IGNORED' })

      expect(store.listCheckers().map(c => c.name)).toEqual(['disk_space', 'queue_depth'])
      expect(store.listCheckers({ status: 'IGNORED' }).map(c => c.name)).toEqual(['queue_depth'])
      expect(store.listCheckers({ cadence: 'HOURLY' }).map(c => c.name)).toEqual(['disk_space'])
    })
  })

  describe('runs and failures', () => {
    it('creates, finalizes and looks up runs', () => {
      const { checker } = store.getOrCreateChecker(METADATA)
      const first = store.createRun(checker.id, '2024-01-01T00:00:00.000Z')
      expect(first).toMatchObject({ status: 'IN_PROGRESS', completionDate: null, data: null })

      const finished = store.finalizeRun(first.id, {
        status: 'ERRORED',
        completionDate: '2024-01-01T00:01:00.000Z',
        data: { exception: 'Error: boom' },
      })
      expect(finished.status).toBe('ERRORED')
      expect(finished.data).toEqual({ exception: 'Error: boom' })

      const second = store.createRun(checker.id, '2024-01-01T01:00:00.000Z')
      expect(store.getLatestRun(checker.id)?.id).toBe(second.id)
      expect(store.getLatestRun(checker.id, { excludeRunId: second.id })?.id).toBe(first.id)
      expect(store.listRuns(checker.id).map(r => r.id)).toEqual([second.id, first.id])
    })

    it('stores failures in order and drops empty data', () => {
      const { checker } = store.getOrCreateChecker(METADATA)
      const run = store.createRun(checker.id, '2024-01-01T00:00:00.000Z')
      const failures = store.createFailures(run.id, [
        { text: 'one', subtext: 'detail', data: { host: 'db1', ok: false } },
        { text: 'two', data: {} },
        { text: 'three' },
      ])

      expect(failures.map(f => [f.text, f.subtext, f.data])).toEqual([
        ['one', 'detail', { host: 'db1', ok: false }],
        ['two', '', null],
        ['three', '', null],
      ])
    })

    it('rolls back a failed transaction', () => {
      const { checker } = store.getOrCreateChecker(METADATA)
      expect(() =>
        store.transaction(() => {
          store.updateChecker(checker.id, { status: 'FAILING' })
          throw new Error('abort')
        })
      ).toThrow('abort')
      expect(store.getChecker(checker.id)?.status).toBe('NEW')
    })
  })

  describe('overrides and transitions', () => {
    it('separates scoped and global overrides', () => {
      const { checker } = store.getOrCreateChecker(METADATA)
      const scoped = store.createOverride({
        checkerId: checker.id,
        applyToAllCheckers: false,
        data: { host: 'db1' },
        note: 'known flaky',
      })
      const global = store.createOverride({ checkerId: null, applyToAllCheckers: true, data: { env: 'staging' } })

      expect(scoped).toMatchObject({ applyToAllCheckers: false, note: 'known flaky', owner: null })
      expect(store.getOverrides(checker.id)).toEqual({ scoped: [scoped], global: [global] })
      expect(store.listOverrides()).toHaveLength(2)

      expect(store.deleteOverride(scoped.id)).toBe(true)
      expect(store.deleteOverride(scoped.id)).toBe(false)
      expect(store.getOverrides(checker.id).scoped).toEqual([])
    })

    it('appends and lists transitions', () => {
      const { checker } = store.getOrCreateChecker(METADATA)
      store.appendTransition({
        checkerId: checker.id,
        oldStatus: 'NEW',
        newStatus: 'FAILING',
        changedAt: '2024-01-01T00:00:00.000Z',
      })
      store.appendTransition({
        checkerId: checker.id,
        oldStatus: 'FAILING',
        newStatus: 'SUCCEEDING',
        changedAt: '2024-01-01T01:00:00.000Z',
      })
      expect(store.listTransitions(checker.id).map(t => `${t.oldStatus}->${t.newStatus}`)).toEqual([
        'NEW->FAILING',
        'FAILING->SUCCEEDING',
      ])
    })
  })
})
