/**
 * createDispatcher 测试
 *
 * 内存数据库 + 临时数据目录下的 checker 锁
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createDispatcher, type Dispatcher, type DispatchSettings } from '../dispatchCadence.js'
import { acquireLock, checkerLockKey, releaseLock } from '../runLock.js'
import { createCheckerRegistry, type CheckerRegistry } from '../../checker/registry.js'
import type { RunOutcome } from '../../checker/runChecker.js'
import { AppError } from '../../shared/error.js'
import type { Result } from '../../shared/result.js'
import type { SqliteCheckerStore } from '../../store/SqliteCheckerStore.js'
import { createTestClock, createTestStore } from '../../../tests/helpers/index.js'

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

let store: SqliteCheckerStore
let registry: CheckerRegistry
let dispatcher: Dispatcher
let settings: DispatchSettings
let settled: Array<{ name: string; result: Result<RunOutcome, Error> }>

function setup(runTimeoutMs: number = 5000): Dispatcher {
  dispatcher = createDispatcher({
    registry,
    run: { store, clock: createTestClock() },
    concurrency: { short: 1, medium: 1, long: 1 },
    runTimeoutMs,
    getSettings: async () => settings,
    onSettled: (name, result) => settled.push({ name, result }),
  })
  return dispatcher
}

function errorCode(result: Result<RunOutcome, Error>): string | null {
  if (result.ok) return null
  return result.error instanceof AppError ? result.error.code : result.error.message
}

beforeEach(() => {
  store = createTestStore()
  registry = createCheckerRegistry()
  settings = { killSwitch: false, disabled: [] }
  settled = []
})

afterEach(async () => {
  await dispatcher.stop()
  store.close()
})

describe('createDispatcher', () => {
  it('runs the enabled checkers of the dispatched cadence', async () => {
    registry.register(function hourly_a() {}, { cadence: 'HOURLY' })
    registry.register(function hourly_b() {}, { cadence: 'HOURLY' })
    registry.register(function daily_c() {}, { cadence: 'DAILY' })
    settings = { killSwitch: false, disabled: ['hourly_b'] }

    const result = await setup().dispatch('HOURLY')
    await dispatcher.whenIdle()

    expect(result).toEqual({ cadence: 'HOURLY', enqueued: ['hourly_a'], skipped: [], killSwitch: false })
    expect(store.listCheckers().map(c => c.name)).toEqual(['hourly_a'])
    expect(store.getCheckerByName('hourly_a')?.status).toBe('SUCCEEDING')
    expect(settled.map(s => s.name)).toEqual(['hourly_a'])
  })

  it('does nothing while the kill switch is on', async () => {
    registry.register(function hourly_a() {}, { cadence: 'HOURLY' })
    settings = { killSwitch: true, disabled: [] }

    const result = await setup().dispatch('HOURLY')
    await dispatcher.whenIdle()

    expect(result).toEqual({ cadence: 'HOURLY', enqueued: [], skipped: [], killSwitch: true })
    expect(dispatcher.pending()).toEqual({ short: 0, medium: 0, long: 0 })
    expect(store.listCheckers()).toEqual([])
  })

  it('reads the settings on every dispatch', async () => {
    registry.register(function ten_a() {}, { cadence: 'EVERY_TEN_MINUTES' })
    setup()

    settings = { killSwitch: true, disabled: [] }
    expect((await dispatcher.dispatch('EVERY_TEN_MINUTES')).enqueued).toEqual([])

    settings = { killSwitch: false, disabled: [] }
    expect((await dispatcher.dispatch('EVERY_TEN_MINUTES')).enqueued).toEqual(['ten_a'])
    await dispatcher.whenIdle()
    expect(store.getCheckerByName('ten_a')?.status).toBe('SUCCEEDING')
  })

  it('does not queue a checker twice while it is still waiting', async () => {
    let release: () => void = () => undefined
    const gate = new Promise<void>(resolve => {
      release = resolve
    })
    registry.register(
      async function slow_a() {
        await gate
      },
      { cadence: 'HOURLY' }
    )
    registry.register(function waiting_b() {}, { cadence: 'HOURLY' })
    setup()

    const first = await dispatcher.dispatch('HOURLY')
    // slow_a is running, waiting_b is still queued
    const second = await dispatcher.dispatch('HOURLY')
    expect(first.enqueued).toEqual(['slow_a', 'waiting_b'])
    expect(second).toMatchObject({ enqueued: ['slow_a'], skipped: ['waiting_b'] })
    expect(dispatcher.pending().medium).toBe(2)

    release()
    await dispatcher.whenIdle()

    const slow = store.getCheckerByName('slow_a')
    const waiting = store.getCheckerByName('waiting_b')
    expect(slow && store.listRuns(slow.id).length).toBe(2)
    expect(waiting && store.listRuns(waiting.id).length).toBe(1)
  })

  it('skips a checker whose lock is held elsewhere', async () => {
    registry.register(function locked_a() {}, { cadence: 'DAILY' })
    const key = checkerLockKey('locked_a')
    acquireLock(key)

    try {
      await setup().dispatch('DAILY')
      await dispatcher.whenIdle()
    } finally {
      releaseLock(key)
    }

    expect(settled.map(s => [s.name, errorCode(s.result)])).toEqual([['locked_a', 'CHECKER_LOCKED']])
    expect(store.getCheckerByName('locked_a')).toBeNull()
  })

  it('records a run that exceeds the timeout as errored', async () => {
    registry.register(
      async function slow_daily() {
        await sleep(150)
      },
      { cadence: 'DAILY' }
    )

    await setup(20).dispatch('DAILY')
    await dispatcher.whenIdle()

    expect(settled.map(s => [s.name, errorCode(s.result)])).toEqual([['slow_daily', 'ERR_TIMEOUT']])

    // the check itself finishes later; its result must not count
    await sleep(250)
    const checker = store.getCheckerByName('slow_daily')
    expect(checker?.status).toBe('NEW')
    const runs = checker ? store.listRuns(checker.id) : []
    expect(runs.map(run => run.status)).toEqual(['ERRORED'])
    expect(runs[0]?.data?.exception).toContain('Task timed out after 20ms')
    expect(checker ? store.listTransitions(checker.id) : null).toEqual([])
  })

  it('enqueues a single checker on its cadence queue', async () => {
    const registered = registry.register(function manual_a() {}, { cadence: 'EVERY_TEN_MINUTES' })
    setup()

    expect(dispatcher.enqueue(registered)).toBe(true)
    await dispatcher.whenIdle()

    expect(store.getCheckerByName('manual_a')?.status).toBe('SUCCEEDING')
  })

  it('ignores dispatches after stop', async () => {
    registry.register(function hourly_a() {}, { cadence: 'HOURLY' })
    setup()
    await dispatcher.stop()

    const result = await dispatcher.dispatch('HOURLY')
    expect(result.enqueued).toEqual([])
    expect(store.listCheckers()).toEqual([])
  })
})
