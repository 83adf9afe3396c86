import { describe, it, expect, vi, afterEach } from 'vitest'
import cron from 'node-cron'
import { cadenceCronExpressions, registerCadenceJobs, stopAllJobs } from '../cadenceJobs.js'
import type { Dispatcher } from '../dispatchCadence.js'

afterEach(() => {
  stopAllJobs()
  vi.restoreAllMocks()
})

describe('cadenceCronExpressions', () => {
  it('maps each cadence to a cron expression', () => {
    expect(cadenceCronExpressions('09:30')).toEqual({
      EVERY_TEN_MINUTES: '*/10 * * * *',
      HOURLY: '0 * * * *',
      DAILY: '30 9 * * *',
    })
  })

  it('rejects a malformed time of day', () => {
    expect(() => cadenceCronExpressions('25:00')).toThrow('Invalid time of day: 25:00')
  })
})

describe('registerCadenceJobs', () => {
  it('schedules one valid job per cadence', () => {
    const dispatcher: Dispatcher = {
      dispatch: vi.fn(),
      enqueue: vi.fn(),
      pending: vi.fn(),
      whenIdle: vi.fn(),
      stop: vi.fn(),
    }
    const schedule = vi.spyOn(cron, 'schedule')

    const expressions = registerCadenceJobs(dispatcher, '06:05')

    expect(expressions.DAILY).toBe('5 6 * * *')
    expect(schedule.mock.calls.map(call => call[0])).toEqual(['*/10 * * * *', '0 * * * *', '5 6 * * *'])
    expect(Object.values(expressions).every(expression => cron.validate(expression))).toBe(true)
  })
})
