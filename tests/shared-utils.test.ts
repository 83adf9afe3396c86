/**
 * Shared 工具函数测试
 *
 * 覆盖:
 * - formatTime: formatDuration, parseInterval, dailyAtToCron
 * - assertError: getErrorMessage, getErrorTrace
 * - error: AppError 工厂方法
 */

import { describe, it, expect } from 'vitest'
import {
  now,
  formatDuration,
  parseInterval,
  dailyAtToCron,
} from '../src/shared/formatTime.js'
import { getErrorMessage, getErrorTrace } from '../src/shared/assertError.js'
import { AppError } from '../src/shared/error.js'

describe('formatTime utilities', () => {
  it('now() returns an ISO string', () => {
    expect(now()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/)
  })

  it('formatDuration picks a unit by magnitude', () => {
    expect(formatDuration(500)).toBe('500ms')
    expect(formatDuration(1500)).toBe('1.5s')
    expect(formatDuration(125000)).toBe('2m 5s')
    expect(formatDuration(3660000)).toBe('1h 1m')
  })

  it('parseInterval handles each unit', () => {
    expect(parseInterval('30s')).toBe(30000)
    expect(parseInterval('10m')).toBe(600000)
    expect(parseInterval('1h')).toBe(3600000)
    expect(parseInterval('1d')).toBe(86400000)
  })

  it('parseInterval rejects malformed input', () => {
    expect(() => parseInterval('abc')).toThrow('Invalid interval format: abc')
    expect(() => parseInterval('10w')).toThrow('Invalid interval format: 10w')
  })

  it('dailyAtToCron builds a daily expression', () => {
    expect(dailyAtToCron('09:30')).toBe('30 9 * * *')
    expect(dailyAtToCron('9:05')).toBe('5 9 * * *')
    expect(dailyAtToCron('23:59')).toBe('59 23 * * *')
  })

  it('dailyAtToCron rejects out of range times', () => {
    expect(() => dailyAtToCron('24:00')).toThrow('Invalid time of day: 24:00')
    expect(() => dailyAtToCron('noon')).toThrow('Invalid time of day: noon')
  })
})

describe('assertError', () => {
  it('getErrorMessage handles non-Error values', () => {
    expect(getErrorMessage(new Error('x'))).toBe('x')
    expect(getErrorMessage('plain')).toBe('plain')
    expect(getErrorMessage(42)).toBe('42')
  })

  it('getErrorTrace falls back to name and message without a stack', () => {
    const error = new Error('lost')
    error.stack = undefined
    expect(getErrorTrace(error)).toBe('Error: lost')
  })

  it('getErrorTrace keeps the stack', () => {
    const error = new Error('kept')
    expect(getErrorTrace(error)).toContain('Error: kept\n')
  })
})

describe('AppError', () => {
  it('checkerNotRegistered carries code and category', () => {
    const error = AppError.checkerNotRegistered('disk_space')
    expect(error.code).toBe('CHECKER_NOT_REGISTERED')
    expect(error.category).toBe('CHECKER')
    expect(error.message).toBe('No checker registered under "disk_space"')
  })

  it('format includes code and suggestion', () => {
    const text = AppError.configInvalid('bad').format()
    expect(text).toContain('code: CONFIG_INVALID')
    expect(text).toContain('Invalid config: bad')
  })
})
