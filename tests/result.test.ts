/**
 * Result 类型单元测试
 */

import { describe, it, expect } from 'vitest'
import { ok, err, unwrap, fromPromise } from '../src/shared/result.js'

describe('Result 构造函数', () => {
  it('ok 应创建成功结果', () => {
    const result = ok(42)
    expect(result.ok).toBe(true)
    expect(result.value).toBe(42)
  })

  it('err 应创建失败结果', () => {
    const error = new Error('failed')
    const result = err(error)
    expect(result.ok).toBe(false)
    expect(result.error).toBe(error)
  })
})

describe('unwrap', () => {
  it('成功时返回值', () => {
    expect(unwrap(ok('value'))).toBe('value')
  })

  it('失败时抛出错误', () => {
    expect(() => unwrap(err(new Error('boom')))).toThrow('boom')
  })
})

describe('fromPromise', () => {
  it('resolve 转为 ok', async () => {
    const result = await fromPromise(Promise.resolve(7))
    expect(result).toEqual({ ok: true, value: 7 })
  })

  it('reject 非 Error 值时包装为 Error', async () => {
    const result = await fromPromise(Promise.reject('nope'))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(Error)
      expect(result.error.message).toBe('nope')
    }
  })
})
