/**
 * Result 类型 - 统一处理成功/失败结果
 * 避免 try-catch 污染业务代码，使错误处理显式化
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}

// 解包 - 失败时抛出错误
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  throw result.error
}

// 将 Promise 包装为 Result
export async function fromPromise<T>(promise: Promise<T>): Promise<Result<T, Error>> {
  try {
    const value = await promise
    return ok(value)
  } catch (e) {
    return err(e instanceof Error ? e : new Error(String(e)))
  }
}
