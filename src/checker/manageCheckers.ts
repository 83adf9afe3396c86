/**
 * 运维操作：ignore / unignore、指定 owner、override 管理、按状态分组
 *
 * 这些操作直接改状态，不写 transition，也不发通知
 */

import { z } from 'zod'
import { AppError } from '../shared/error.js'
import type {
  Checker,
  CheckerFailure,
  CheckerOverride,
  CheckerStatus,
  FailureData,
} from '../types/checker.js'
import type { CheckerStore } from '../store/types.js'

/** 列表展示顺序 */
export const STATUS_ORDER: readonly CheckerStatus[] = ['FAILING', 'ERRORED', 'IGNORED', 'SUCCEEDING', 'NEW']

export function findChecker(store: CheckerStore, name: string): Checker {
  const checker = store.getCheckerByName(name)
  if (!checker) throw AppError.storeNotFound('Checker', name)
  return checker
}

export function ignoreChecker(store: CheckerStore, name: string): Checker {
  const checker = findChecker(store, name)
  if (checker.status === 'IGNORED') return checker
  return store.updateChecker(checker.id, { status: 'IGNORED' })
}

/**
 * 取消忽略后回到 NEW，下一次运行按首次运行处理
 */
export function unignoreChecker(store: CheckerStore, name: string): Checker {
  const checker = findChecker(store, name)
  if (checker.status !== 'IGNORED') return checker
  return store.updateChecker(checker.id, { status: 'NEW' })
}

export function assignOwner(store: CheckerStore, name: string, owner: string | null): Checker {
  const checker = findChecker(store, name)
  return store.updateChecker(checker.id, { owner })
}

export interface OverrideRequest {
  /** 作用于单个 checker */
  checker?: string
  /** 作用于所有 checker */
  all?: boolean
  data: FailureData
  note?: string
  owner?: string
}

export function addOverride(store: CheckerStore, request: OverrideRequest): CheckerOverride {
  if (request.all && request.checker) {
    throw AppError.invalidInput('An override applies either to one checker or to all of them, not both')
  }
  if (request.all) {
    return store.createOverride({
      checkerId: null,
      applyToAllCheckers: true,
      data: request.data,
      note: request.note,
      owner: request.owner,
    })
  }
  if (!request.checker) {
    throw AppError.invalidInput('Missing override target', 'Pass a checker name or --all')
  }
  const checker = findChecker(store, request.checker)
  return store.createOverride({
    checkerId: checker.id,
    applyToAllCheckers: false,
    data: request.data,
    note: request.note,
    owner: request.owner,
  })
}

export function removeOverride(store: CheckerStore, id: number): void {
  if (!store.deleteOverride(id)) throw AppError.storeNotFound('Override', id)
}

const jsonValueSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()])

function parseJsonValue(pair: string, raw: string): string | number | boolean | null {
  let value: unknown
  try {
    value = JSON.parse(raw)
  } catch {
    throw AppError.invalidInput(`Invalid JSON in data entry "${pair}"`, 'Use key:=123, key:=true, key:=null or key:=\'"text"\'')
  }
  const parsed = jsonValueSchema.safeParse(value)
  if (!parsed.success) {
    throw AppError.invalidInput(`Data entry "${pair}" must be a string, number, boolean or null`)
  }
  return parsed.data
}

/**
 * key=value 列表 -> FailureData
 *
 * key=value 的值始终是字符串；key:=<json> 按 JSON 字面量解析（数字、布尔、null、字符串）
 * @example parseDataPairs(['host=db1', 'port:=5432']) // { host: 'db1', port: 5432 }
 */
export function parseDataPairs(pairs: readonly string[]): FailureData {
  const data: FailureData = {}
  for (const pair of pairs) {
    const index = pair.indexOf('=')
    const typed = index > 0 && pair[index - 1] === ':'
    const key = pair.slice(0, typed ? index - 1 : index)
    if (index <= 0 || key === '') {
      throw AppError.invalidInput(`Invalid data entry "${pair}"`, 'Use key=value or key:=<json>')
    }
    const raw = pair.slice(index + 1)
    data[key] = typed ? parseJsonValue(pair, raw) : raw
  }
  return data
}

export interface CheckerGroup {
  status: CheckerStatus
  checkers: Checker[]
}

/**
 * 按状态分组，组内最近变化的在前；空组不返回
 */
export function groupCheckersByStatus(checkers: readonly Checker[]): CheckerGroup[] {
  const changedAt = (checker: Checker) => checker.latestStatusChange ?? checker.createdAt
  return STATUS_ORDER.map(status => ({
    status,
    checkers: checkers
      .filter(checker => checker.status === status)
      .sort((a, b) => changedAt(b).localeCompare(changedAt(a))),
  })).filter(group => group.checkers.length > 0)
}

export interface CurrentFailure {
  checker: Checker
  failure: CheckerFailure
}

/**
 * FAILING checker 最近一次运行的 failure
 */
export function listCurrentFailures(store: CheckerStore): CurrentFailure[] {
  const current: CurrentFailure[] = []
  for (const checker of store.listCheckers({ status: 'FAILING' })) {
    const latest = store.getLatestRun(checker.id)
    if (!latest) continue
    for (const failure of store.listFailures(latest.id)) {
      current.push({ checker, failure })
    }
  }
  return current
}
