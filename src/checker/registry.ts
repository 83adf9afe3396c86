/**
 * Checker 注册表
 *
 * 启动时显式构建，按引用传给 runner 和 dispatcher。
 * 重名时保留第一次注册，validate() 报告所有重名。
 */

import { z } from 'zod'
import { AppError } from '../shared/error.js'
import { ok, err, type Result } from '../shared/result.js'
import { createLogger } from '../shared/logger.js'
import {
  CADENCES,
  SEVERITIES,
  type Cadence,
  type CheckFunction,
  type RegisteredChecker,
} from '../types/checker.js'

const logger = createLogger('registry')

export const registerOptionsSchema = z.object({
  name: z
    .string()
    .regex(/^[A-Za-z0-9_.-]+$/, 'letters, digits, "_", "." and "-" only')
    .optional(),
  section: z.string().min(1).default('default'),
  description: z.string().default(''),
  tries: z.number().int().min(1).default(1),
  severity: z.enum(SEVERITIES).default('LOW'),
  cadence: z.enum(CADENCES).default('HOURLY'),
})

export type RegisterOptions = z.input<typeof registerOptionsSchema>

export interface CheckerRegistry {
  /** 名称默认取函数名 */
  register(check: CheckFunction, options?: RegisterOptions): RegisteredChecker
  get(name: string): RegisteredChecker | undefined
  list(): RegisteredChecker[]
  /** 某个 cadence 下未被禁用的 checker */
  forCadence(cadence: Cadence, disabled?: readonly string[]): RegisteredChecker[]
  duplicates(): string[]
  validate(): Result<void, AppError>
}

export function createCheckerRegistry(): CheckerRegistry {
  const checkers = new Map<string, RegisteredChecker>()
  const duplicateNames = new Set<string>()

  return {
    register(check, options = {}) {
      const parsed = registerOptionsSchema.safeParse(options)
      const name = (parsed.success ? parsed.data.name : options.name) ?? check.name
      if (!parsed.success) {
        throw AppError.checkerInvalid(name || '<anonymous>', parsed.error.issues[0]?.message ?? 'invalid options')
      }
      if (!name) {
        throw AppError.checkerInvalid('<anonymous>', 'pass a name for anonymous check functions')
      }

      const existing = checkers.get(name)
      if (existing) {
        logger.warn(`Checker "${name}" registered more than once, keeping the first`)
        duplicateNames.add(name)
        return existing
      }

      const registered: RegisteredChecker = { ...parsed.data, name, check }
      checkers.set(name, registered)
      logger.debug(`Registered ${name} (${registered.cadence}, ${registered.severity})`)
      return registered
    },

    get(name) {
      return checkers.get(name)
    },

    list() {
      return [...checkers.values()]
    },

    forCadence(cadence, disabled = []) {
      return [...checkers.values()].filter(
        checker => checker.cadence === cadence && !disabled.includes(checker.name)
      )
    },

    duplicates() {
      return [...duplicateNames]
    },

    validate() {
      if (duplicateNames.size > 0) return err(AppError.checkerDuplicate([...duplicateNames]))
      return ok(undefined)
    },
  }
}
