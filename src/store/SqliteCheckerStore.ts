/**
 * SQLite 实现的 CheckerStore
 *
 * 行数据读出时用 zod 校验，列名 snake_case，实体字段 camelCase。
 */

import Database from 'better-sqlite3'
import { dirname } from 'path'
import { z } from 'zod'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { now } from '../shared/formatTime.js'
import { ensureDir } from './readWriteJson.js'
import {
  CADENCES,
  CHECKER_STATUSES,
  RUN_STATUSES,
  SEVERITIES,
  type Checker,
  type CheckerFailure,
  type CheckerFailureInput,
  type CheckerOverride,
  type CheckerRun,
  type StatusTransition,
} from '../types/checker.js'
import type {
  CheckerFilter,
  CheckerMetadata,
  CheckerStore,
  CheckerUpdate,
  OverrideInput,
  OverrideSet,
  RunCompletion,
  TransitionInput,
} from './types.js'

const logger = createLogger('store')

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS checkers (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT UNIQUE NOT NULL,
    section TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    severity TEXT NOT NULL DEFAULT 'LOW',
    cadence TEXT NOT NULL DEFAULT 'HOURLY',
    status TEXT NOT NULL DEFAULT 'NEW',
    owner TEXT,
    latest_run_date TEXT,
    latest_status_change TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS checker_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    checker_id INTEGER NOT NULL REFERENCES checkers(id) ON DELETE CASCADE,
    status TEXT NOT NULL,
    creation_date TEXT NOT NULL,
    completion_date TEXT,
    data TEXT
  );

  CREATE TABLE IF NOT EXISTS checker_failures (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id INTEGER NOT NULL REFERENCES checker_runs(id) ON DELETE CASCADE,
    text TEXT NOT NULL,
    subtext TEXT NOT NULL DEFAULT '',
    data TEXT
  );

  CREATE TABLE IF NOT EXISTS checker_overrides (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    checker_id INTEGER REFERENCES checkers(id) ON DELETE CASCADE,
    apply_to_all_checkers INTEGER NOT NULL DEFAULT 0,
    data TEXT NOT NULL,
    note TEXT NOT NULL DEFAULT '',
    owner TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS checker_status_transitions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    checker_id INTEGER NOT NULL REFERENCES checkers(id) ON DELETE CASCADE,
    old_status TEXT NOT NULL,
    new_status TEXT NOT NULL,
    changed_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_runs_checker ON checker_runs(checker_id);
  CREATE INDEX IF NOT EXISTS idx_failures_run ON checker_failures(run_id);
  CREATE INDEX IF NOT EXISTS idx_overrides_checker ON checker_overrides(checker_id);
  CREATE INDEX IF NOT EXISTS idx_transitions_checker ON checker_status_transitions(checker_id);
`

// ============ 行校验 ============

const failureDataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
const runDataSchema = z.object({ exception: z.string().optional() })

function parseJsonColumn<T>(value: string | null, schema: z.ZodType<T>): T | null {
  if (value === null) return null
  const parsed: unknown = JSON.parse(value)
  return schema.parse(parsed)
}

const checkerRow = z
  .object({
    id: z.number(),
    name: z.string(),
    section: z.string(),
    description: z.string(),
    severity: z.enum(SEVERITIES),
    cadence: z.enum(CADENCES),
    status: z.enum(CHECKER_STATUSES),
    owner: z.string().nullable(),
    latest_run_date: z.string().nullable(),
    latest_status_change: z.string().nullable(),
    created_at: z.string(),
  })
  .transform(
    (row): Checker => ({
      id: row.id,
      name: row.name,
      section: row.section,
      description: row.description,
      severity: row.severity,
      cadence: row.cadence,
      status: row.status,
      owner: row.owner,
      latestRunDate: row.latest_run_date,
      latestStatusChange: row.latest_status_change,
      createdAt: row.created_at,
    })
  )

const runRow = z
  .object({
    id: z.number(),
    checker_id: z.number(),
    status: z.enum(RUN_STATUSES),
    creation_date: z.string(),
    completion_date: z.string().nullable(),
    data: z.string().nullable(),
  })
  .transform(
    (row): CheckerRun => ({
      id: row.id,
      checkerId: row.checker_id,
      status: row.status,
      creationDate: row.creation_date,
      completionDate: row.completion_date,
      data: parseJsonColumn(row.data, runDataSchema),
    })
  )

const failureRow = z
  .object({
    id: z.number(),
    run_id: z.number(),
    text: z.string(),
    subtext: z.string(),
    data: z.string().nullable(),
  })
  .transform(
    (row): CheckerFailure => ({
      id: row.id,
      runId: row.run_id,
      text: row.text,
      subtext: row.subtext,
      data: parseJsonColumn(row.data, failureDataSchema),
    })
  )

const overrideRow = z
  .object({
    id: z.number(),
    checker_id: z.number().nullable(),
    apply_to_all_checkers: z.number(),
    data: z.string(),
    note: z.string(),
    owner: z.string().nullable(),
    created_at: z.string(),
  })
  .transform(
    (row): CheckerOverride => ({
      id: row.id,
      checkerId: row.checker_id,
      applyToAllCheckers: row.apply_to_all_checkers === 1,
      data: parseJsonColumn(row.data, failureDataSchema) ?? {},
      note: row.note,
      owner: row.owner,
      createdAt: row.created_at,
    })
  )

const transitionRow = z
  .object({
    id: z.number(),
    checker_id: z.number(),
    old_status: z.enum(CHECKER_STATUSES),
    new_status: z.enum(CHECKER_STATUSES),
    changed_at: z.string(),
  })
  .transform(
    (row): StatusTransition => ({
      id: row.id,
      checkerId: row.checker_id,
      oldStatus: row.old_status,
      newStatus: row.new_status,
      changedAt: row.changed_at,
    })
  )

// CheckerUpdate 字段 -> 列名
const UPDATE_COLUMNS = [
  ['section', 'section'],
  ['description', 'description'],
  ['severity', 'severity'],
  ['cadence', 'cadence'],
  ['status', 'status'],
  ['owner', 'owner'],
  ['latestRunDate', 'latest_run_date'],
  ['latestStatusChange', 'latest_status_change'],
] as const satisfies ReadonlyArray<readonly [keyof CheckerUpdate, string]>

function hasData(data: CheckerFailureInput['data']): boolean {
  return data != null && Object.keys(data).length > 0
}

export class SqliteCheckerStore implements CheckerStore {
  private readonly db: Database.Database

  /**
   * @param filename - 数据库文件路径，测试传 ':memory:'
   */
  constructor(filename: string) {
    if (filename !== ':memory:') ensureDir(dirname(filename))
    this.db = new Database(filename)
    this.db.pragma('journal_mode = WAL')
    this.db.pragma('foreign_keys = ON')
    this.db.exec(SCHEMA)
    logger.debug(`Database initialized: ${filename}`)
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)()
  }

  // ============ Checker ============

  getOrCreateChecker(metadata: CheckerMetadata): { checker: Checker; created: boolean } {
    const existing = this.getCheckerByName(metadata.name)
    if (existing) return { checker: existing, created: false }

    const info = this.db
      .prepare(
        `INSERT INTO checkers (name, section, description, severity, cadence, status, created_at)
         VALUES (?, ?, ?, ?, ?, 'NEW', ?)`
      )
      .run(
        metadata.name,
        metadata.section,
        metadata.description,
        metadata.severity,
        metadata.cadence,
        now()
      )
    logger.debug(`Created checker ${metadata.name}`)
    return { checker: this.requireChecker(Number(info.lastInsertRowid)), created: true }
  }

  getChecker(id: number): Checker | null {
    const row = this.db.prepare('SELECT * FROM checkers WHERE id = ?').get(id)
    return row ? checkerRow.parse(row) : null
  }

  getCheckerByName(name: string): Checker | null {
    const row = this.db.prepare('SELECT * FROM checkers WHERE name = ?').get(name)
    return row ? checkerRow.parse(row) : null
  }

  listCheckers(filter: CheckerFilter = {}): Checker[] {
    const clauses: string[] = []
    const params: string[] = []
    if (filter.status) {
      clauses.push('status = ?')
      params.push(filter.status)
    }
    if (filter.cadence) {
      clauses.push('cadence = ?')
      params.push(filter.cadence)
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : ''
    const rows = this.db.prepare(`SELECT * FROM checkers ${where} ORDER BY name`).all(...params)
    return rows.map(row => checkerRow.parse(row))
  }

  updateChecker(id: number, updates: CheckerUpdate): Checker {
    const sets: string[] = []
    const params: (string | null)[] = []
    for (const [key, column] of UPDATE_COLUMNS) {
      const value = updates[key]
      if (value !== undefined) {
        sets.push(`${column} = ?`)
        params.push(value)
      }
    }
    if (sets.length > 0) {
      this.db.prepare(`UPDATE checkers SET ${sets.join(', ')} WHERE id = ?`).run(...params, id)
    }
    return this.requireChecker(id)
  }

  private requireChecker(id: number): Checker {
    const checker = this.getChecker(id)
    if (!checker) throw AppError.storeNotFound('Checker', id)
    return checker
  }

  // ============ Run ============

  createRun(checkerId: number, creationDate: string): CheckerRun {
    const info = this.db
      .prepare(
        `INSERT INTO checker_runs (checker_id, status, creation_date) VALUES (?, 'IN_PROGRESS', ?)`
      )
      .run(checkerId, creationDate)
    return this.requireRun(Number(info.lastInsertRowid))
  }

  finalizeRun(runId: number, completion: RunCompletion): CheckerRun {
    this.db
      .prepare('UPDATE checker_runs SET status = ?, completion_date = ?, data = ? WHERE id = ?')
      .run(
        completion.status,
        completion.completionDate,
        completion.data ? JSON.stringify(completion.data) : null,
        runId
      )
    return this.requireRun(runId)
  }

  getRun(runId: number): CheckerRun | null {
    const row = this.db.prepare('SELECT * FROM checker_runs WHERE id = ?').get(runId)
    return row ? runRow.parse(row) : null
  }

  getLatestRun(checkerId: number, options: { excludeRunId?: number } = {}): CheckerRun | null {
    const row =
      options.excludeRunId === undefined
        ? this.db
            .prepare('SELECT * FROM checker_runs WHERE checker_id = ? ORDER BY id DESC LIMIT 1')
            .get(checkerId)
        : this.db
            .prepare(
              'SELECT * FROM checker_runs WHERE checker_id = ? AND id != ? ORDER BY id DESC LIMIT 1'
            )
            .get(checkerId, options.excludeRunId)
    return row ? runRow.parse(row) : null
  }

  listRuns(checkerId: number, limit: number = 20): CheckerRun[] {
    const rows = this.db
      .prepare('SELECT * FROM checker_runs WHERE checker_id = ? ORDER BY id DESC LIMIT ?')
      .all(checkerId, limit)
    return rows.map(row => runRow.parse(row))
  }

  private requireRun(id: number): CheckerRun {
    const run = this.getRun(id)
    if (!run) throw AppError.storeNotFound('CheckerRun', id)
    return run
  }

  // ============ Failure ============

  createFailures(runId: number, failures: CheckerFailureInput[]): CheckerFailure[] {
    const insert = this.db.prepare(
      'INSERT INTO checker_failures (run_id, text, subtext, data) VALUES (?, ?, ?, ?)'
    )
    this.transaction(() => {
      for (const failure of failures) {
        insert.run(
          runId,
          failure.text,
          failure.subtext ?? '',
          hasData(failure.data) ? JSON.stringify(failure.data) : null
        )
      }
    })
    return this.listFailures(runId)
  }

  listFailures(runId: number): CheckerFailure[] {
    const rows = this.db
      .prepare('SELECT * FROM checker_failures WHERE run_id = ? ORDER BY id')
      .all(runId)
    return rows.map(row => failureRow.parse(row))
  }

  // ============ Override ============

  getOverrides(checkerId: number): OverrideSet {
    const scoped = this.db
      .prepare('SELECT * FROM checker_overrides WHERE checker_id = ? ORDER BY id')
      .all(checkerId)
    const global = this.db
      .prepare('SELECT * FROM checker_overrides WHERE apply_to_all_checkers = 1 ORDER BY id')
      .all()
    return {
      scoped: scoped.map(row => overrideRow.parse(row)),
      global: global.map(row => overrideRow.parse(row)),
    }
  }

  createOverride(input: OverrideInput): CheckerOverride {
    const info = this.db
      .prepare(
        `INSERT INTO checker_overrides (checker_id, apply_to_all_checkers, data, note, owner, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        input.checkerId,
        input.applyToAllCheckers ? 1 : 0,
        JSON.stringify(input.data),
        input.note ?? '',
        input.owner ?? null,
        now()
      )
    const row = this.db
      .prepare('SELECT * FROM checker_overrides WHERE id = ?')
      .get(Number(info.lastInsertRowid))
    if (!row) throw AppError.storeNotFound('CheckerOverride', Number(info.lastInsertRowid))
    return overrideRow.parse(row)
  }

  deleteOverride(id: number): boolean {
    const info = this.db.prepare('DELETE FROM checker_overrides WHERE id = ?').run(id)
    return info.changes > 0
  }

  listOverrides(): CheckerOverride[] {
    const rows = this.db.prepare('SELECT * FROM checker_overrides ORDER BY id').all()
    return rows.map(row => overrideRow.parse(row))
  }

  // ============ Transition ============

  appendTransition(input: TransitionInput): StatusTransition {
    const info = this.db
      .prepare(
        `INSERT INTO checker_status_transitions (checker_id, old_status, new_status, changed_at)
         VALUES (?, ?, ?, ?)`
      )
      .run(input.checkerId, input.oldStatus, input.newStatus, input.changedAt)
    return {
      id: Number(info.lastInsertRowid),
      checkerId: input.checkerId,
      oldStatus: input.oldStatus,
      newStatus: input.newStatus,
      changedAt: input.changedAt,
    }
  }

  listTransitions(checkerId: number): StatusTransition[] {
    const rows = this.db
      .prepare('SELECT * FROM checker_status_transitions WHERE checker_id = ? ORDER BY id')
      .all(checkerId)
    return rows.map(row => transitionRow.parse(row))
  }

  close(): void {
    this.db.close()
  }
}
