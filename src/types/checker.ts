export const CHECKER_STATUSES = ['NEW', 'IGNORED', 'SUCCEEDING', 'FAILING', 'ERRORED'] as const
export type CheckerStatus = (typeof CHECKER_STATUSES)[number]

export const RUN_STATUSES = ['IN_PROGRESS', 'SUCCEEDED', 'FAILED', 'ERRORED'] as const
export type RunStatus = (typeof RUN_STATUSES)[number]
/** Run statuses a finished run can carry */
export type FinalRunStatus = Exclude<RunStatus, 'IN_PROGRESS'>

export const SEVERITIES = ['LOW', 'HIGH'] as const
export type Severity = (typeof SEVERITIES)[number]

export const CADENCES = ['EVERY_TEN_MINUTES', 'HOURLY', 'DAILY'] as const
export type Cadence = (typeof CADENCES)[number]

/** Flat key/value payload attached to failures and overrides */
export type FailureData = Record<string, string | number | boolean | null>

/** A failure record as yielded by a check function */
export interface CheckerFailureInput {
  text: string
  subtext?: string
  data?: FailureData | null
}

export type FailureStream = Iterable<CheckerFailureInput> | AsyncIterable<CheckerFailureInput>

export type CheckOutcome = { kind: 'success' } | { kind: 'failures'; failures: FailureStream }

/**
 * What a check may hand back. Returning nothing counts as success;
 * a bare iterable of failures is shorthand for `{ kind: 'failures' }`.
 */
export type CheckResult = void | CheckOutcome | FailureStream

export type CheckFunction = () => CheckResult | Promise<CheckResult>

export interface RegisteredChecker {
  name: string
  section: string
  description: string
  tries: number
  severity: Severity
  cadence: Cadence
  check: CheckFunction
}

export interface Checker {
  id: number
  name: string
  section: string
  description: string
  severity: Severity
  cadence: Cadence
  status: CheckerStatus
  /** Email of the operator responsible for the checker */
  owner: string | null
  latestRunDate: string | null
  latestStatusChange: string | null
  createdAt: string
}

export interface RunData {
  exception?: string
}

export interface CheckerRun {
  id: number
  checkerId: number
  status: RunStatus
  creationDate: string
  completionDate: string | null
  data: RunData | null
}

export interface CheckerFailure {
  id: number
  runId: number
  text: string
  subtext: string
  data: FailureData | null
}

export interface CheckerOverride {
  id: number
  checkerId: number | null
  applyToAllCheckers: boolean
  data: FailureData
  note: string
  owner: string | null
  createdAt: string
}

export interface StatusTransition {
  id: number
  checkerId: number
  oldStatus: CheckerStatus
  newStatus: CheckerStatus
  changedAt: string
}
