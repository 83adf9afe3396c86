/**
 * Error type guards and message extraction utilities.
 */

/** Type guard for Error instances */
export function isError(value: unknown): value is Error {
  return value instanceof Error
}

/** Safely extract error message from unknown thrown value */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}

/**
 * Full trace text for a thrown value. Falls back to `Name: message`
 * when the value carries no stack.
 */
export function getErrorTrace(error: unknown): string {
  if (isError(error)) return error.stack ?? `${error.name}: ${error.message}`
  return getErrorMessage(error)
}
