/**
 * CLI Spinner 封装
 */

import ora, { type Ora } from 'ora'

export interface Spinner {
  start(text?: string): void
  succeed(text?: string): void
  fail(text?: string): void
}

let activeSpinner: Ora | null = null

export function createSpinner(text?: string): Spinner {
  const spinner = ora({
    text,
    spinner: 'dots',
  })

  return {
    start(newText?: string) {
      if (activeSpinner) {
        activeSpinner.stop()
      }
      if (newText) spinner.text = newText
      activeSpinner = spinner.start()
    },
    succeed(newText?: string) {
      spinner.succeed(newText)
      activeSpinner = null
    },
    fail(newText?: string) {
      spinner.fail(newText)
      activeSpinner = null
    },
  }
}

export async function withSpinner<T>(
  text: string,
  task: () => Promise<T>,
  options?: {
    successText?: string | ((result: T) => string)
  }
): Promise<T> {
  const spinner = createSpinner(text)
  spinner.start()

  try {
    const result = await task()
    const successText =
      typeof options?.successText === 'function'
        ? options.successText(result)
        : options?.successText
    spinner.succeed(successText)
    return result
  } catch (e) {
    spinner.fail(e instanceof Error ? e.message : String(e))
    throw e
  }
}
