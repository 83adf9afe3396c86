/**
 * Daemon cron job definitions
 *
 * - EVERY_TEN_MINUTES: every 10 minutes
 * - HOURLY: on the hour
 * - DAILY: once a day at schedule.dailyAt
 */

import cron from 'node-cron'
import { CADENCES, type Cadence } from '../types/checker.js'
import { dailyAtToCron } from '../shared/formatTime.js'
import { createLogger, logError } from '../shared/logger.js'
import type { Dispatcher } from './dispatchCadence.js'

const logger = createLogger('cadence-jobs')

let scheduledJobs: cron.ScheduledTask[] = []

export function cadenceCronExpressions(dailyAt: string): Record<Cadence, string> {
  return {
    EVERY_TEN_MINUTES: '*/10 * * * *',
    HOURLY: '0 * * * *',
    DAILY: dailyAtToCron(dailyAt),
  }
}

/** Register one cron job per cadence */
export function registerCadenceJobs(dispatcher: Dispatcher, dailyAt: string): Record<Cadence, string> {
  const expressions = cadenceCronExpressions(dailyAt)

  for (const cadence of CADENCES) {
    const expression = expressions[cadence]
    const job = cron.schedule(expression, () => {
      dispatcher.dispatch(cadence).catch(error => logError(logger, 'Dispatch failed', error, { cadence }))
    })
    scheduledJobs.push(job)
    logger.debug(`Scheduled ${cadence}: ${expression}`)
  }

  return expressions
}

/** Stop all scheduled jobs */
export function stopAllJobs(): void {
  for (const job of scheduledJobs) {
    job.stop()
  }
  scheduledJobs = []
}
