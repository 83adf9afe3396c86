/**
 * CLI: run / run-all / dispatch
 *
 * 被检查系统的健康状况不影响退出码；只有未注册的 checker、配置错误等才以非 0 退出
 */

import { Command } from 'commander'
import chalk from 'chalk'
import { z } from 'zod'
import {
  runChecker,
  type DryRunOutcome,
  type PersistedRunOutcome,
  type RunOutcome,
} from '../../checker/runChecker.js'
import { previewAllCheckers, type PreviewResult } from '../../checker/previewCheckers.js'
import { createDispatcher } from '../../scheduler/dispatchCadence.js'
import { withCheckerLock } from '../../scheduler/runLock.js'
import { AppError } from '../../shared/error.js'
import { formatDuration, parseInterval } from '../../shared/formatTime.js'
import type { Result } from '../../shared/result.js'
import { CADENCES, type Cadence } from '../../types/checker.js'
import { getRegisteredChecker, loadCliContext } from '../context.js'
import { createSpinner, withSpinner } from '../spinner.js'
import { header, info, list, warn } from '../output.js'

const cadenceSchema = z.enum(CADENCES)

function parseCadence(raw: string): Cadence {
  const parsed = cadenceSchema.safeParse(raw.toUpperCase())
  if (!parsed.success) {
    throw AppError.invalidInput(`Unknown cadence: ${raw}`, `Use one of ${CADENCES.join(', ')}`)
  }
  return parsed.data
}

const statusColors: Record<string, (s: string) => string> = {
  SUCCEEDED: chalk.green,
  FAILED: chalk.red,
  ERRORED: chalk.magenta,
  IN_PROGRESS: chalk.gray,
}

function colorStatus(status: string): string {
  return (statusColors[status] ?? chalk.white)(status)
}

function printDryRun(outcome: DryRunOutcome): void {
  header(`${outcome.checker.name} (dry run)`)
  list([
    { label: 'Status', value: colorStatus(outcome.status) },
    { label: 'Failures', value: outcome.failures.length },
  ])
  for (const failure of outcome.failures) {
    console.log(`  ${chalk.red('•')} ${failure.text}`)
    if (failure.subtext) console.log(chalk.dim(`    ${failure.subtext}`))
    if (failure.data) console.log(chalk.dim(`    ${JSON.stringify(failure.data)}`))
  }
  if (outcome.trace) {
    console.log()
    console.log(chalk.dim(outcome.trace))
  }
}

function printRun(outcome: PersistedRunOutcome): void {
  const { checker, run, transition } = outcome
  console.log(`Checker run ${run.id} completed.`)
  console.log(`Checker run ${run.id} status: ${colorStatus(run.status)}`)
  if (outcome.failures.length > 0) {
    console.log(chalk.dim(`  ${outcome.failures.length} failure(s) recorded`))
  }
  if (transition) {
    console.log(`  ${checker.name}: ${transition.oldStatus} → ${transition.newStatus}`)
    console.log(chalk.dim(`  ${outcome.notificationsSent} notification(s) sent`))
  } else if (checker.status === 'IGNORED') {
    console.log(chalk.dim(`  ${checker.name} is ignored, status unchanged`))
  }
}

function settledStatus(result: Result<RunOutcome, Error>): string {
  if (!result.ok) return result.error instanceof AppError ? result.error.code : 'ERROR'
  return result.value.dryRun ? result.value.status : result.value.run.status
}

function previewLabel(result: PreviewResult): string {
  if (result.status === 'SUCCEEDED') return `${chalk.bold.green('SUCCESS')} ${result.name}`
  if (result.status === 'FAILED') return `${chalk.bold.red('FAILURE')} ${result.name} (${result.failureCount})`
  return `${chalk.bold.magenta('ERROR')} ${result.name}`
}

export function registerRunCommands(program: Command) {
  program
    .command('run')
    .description('运行 checker，记录结果并在状态变化时通知')
    .argument('[name]', 'checker 名')
    .option('--dry-run', '只运行检查：不写运行记录、不改状态、不通知')
    .option('--failing', '重新运行所有 FAILING 的 checker')
    .action(async (name: string | undefined, options: { dryRun?: boolean; failing?: boolean }) => {
      const ctx = await loadCliContext()

      let names: string[]
      if (options.failing) {
        names = ctx.store.listCheckers({ status: 'FAILING' }).map(checker => checker.name)
        if (names.length === 0) {
          info('No failing checkers')
          return
        }
      } else if (name) {
        names = [name]
      } else {
        throw AppError.invalidInput('Missing checker name', 'checkwatch run <name> or checkwatch run --failing')
      }

      for (const checkerName of names) {
        if (options.failing && !ctx.registry.get(checkerName)) {
          warn(`${checkerName} is no longer registered, skipped`)
          continue
        }
        const registered = getRegisteredChecker(ctx.registry, checkerName)
        console.log(`Running ${checkerName}.`)

        if (options.dryRun) {
          printDryRun(await runChecker(registered, { store: ctx.store }, { dryRun: true }))
          continue
        }

        const outcome = await withCheckerLock(checkerName, () => runChecker(registered, ctx))
        if (!outcome.dryRun) printRun(outcome)
      }
    })

  program
    .command('run-all')
    .description('dry run 所有启用的 checker 并汇总结果')
    .action(async () => {
      const ctx = await loadCliContext()
      const { disabled } = ctx.config.checkers
      for (const name of disabled) {
        if (ctx.registry.get(name)) console.log(`${chalk.bold.yellow('SKIPPED')} ${name}`)
      }

      const spinner = createSpinner()
      const results = await previewAllCheckers(ctx.registry, ctx, {
        disabled,
        onStart: checker => spinner.start(`Running ${checker.name}`),
        onResult: result =>
          result.status === 'SUCCEEDED' ? spinner.succeed(previewLabel(result)) : spinner.fail(previewLabel(result)),
      })

      const failing = results.filter(result => result.status !== 'SUCCEEDED').length
      console.log()
      console.log(chalk.gray(`${results.length} checker(s), ${failing} not succeeding`))
    })

  program
    .command('dispatch')
    .description('立即分发一个 cadence 的所有 checker 并等待完成')
    .argument('<cadence>', CADENCES.join(' | '))
    .action(async (raw: string) => {
      const cadence = parseCadence(raw)
      const ctx = await loadCliContext()
      const startedAt = Date.now()
      const settled: Array<{ name: string; status: string }> = []

      const dispatcher = createDispatcher({
        registry: ctx.registry,
        run: { store: ctx.store, escalator: ctx.escalator },
        concurrency: ctx.config.queues,
        runTimeoutMs: parseInterval(ctx.config.schedule.runTimeout),
        getSettings: async () => ({
          killSwitch: ctx.config.checkers.killSwitch,
          disabled: ctx.config.checkers.disabled,
        }),
        onSettled: (name, result) => settled.push({ name, status: settledStatus(result) }),
      })

      try {
        const result = await withSpinner(
          `Dispatching ${cadence}`,
          async () => {
            const dispatched = await dispatcher.dispatch(cadence)
            await dispatcher.whenIdle()
            return dispatched
          },
          {
            successText: dispatched =>
              dispatched.killSwitch
                ? 'Checkers are disabled (kill switch), nothing dispatched'
                : `Ran ${dispatched.enqueued.length} ${cadence} checker(s) in ${formatDuration(Date.now() - startedAt)}`,
          }
        )
        if (result.killSwitch) return
        for (const { name, status } of settled) {
          console.log(`  ${colorStatus(status)} ${name}`)
        }
      } finally {
        await dispatcher.stop()
      }
    })
}
