/**
 * CLI: list，checker 按状态分组展示
 */

import { Command } from 'commander'
import chalk from 'chalk'
import { table } from 'table'
import { groupCheckersByStatus, listCurrentFailures } from '../../checker/manageCheckers.js'
import { getStore } from '../../store/index.js'
import { formatRelative } from '../../shared/formatTime.js'
import type { Checker, CheckerStatus } from '../../types/checker.js'
import { header, info } from '../output.js'

const statusColors: Record<CheckerStatus, (s: string) => string> = {
  FAILING: chalk.red,
  ERRORED: chalk.magenta,
  IGNORED: chalk.gray,
  SUCCEEDING: chalk.green,
  NEW: chalk.cyan,
}

const severityColors: Record<Checker['severity'], (s: string) => string> = {
  HIGH: chalk.red,
  LOW: chalk.white,
}

function renderGroup(checkers: Checker[]): string {
  const data: string[][] = [['Name', 'Section', 'Severity', 'Cadence', 'Owner', 'Since']]
  for (const checker of checkers) {
    data.push([
      checker.name,
      checker.section,
      severityColors[checker.severity](checker.severity),
      checker.cadence,
      checker.owner ?? '-',
      formatRelative(checker.latestStatusChange ?? checker.createdAt),
    ])
  }
  return table(data)
}

export function registerListCommand(program: Command) {
  program
    .command('list')
    .alias('ls')
    .description('按状态列出 checker')
    .option('--failures', '同时列出 FAILING checker 的当前 failure')
    .option('--json', '以 JSON 格式输出')
    .action((options: { failures?: boolean; json?: boolean }) => {
      const store = getStore()
      const groups = groupCheckersByStatus(store.listCheckers())

      if (options.json) {
        console.log(JSON.stringify(groups, null, 2))
        return
      }

      if (groups.length === 0) {
        info('No checkers have run yet')
        return
      }

      for (const group of groups) {
        header(`${statusColors[group.status](group.status)} (${group.checkers.length})`)
        console.log(renderGroup(group.checkers))
      }

      if (options.failures) {
        const current = listCurrentFailures(store)
        header(`Current failures (${current.length})`)
        for (const { checker, failure } of current) {
          console.log(`  ${chalk.red('•')} ${chalk.bold(checker.name)}: ${failure.text}`)
          if (failure.subtext) console.log(chalk.dim(`    ${failure.subtext}`))
        }
      }
    })
}
