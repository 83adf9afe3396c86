/**
 * CLI: ignore / unignore / assign / override
 */

import { Command } from 'commander'
import chalk from 'chalk'
import { table } from 'table'
import {
  addOverride,
  assignOwner,
  ignoreChecker,
  parseDataPairs,
  removeOverride,
  unignoreChecker,
} from '../../checker/manageCheckers.js'
import { getStore } from '../../store/index.js'
import { AppError } from '../../shared/error.js'
import { info, success, warn } from '../output.js'

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

function parseOverrideId(raw: string): number {
  const id = Number(raw)
  if (!Number.isInteger(id) || id <= 0) {
    throw AppError.invalidInput(`Invalid override id: ${raw}`)
  }
  return id
}

interface OverrideAddOptions {
  all?: boolean
  data: string[]
  note?: string
  owner?: string
}

export function registerManageCommands(program: Command) {
  program
    .command('ignore')
    .description('忽略 checker：照常运行，但不改状态也不通知')
    .argument('<name>', 'checker 名')
    .action((name: string) => {
      ignoreChecker(getStore(), name)
      success(`Started ignoring ${name}`)
    })

  program
    .command('unignore')
    .description('取消忽略，状态重置为 NEW')
    .argument('<name>', 'checker 名')
    .action((name: string) => {
      const checker = unignoreChecker(getStore(), name)
      if (checker.status === 'NEW') {
        success(`Stopped ignoring ${name}`)
      } else {
        info(`${name} is not ignored (${checker.status})`)
      }
    })

  program
    .command('assign')
    .description('指定 checker 的负责人')
    .argument('<name>', 'checker 名')
    .argument('[email]', '负责人邮箱')
    .option('--clear', '清除负责人')
    .action((name: string, email: string | undefined, options: { clear?: boolean }) => {
      if (!email && !options.clear) {
        throw AppError.invalidInput('Missing owner email', 'checkwatch assign <name> <email> or --clear')
      }
      const checker = assignOwner(getStore(), name, options.clear ? null : email ?? null)
      success(checker.owner ? `${name} is owned by ${checker.owner}` : `Cleared the owner of ${name}`)
    })

  const override = program.command('override').description('管理 failure override')

  override
    .command('add')
    .description('添加 override：data 是 failure data 的子集时该 failure 被忽略')
    .argument('[checker]', 'checker 名（与 --all 二选一）')
    .option('--all', '作用于所有 checker')
    .option('-d, --data <key=value>', 'failure data 字段，可重复；值为字符串，key:=<json> 写数字/布尔/null', collect, [])
    .option('--note <text>', '备注')
    .option('--owner <email>', '负责人')
    .action((checker: string | undefined, options: OverrideAddOptions) => {
      const data = parseDataPairs(options.data)
      if (Object.keys(data).length === 0) {
        warn('An override without data hides every failure that carries data')
      }
      const created = addOverride(getStore(), {
        checker,
        all: options.all,
        data,
        note: options.note,
        owner: options.owner,
      })
      success(`Created override #${created.id}`)
    })

  override
    .command('remove')
    .alias('rm')
    .description('删除 override')
    .argument('<id>', 'override ID')
    .action((raw: string) => {
      const id = parseOverrideId(raw)
      removeOverride(getStore(), id)
      success(`Removed override #${id}`)
    })

  override
    .command('list')
    .alias('ls')
    .description('列出所有 override')
    .action(() => {
      const store = getStore()
      const overrides = store.listOverrides()
      if (overrides.length === 0) {
        info('No overrides')
        return
      }

      const data: string[][] = [['ID', 'Checker', 'Data', 'Note', 'Owner']]
      for (const item of overrides) {
        const target =
          item.applyToAllCheckers || item.checkerId === null
            ? chalk.yellow('*')
            : store.getChecker(item.checkerId)?.name ?? `#${item.checkerId}`
        data.push([String(item.id), target, JSON.stringify(item.data), item.note, item.owner ?? '-'])
      }
      console.log(table(data))
    })
}
