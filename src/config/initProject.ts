import { writeFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import chalk from 'chalk'
import { CONFIG_FILENAME } from './loadConfig.js'

interface InitOptions {
  force?: boolean
}

const DEFAULT_CONFIG = `# checkwatch 配置文件

checkers:
  module: ./checkers.js     # 导出 registerCheckers(registry) 的模块
  killSwitch: false         # 为 true 时所有调度暂停
  disabled: []              # 单独禁用的 checker 名

schedule:
  dailyAt: "09:30"          # DAILY cadence 触发时间
  runTimeout: 1h            # 单次运行超时

queues:
  short: 2                  # EVERY_TEN_MINUTES 并发
  medium: 2                 # HOURLY 并发
  long: 1                   # DAILY 并发

notify:
  fromEmail: checkwatch@localhost
  adminEmails: []
  # pagingEmail: oncall@example.com
  siteUrl: http://localhost:8000
  alertChannel: "#alerts"
  webhooks: {}
`

/**
 * 初始化项目配置
 */
export async function initProject(options: InitOptions, cwd: string = process.cwd()): Promise<boolean> {
  const configPath = join(cwd, CONFIG_FILENAME)

  if (existsSync(configPath) && !options.force) {
    console.log(chalk.yellow(`${CONFIG_FILENAME} already exists, use --force to overwrite`))
    return false
  }

  await writeFile(configPath, DEFAULT_CONFIG)
  console.log(chalk.green(`✓ Created ${CONFIG_FILENAME}`))
  console.log('')
  console.log(chalk.bold('Next:'))
  console.log(chalk.gray('  1. Export registerCheckers(registry) from the checkers module'))
  console.log(chalk.gray('  2. Preview every checker: checkwatch run-all'))
  console.log(chalk.gray('  3. Start the scheduler: checkwatch start'))
  return true
}
