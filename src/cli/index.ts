#!/usr/bin/env node
/**
 * @entry checkwatch CLI 主入口
 *
 * 运行：
 *   checkwatch run <name>          - 运行一个 checker
 *   checkwatch run-all             - dry run 所有 checker
 *   checkwatch dispatch <cadence>  - 立即分发一个 cadence
 *
 * 守护进程：
 *   checkwatch start               - 启动调度（前台阻塞）
 *   checkwatch status              - 查看运行状态
 *
 * 运维：
 *   checkwatch list | ignore | unignore | assign | override
 */

import { Command } from 'commander'
import { registerRunCommands } from './commands/run.js'
import { registerDaemonCommands } from './commands/daemon.js'
import { registerListCommand } from './commands/list.js'
import { registerManageCommands } from './commands/manage.js'
import { registerInitCommand } from './commands/init.js'
import { printError } from '../shared/error.js'
import { setLogLevel } from '../shared/logger.js'
import { resetStore } from '../store/index.js'

const program = new Command()

program
  .name('checkwatch')
  .description('周期性健康检查：运行 checker，记录结果，状态变化时通知')
  .version('0.1.0')
  .option('-v, --verbose', '输出调试日志')
  .hook('preAction', thisCommand => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      setLogLevel('debug')
    }
  })
  .hook('postAction', (_thisCommand, actionCommand) => {
    // start 由信号处理关闭存储
    if (actionCommand.name() !== 'start') resetStore()
  })

registerRunCommands(program)
registerDaemonCommands(program)
registerListCommand(program)
registerManageCommands(program)
registerInitCommand(program)

program.parseAsync().catch(error => {
  printError(error)
  process.exit(1)
})
