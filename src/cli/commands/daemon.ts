import { Command } from 'commander'
import chalk from 'chalk'
import { startDaemon } from '../../scheduler/startDaemon.js'
import { DAEMON_LOCK, isLockHeld } from '../../scheduler/runLock.js'
import { formatRelative } from '../../shared/formatTime.js'
import { loadCliContext } from '../context.js'
import { info } from '../output.js'

export function registerDaemonCommands(program: Command) {
  program
    .command('start')
    .description('启动调度守护进程（前台阻塞，Ctrl+C 停止）')
    .action(async () => {
      const ctx = await loadCliContext({ watch: true })
      await startDaemon(ctx)
    })

  program
    .command('status')
    .description('查看守护进程状态')
    .action(() => {
      const { running, lock } = isLockHeld(DAEMON_LOCK)
      if (!running || !lock) {
        info('守护进程未运行')
        return
      }
      console.log(chalk.green(`✓ 守护进程运行中 (PID: ${lock.pid})`))
      console.log(chalk.gray(`  启动时间: ${lock.startedAt} (${formatRelative(lock.startedAt)})`))
      console.log(chalk.gray(`  工作目录: ${lock.cwd}`))
    })
}
