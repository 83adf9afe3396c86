/**
 * 守护进程启动
 *
 * 前台运行（阻塞），三个 cadence 各一个 cron 触发器，Ctrl+C 优雅退出
 */

import chalk from 'chalk'
import { loadConfig, stopConfigWatch } from '../config/loadConfig.js'
import type { CheckerRegistry } from '../checker/registry.js'
import type { Escalator } from '../checker/escalateTransition.js'
import type { CheckerStore } from '../store/types.js'
import { AppError } from '../shared/error.js'
import { parseInterval } from '../shared/formatTime.js'
import { createLogger, logError, setLogMode } from '../shared/logger.js'
import { CADENCES } from '../types/checker.js'
import { createDispatcher, type DispatchSettings } from './dispatchCadence.js'
import { registerCadenceJobs, stopAllJobs } from './cadenceJobs.js'
import { acquireLock, releaseLock, DAEMON_LOCK } from './runLock.js'

const logger = createLogger('daemon')

export interface DaemonDeps {
  registry: CheckerRegistry
  store: CheckerStore
  escalator: Escalator
}

async function readDispatchSettings(): Promise<DispatchSettings> {
  // 配置被监听，缓存在文件变化时刷新
  const config = await loadConfig()
  return { killSwitch: config.checkers.killSwitch, disabled: config.checkers.disabled }
}

export async function startDaemon(deps: DaemonDeps): Promise<void> {
  const lockResult = acquireLock(DAEMON_LOCK)
  if (!lockResult.success) {
    const lock = lockResult.existingLock
    console.error(chalk.yellow(`  启动时间: ${lock.startedAt}`))
    console.error(chalk.yellow(`  工作目录: ${lock.cwd}`))
    throw AppError.daemonAlreadyRunning(lock.pid)
  }

  // daemon 日志带 scope 和完整时间戳
  setLogMode('background')
  const config = await loadConfig({ watch: true })

  const dispatcher = createDispatcher({
    registry: deps.registry,
    run: { store: deps.store, escalator: deps.escalator },
    concurrency: config.queues,
    runTimeoutMs: parseInterval(config.schedule.runTimeout),
    getSettings: readDispatchSettings,
  })
  const expressions = registerCadenceJobs(dispatcher, config.schedule.dailyAt)

  console.log(chalk.green('启动守护进程...'))
  for (const cadence of CADENCES) {
    const count = deps.registry.forCadence(cadence, config.checkers.disabled).length
    console.log(chalk.gray(`  ${cadence.padEnd(18)} ${expressions[cadence].padEnd(14)} ${count} checker(s)`))
  }
  if (config.checkers.killSwitch) {
    console.log(chalk.yellow('  ⚠ kill switch 已开启，触发时不会运行任何 checker'))
  }
  console.log(chalk.green(`✓ 守护进程运行中 (PID: ${process.pid})`))
  console.log(chalk.gray('  Ctrl+C 停止'))

  let stopping = false
  const cleanup = async (exitCode: number) => {
    if (stopping) return
    stopping = true
    console.log(chalk.yellow('\n停止守护进程...'))
    stopAllJobs()
    stopConfigWatch()
    await dispatcher.stop()
    deps.store.close()
    releaseLock(DAEMON_LOCK)
    process.exit(exitCode)
  }

  const onSignal = () => {
    cleanup(0).catch(error => {
      logError(logger, 'Shutdown failed', error)
      releaseLock(DAEMON_LOCK)
      process.exit(1)
    })
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  process.on('unhandledRejection', reason => {
    logError(logger, 'Unhandled rejection', reason)
  })
}
