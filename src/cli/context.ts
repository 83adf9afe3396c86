/**
 * CLI 运行上下文：配置、注册表、存储、通知出口
 */

import { loadConfig, type Config } from '../config/index.js'
import { loadCheckerRegistry } from '../checker/loadRegistry.js'
import { createEscalator, type Escalator } from '../checker/escalateTransition.js'
import type { CheckerRegistry } from '../checker/registry.js'
import { createOutboxTransport } from '../notify/createOutboxTransport.js'
import { getStore, DEFAULT_OUTBOX_FILE, type CheckerStore } from '../store/index.js'
import { AppError } from '../shared/error.js'
import { unwrap } from '../shared/result.js'
import type { RegisteredChecker } from '../types/checker.js'

export interface CliContext {
  config: Config
  registry: CheckerRegistry
  store: CheckerStore
  escalator: Escalator
}

export function createEscalatorFromConfig(config: Config): Escalator {
  const { notify } = config
  const transport = createOutboxTransport({
    outboxFile: notify.outboxFile ?? DEFAULT_OUTBOX_FILE,
    fromEmail: notify.fromEmail,
    webhooks: notify.webhooks,
  })
  return createEscalator({
    transport,
    adminEmails: notify.adminEmails,
    pagingEmail: notify.pagingEmail,
    siteUrl: notify.siteUrl,
    alertChannel: notify.alertChannel,
  })
}

export async function loadCliContext(options: { watch?: boolean } = {}): Promise<CliContext> {
  const config = await loadConfig({ watch: options.watch })
  const registry = unwrap(await loadCheckerRegistry(config.checkers.module))
  return {
    config,
    registry,
    store: getStore(),
    escalator: createEscalatorFromConfig(config),
  }
}

export function getRegisteredChecker(registry: CheckerRegistry, name: string): RegisteredChecker {
  const checker = registry.get(name)
  if (!checker) throw AppError.checkerNotRegistered(name)
  return checker
}
