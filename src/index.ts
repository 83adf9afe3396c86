/**
 * @entry checkwatch 公共 API
 *
 * checker 模块导出 registerCheckers(registry)，在其中注册检查函数：
 *
 * @example
 * import { failures, type CheckerRegistry } from 'checkwatch'
 *
 * export function registerCheckers(registry: CheckerRegistry) {
 *   registry.register(function disk_space() {
 *     return failures([{ text: '/var at 97%', data: { mount: '/var' } }])
 *   }, { severity: 'HIGH', cadence: 'HOURLY' })
 * }
 */

export {
  createCheckerRegistry,
  success,
  failures,
  MAX_FAILURES,
  runChecker,
  loadCheckerRegistry,
  previewAllCheckers,
  type CheckerRegistry,
  type RegisterOptions,
  type RunCheckerDeps,
  type RunOutcome,
} from './checker/index.js'
export { SqliteCheckerStore, type CheckerStore } from './store/index.js'
export { createOutboxTransport, type NotificationTransport } from './notify/index.js'
export { loadConfig, type Config } from './config/index.js'
export { createDispatcher, type Dispatcher } from './scheduler/index.js'
export { AppError, type Result } from './shared/index.js'
export * from './types/index.js'
