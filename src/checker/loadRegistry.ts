/**
 * 从配置的模块构建注册表
 *
 * 模块需导出 registerCheckers(registry)，可以是 async；重名视为加载失败
 */

import { isAbsolute, resolve } from 'path'
import { pathToFileURL } from 'url'
import { AppError } from '../shared/error.js'
import { ok, err, type Result } from '../shared/result.js'
import { createLogger } from '../shared/logger.js'
import { createCheckerRegistry, type CheckerRegistry } from './registry.js'

const logger = createLogger('registry')

export async function loadCheckerRegistry(
  modulePath: string,
  cwd: string = process.cwd()
): Promise<Result<CheckerRegistry, AppError>> {
  const absolutePath = isAbsolute(modulePath) ? modulePath : resolve(cwd, modulePath)

  let mod: unknown
  try {
    mod = await import(pathToFileURL(absolutePath).href)
  } catch (error) {
    return err(AppError.registryLoadFailed(modulePath, error))
  }

  const registerCheckers =
    typeof mod === 'object' && mod !== null && 'registerCheckers' in mod ? mod.registerCheckers : undefined
  if (typeof registerCheckers !== 'function') {
    return err(AppError.registryLoadFailed(modulePath, new Error('registerCheckers is not exported')))
  }

  const registry = createCheckerRegistry()
  try {
    await registerCheckers(registry)
  } catch (error) {
    return err(error instanceof AppError ? error : AppError.registryLoadFailed(modulePath, error))
  }

  const validated = registry.validate()
  if (!validated.ok) return err(validated.error)

  logger.debug(`Loaded ${registry.list().length} checker(s) from ${modulePath}`)
  return ok(registry)
}
