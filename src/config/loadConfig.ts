import { readFile } from 'fs/promises'
import { existsSync, watch, type FSWatcher } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import type { ZodError } from 'zod'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { AppError } from '../shared/error.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.checkwatch.yaml'

let cachedConfig: Config | null = null
let configWatcher: FSWatcher | null = null
let watchedPath: string | null = null
let reloadTimer: NodeJS.Timeout | null = null

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * 查找配置文件路径（全局 + 项目）
 * 全局配置为基底，项目配置覆盖其上
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // 项目目录与 home 目录相同时，不重复加载
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * 读取并合并全局 + 项目配置，两者都不存在时返回 null
 */
async function readConfigFiles(cwd?: string): Promise<Record<string, unknown> | null> {
  const { globalPath, projectPath } = findConfigPaths(cwd)
  if (!globalPath && !projectPath) return null

  const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
  const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
  return mergeConfig(globalRaw, projectRaw)
}

/**
 * 加载配置
 * 查找顺序：项目目录 → ~/.checkwatch.yaml → 默认配置
 * @param options.watch - 监听配置文件变化（daemon 模式开启，kill switch 修改后即时生效）
 */
export async function loadConfig(options: { cwd?: string; watch?: boolean } = {}): Promise<Config> {
  const { cwd, watch: enableWatch = false } = options

  if (!cachedConfig) {
    const raw = await readConfigFiles(cwd)
    cachedConfig = raw ? validateConfig(raw) : applyEnvOverrides(getDefaultConfig())
  }

  if (enableWatch && !configWatcher) {
    const { projectPath, globalPath } = findConfigPaths(cwd)
    const watchPath = projectPath ?? globalPath
    if (watchPath) startWatching(watchPath, cwd)
  }

  return cachedConfig
}

/**
 * 重新读取全局 + 项目配置
 * 校验失败时保留当前配置，避免 kill switch 等设置被默认值冲掉
 */
export async function reloadConfig(cwd?: string): Promise<Config> {
  const raw = (await readConfigFiles(cwd)) ?? {}
  const result = configSchema.safeParse(raw)
  if (!result.success) {
    if (cachedConfig) {
      logger.warn('Config file format error, keeping the previous config', result.error.issues)
      return cachedConfig
    }
    throw invalidConfig(result.error)
  }
  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

function invalidConfig(error: ZodError): AppError {
  const reasons = error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
  return AppError.configInvalid(reasons.join('; '))
}

/**
 * 校验失败直接报错，不静默退回默认配置
 */
function validateConfig(raw: Record<string, unknown>): Config {
  const result = configSchema.safeParse(raw)
  if (!result.success) throw invalidConfig(result.error)
  return applyEnvOverrides(result.data)
}

/**
 * Parse YAML file, returning empty object for empty/comment-only files
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  return isRecord(parsed) ? parsed : {}
}

/**
 * Project fields override global fields. Nested objects merge, arrays are replaced.
 */
function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue
    const current = result[key]
    result[key] = isRecord(val) && isRecord(current) ? mergeConfig(current, val) : val
  }
  return result
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean)
}

/**
 * Apply environment variable overrides to config.
 * Called after schema validation; env vars skip schema checks.
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env
  let checkers = config.checkers
  let notify = config.notify

  if (env.CHECKWATCH_DISABLE_CHECKERS) {
    checkers = { ...checkers, killSwitch: ['1', 'true', 'yes'].includes(env.CHECKWATCH_DISABLE_CHECKERS.toLowerCase()) }
  }
  if (env.CHECKWATCH_DISABLED_CHECKERS !== undefined) {
    checkers = { ...checkers, disabled: parseList(env.CHECKWATCH_DISABLED_CHECKERS) }
  }
  if (env.CHECKWATCH_PAGING_EMAIL) {
    notify = { ...notify, pagingEmail: env.CHECKWATCH_PAGING_EMAIL }
  }
  if (env.CHECKWATCH_ADMIN_EMAILS) {
    notify = { ...notify, adminEmails: parseList(env.CHECKWATCH_ADMIN_EMAILS) }
  }

  return { ...config, checkers, notify }
}

/**
 * 启动配置文件监听
 */
function startWatching(configPath: string, cwd?: string): void {
  if (configWatcher && watchedPath === configPath) return

  stopWatching()

  logger.info(`Watching config file: ${configPath}`)
  watchedPath = configPath

  configWatcher = watch(configPath, eventType => {
    if (eventType !== 'change') return

    // 防抖 500ms
    if (reloadTimer) clearTimeout(reloadTimer)
    reloadTimer = setTimeout(() => {
      logger.info('Config file changed, reloading...')
      reloadConfig(cwd)
        .then(() => logger.info('✓ Config reloaded'))
        .catch(error => {
          logger.error(`Failed to reload config: ${getErrorMessage(error)}`)
        })
    }, 500)
  })

  configWatcher.on('error', error => {
    logger.error(`Config watcher error: ${error.message}`)
  })
}

function stopWatching(): void {
  if (reloadTimer) {
    clearTimeout(reloadTimer)
    reloadTimer = null
  }
  if (configWatcher) {
    configWatcher.close()
    configWatcher = null
    watchedPath = null
    logger.debug('Config file watching stopped')
  }
}

export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

export function clearConfigCache(): void {
  cachedConfig = null
}

/**
 * 停止配置文件监听（用于进程退出时清理）
 */
export function stopConfigWatch(): void {
  stopWatching()
}
