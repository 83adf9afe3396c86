/**
 * @entry Config 配置模块
 *
 * 加载 YAML 配置、Schema 校验、项目初始化
 */

export {
  CONFIG_FILENAME,
  loadConfig,
  reloadConfig,
  getDefaultConfig,
  clearConfigCache,
  stopConfigWatch,
  applyEnvOverrides,
} from './loadConfig.js'
export { initProject } from './initProject.js'
export * from './schema.js'
