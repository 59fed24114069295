/**
 * Library entry point.
 *
 * @example
 * ```ts
 * import { buildOrchestrator, loadConfig, resolveConfigPath, logger } from '@pricehound/aggregator'
 *
 * const orchestrator = buildOrchestrator(loadConfig(resolveConfigPath()), { logger })
 * const deals = await orchestrator.bestDeals('usb c hub', 3)
 * ```
 */

export * from './scraper/index.js'
export { buildOrchestrator, type BuildOrchestratorOptions } from './bootstrap.js'
export {
  loadConfig,
  parseConfig,
  resolveConfigPath,
  getEnabledSites,
  configFileSchema,
  DEFAULT_CONFIG_PATH,
  CONFIG_PATH_ENV,
  type ConfigFile,
} from './config/settings.js'
export { logger, loggers } from './config/logger.js'
