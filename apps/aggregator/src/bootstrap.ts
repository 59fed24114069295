/**
 * Wires configuration, adapters and the orchestrator together.
 */

import type { ILogger } from '@pricehound/logger'
import type { AppConfig, Fetcher, RateLimiter } from './scraper/types.js'
import { createSiteAdapters } from './scraper/adapters/index.js'
import { ScrapeOrchestrator } from './scraper/orchestrator.js'
import { createMonotonicClock } from './scraper/utils/clock.js'

export interface BuildOrchestratorOptions {
  logger: ILogger

  /** Transport override (for testing) */
  fetcherFactory?: (siteId: string, rateLimiter: RateLimiter) => Fetcher

  /** Wall clock override (for testing) */
  now?: () => number
}

/**
 * Build an orchestrator over every enabled site in `config`.
 * @throws ConfigurationError when no enabled site has an adapter
 */
export function buildOrchestrator(config: AppConfig, options: BuildOrchestratorOptions): ScrapeOrchestrator {
  const adapters = createSiteAdapters(config, {
    logger: options.logger,
    clock: createMonotonicClock(options.now),
    fetcherFactory: options.fetcherFactory,
  })

  return new ScrapeOrchestrator({
    adapters,
    maxConcurrency: config.scraper.maxConcurrency,
    logger: options.logger,
  })
}
