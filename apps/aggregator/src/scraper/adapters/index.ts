/**
 * Adapter Construction
 *
 * Builds one adapter per enabled site in the configuration. Adapters are
 * listed explicitly here; there is no auto-discovery.
 *
 * Each adapter gets its own rate limiter, fetcher and extractor so that one
 * site's backlog never delays another.
 */

import type { ILogger } from '@pricehound/logger'
import type { AppConfig, Fetcher, RateLimiter, SiteAdapter } from '../types.js'
import { HttpFetcher } from '../fetch/http-fetcher.js'
import { CheerioPageExtractor } from '../fetch/page-extractor.js'
import { MinIntervalRateLimiter } from '../fetch/rate-limiter.js'
import { createSiteAdapter, type SiteDefinition } from './site-adapter.js'
import { ebayDefinition } from './ebay/adapter.js'
import { walmartDefinition } from './walmart/adapter.js'
import { targetDefinition } from './target/adapter.js'
import { aliexpressDefinition } from './aliexpress/adapter.js'

/** Every site this build knows how to scrape, keyed by site id */
export const SITE_DEFINITIONS: Readonly<Record<string, SiteDefinition>> = Object.freeze({
  [ebayDefinition.id]: ebayDefinition,
  [walmartDefinition.id]: walmartDefinition,
  [targetDefinition.id]: targetDefinition,
  [aliexpressDefinition.id]: aliexpressDefinition,
})

export interface CreateSiteAdaptersOptions {
  logger: ILogger

  /** Shared capture-time source */
  clock: () => string

  /** Transport override (for testing); receives the site's own rate limiter */
  fetcherFactory?: (siteId: string, rateLimiter: RateLimiter) => Fetcher
}

/**
 * Build adapters for every enabled site.
 * Sites without a known definition are skipped with a warning.
 */
export function createSiteAdapters(config: AppConfig, options: CreateSiteAdaptersOptions): SiteAdapter[] {
  const { logger, clock } = options
  const fetcherFactory =
    options.fetcherFactory ?? ((_siteId: string, rateLimiter: RateLimiter) => new HttpFetcher({ rateLimiter }))

  const adapters: SiteAdapter[] = []

  for (const [siteId, siteConfig] of Object.entries(config.sites)) {
    if (!siteConfig.enabled) {
      logger.debug('Site disabled, skipping', { site: siteId })
      continue
    }

    const definition = SITE_DEFINITIONS[siteId]
    if (!definition) {
      logger.warn('No adapter available for configured site', { site: siteId })
      continue
    }

    const rateLimiter = new MinIntervalRateLimiter({
      minDelayMs: siteConfig.rateLimitDelaySeconds * 1000,
    })

    const extractor = new CheerioPageExtractor({
      fetcher: fetcherFactory(siteId, rateLimiter),
      timeoutMs: siteConfig.timeoutSeconds * 1000,
      userAgent: siteConfig.userAgent,
    })

    adapters.push(
      createSiteAdapter(definition, {
        config: siteConfig,
        extractor,
        logger,
        clock,
      })
    )
  }

  return adapters
}

export { createEbayAdapter } from './ebay/adapter.js'
export { createWalmartAdapter } from './walmart/adapter.js'
export { createTargetAdapter } from './target/adapter.js'
export { createAliexpressAdapter } from './aliexpress/adapter.js'
