/**
 * Scraper Module
 *
 * Site adapters, fetching, normalization and the orchestrator that fans
 * queries out across sites.
 */

// Types
export * from './types.js'
export * from './errors.js'

// Registry and orchestration
export { InMemoryAdapterRegistry, type AdapterRegistry } from './registry.js'
export { ScrapeOrchestrator, DEFAULT_MAX_CONCURRENCY, DEFAULT_MAX_RESULTS_PER_SITE } from './orchestrator.js'
export type { ScrapeOrchestratorOptions } from './orchestrator.js'

// Adapters
export { createSiteAdapter, type SiteDefinition } from './adapters/site-adapter.js'
export {
  SITE_DEFINITIONS,
  createSiteAdapters,
  createEbayAdapter,
  createWalmartAdapter,
  createTargetAdapter,
  createAliexpressAdapter,
  type CreateSiteAdaptersOptions,
} from './adapters/index.js'

// Fetch
export { HttpFetcher, type HttpFetcherOptions } from './fetch/http-fetcher.js'
export { MinIntervalRateLimiter, type MinIntervalRateLimiterOptions } from './fetch/rate-limiter.js'
export { CheerioPageExtractor, CheerioDocument, type CheerioPageExtractorOptions } from './fetch/page-extractor.js'

// Processing
export { normalizePrice, extractCurrency, formatPrice, DEFAULT_CURRENCY } from './process/price-normalizer.js'
export {
  checkProductRecord,
  validateProductRecord,
  validationReasonToMessage,
  sanitizeText,
  MIN_TITLE_LENGTH,
  type ValidationFailureReason,
  type ValidationResult,
} from './process/validator.js'
export { buildProductRecord, type BuildContext, type BuildResult } from './process/record-builder.js'
export { combineResults, selectBestDeals, buildReport, comparePrices, DEFAULT_TOP_N } from './process/result-aggregator.js'

// Utils
export { isValidUrl, absolutizeUrl, buildSearchUrl, encodeQuery } from './utils/url.js'
export { mapWithConcurrency } from './utils/concurrency.js'
export { createMonotonicClock } from './utils/clock.js'
