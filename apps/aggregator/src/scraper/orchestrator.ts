/**
 * Scrape Orchestrator
 *
 * Fans a request out to registered site adapters through a bounded pool,
 * waits for every adapter, and merges the outcome into a SiteResults map.
 *
 * Failure isolation: a site whose operation throws gets an empty, failed
 * slot with a classified error note. Siblings are never cancelled and the
 * request as a whole still succeeds.
 */

import type { ILogger } from '@pricehound/logger'
import type {
  AggregateReport,
  PriceQuerySurface,
  ProductRecord,
  ScrapeResult,
  SiteAdapter,
  SiteResults,
} from './types.js'
import { ConfigurationError, InvalidRequestError, NoSitesSelectedError, classifyError } from './errors.js'
import { InMemoryAdapterRegistry } from './registry.js'
import { mapWithConcurrency } from './utils/concurrency.js'
import { buildReport, combineResults, DEFAULT_TOP_N, selectBestDeals } from './process/result-aggregator.js'

export const DEFAULT_MAX_CONCURRENCY = 5
export const DEFAULT_MAX_RESULTS_PER_SITE = 10

export interface ScrapeOrchestratorOptions {
  adapters: readonly SiteAdapter[]

  /** Maximum adapter operations in flight (default: 5) */
  maxConcurrency?: number

  logger: ILogger
}

export class ScrapeOrchestrator implements PriceQuerySurface {
  private readonly registry = new InMemoryAdapterRegistry()
  private readonly maxConcurrency: number
  private readonly log: ILogger

  /**
   * @throws ConfigurationError with no adapters, duplicate ids or an invalid pool size
   */
  constructor(options: ScrapeOrchestratorOptions) {
    if (options.adapters.length === 0) {
      throw new ConfigurationError('No site adapters available; enable at least one site')
    }

    const maxConcurrency = options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new ConfigurationError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`)
    }

    for (const adapter of options.adapters) {
      this.registry.register(adapter)
    }

    this.maxConcurrency = maxConcurrency
    this.log = options.logger.child('orchestrator')

    this.log.info('Orchestrator ready', {
      sites: this.registry.list(),
      maxConcurrency,
    })
  }

  listRegisteredSites(): string[] {
    return this.registry.list()
  }

  async searchAll(query: string, maxResultsPerSite: number = DEFAULT_MAX_RESULTS_PER_SITE): Promise<SiteResults> {
    const normalizedQuery = this.validateSearch(query, maxResultsPerSite)
    return this.dispatch(normalizedQuery, this.registry.list(), maxResultsPerSite)
  }

  /**
   * Search only the named sites. Unknown ids are ignored.
   * @throws NoSitesSelectedError when none of the ids are registered
   */
  async searchSubset(
    query: string,
    sites: string[],
    maxResultsPerSite: number = DEFAULT_MAX_RESULTS_PER_SITE
  ): Promise<SiteResults> {
    const normalizedQuery = this.validateSearch(query, maxResultsPerSite)

    const selected = [...new Set(sites)].filter(site => this.registry.get(site) !== undefined).sort()
    const ignored = sites.filter(site => this.registry.get(site) === undefined)

    if (ignored.length > 0) {
      this.log.warn('Ignoring unregistered sites', { ignored })
    }

    if (selected.length === 0) {
      throw new NoSitesSelectedError(sites)
    }

    return this.dispatch(normalizedQuery, selected, maxResultsPerSite)
  }

  async searchAllCombined(
    query: string,
    maxResultsPerSite: number = DEFAULT_MAX_RESULTS_PER_SITE
  ): Promise<ProductRecord[]> {
    return combineResults(await this.searchAll(query, maxResultsPerSite))
  }

  /**
   * Scrape one product page with the named site's adapter.
   * @throws AdapterNotRegisteredError for an unknown site
   * @throws TransportError when the page cannot be fetched
   */
  async scrapeUrl(url: string, site: string): Promise<ProductRecord | null> {
    const adapter = this.registry.require(site)
    return adapter.scrapeOne(url)
  }

  async bestDeals(
    query: string,
    topN: number = DEFAULT_TOP_N,
    maxResultsPerSite: number = DEFAULT_MAX_RESULTS_PER_SITE
  ): Promise<ProductRecord[]> {
    if (!Number.isInteger(topN) || topN < 1) {
      throw new InvalidRequestError(`topN must be a positive integer, got ${topN}`)
    }

    const combined = await this.searchAllCombined(query, maxResultsPerSite)
    return selectBestDeals(combined, topN)
  }

  async compare(query: string, maxResultsPerSite: number = DEFAULT_MAX_RESULTS_PER_SITE): Promise<AggregateReport> {
    const results = await this.searchAll(query, maxResultsPerSite)
    const failedSites = Object.values(results)
      .filter(result => result.status === 'failed')
      .map(result => result.site)

    return buildReport(query.trim(), combineResults(results), failedSites)
  }

  private validateSearch(query: string, maxResultsPerSite: number): string {
    const normalized = query.trim()
    if (normalized === '') {
      throw new InvalidRequestError('Search query must not be empty')
    }
    if (!Number.isInteger(maxResultsPerSite) || maxResultsPerSite < 1) {
      throw new InvalidRequestError(`maxResultsPerSite must be a positive integer, got ${maxResultsPerSite}`)
    }
    return normalized
  }

  /**
   * Run a search on each site and wait for all of them.
   * `siteIds` must be registered and in ascending order.
   */
  private async dispatch(query: string, siteIds: string[], maxResults: number): Promise<SiteResults> {
    const startedAt = Date.now()

    const pending = mapWithConcurrency(siteIds, this.maxConcurrency, site => this.searchSite(site, query, maxResults))
    this.log.info('Search dispatched', {
      query,
      sites: siteIds,
      maxConcurrency: this.maxConcurrency,
    })

    this.log.debug('Collecting site results', { pending: siteIds.length })
    const settled = await pending

    const results: SiteResults = {}
    for (const result of settled) {
      results[result.site] = result
    }

    const failed = settled.filter(result => result.status === 'failed').map(result => result.site)
    this.log.info('Search results merged', {
      query,
      totalRecords: settled.reduce((sum, result) => sum + result.records.length, 0),
      failedSites: failed,
      durationMs: Date.now() - startedAt,
    })

    return results
  }

  private async searchSite(site: string, query: string, maxResults: number): Promise<ScrapeResult> {
    try {
      const adapter = this.registry.require(site)
      const records = await adapter.search(query, maxResults)
      return { status: 'ok', site, records }
    } catch (error) {
      const note = classifyError(error)
      this.log.error('Site search failed', { site, kind: note.kind, code: note.code }, error)
      return { status: 'failed', site, records: [], error: note }
    }
  }
}
