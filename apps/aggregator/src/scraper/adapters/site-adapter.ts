/**
 * Site Adapter Factory
 *
 * Sites differ only in where their search results live and how a result
 * block is read. Everything else (fetching, normalization, validation,
 * logging) is shared and built here from a SiteDefinition.
 */

import type { PageDocument, ProductRecord, RawListing, SiteAdapter, SiteAdapterDeps } from '../types.js'
import { ExtractionError } from '../errors.js'
import { buildProductRecord, type BuildContext } from '../process/record-builder.js'
import { validationReasonToMessage } from '../process/validator.js'
import { buildSearchUrl, isValidUrl } from '../utils/url.js'

export interface SiteDefinition {
  /** Site key, also the registry key */
  id: string

  /** Origin relative hrefs resolve against */
  origin: string

  /** Availability reported when a page shows none */
  fallbackAvailability: string

  /** Selector list for result blocks on the search page */
  itemSelector: string

  /**
   * Read one result block.
   * Returns null for blocks that are not real listings (sponsored, filler,
   * or missing a title element).
   */
  readSearchItem(item: PageDocument): RawListing | null
}

export function createSiteAdapter(definition: SiteDefinition, deps: SiteAdapterDeps): SiteAdapter {
  const { config, extractor, clock } = deps
  const log = deps.logger.child(definition.id)

  const buildContext: BuildContext = {
    site: definition.id,
    origin: definition.origin,
    fallbackAvailability: definition.fallbackAvailability,
    clock,
  }

  /** An unusable selector leaves the field absent instead of failing the page */
  function readField(url: string, field: keyof RawListing, read: () => string | null): string | null {
    try {
      return read()
    } catch (error) {
      if (!(error instanceof ExtractionError)) throw error
      log.warn('Could not extract field', { url, field }, error)
      return null
    }
  }

  return {
    id: definition.id,

    async scrapeOne(url: string): Promise<ProductRecord | null> {
      if (!isValidUrl(url)) {
        log.warn('Refusing to scrape invalid URL', { url })
        return null
      }

      log.info('Scraping product page', { url })

      const html = await extractor.fetchHtml(url)
      const page = extractor.load(html)
      const { selectors } = config

      const raw: RawListing = {
        title: readField(url, 'title', () => page.text(selectors.title)),
        priceText: readField(url, 'priceText', () => page.text(selectors.price)),
        url,
        imageUrl: readField(url, 'imageUrl', () => page.attr(selectors.image, 'src')),
        availability: readField(url, 'availability', () => page.text(selectors.availability)),
      }

      const built = buildProductRecord(raw, buildContext)
      if (!built.ok) {
        log.warn('Product page did not yield a valid record', {
          url,
          reason: built.reason,
          detail: validationReasonToMessage(built.reason),
        })
        return null
      }

      log.info('Scraped product', { url, title: built.record.title })
      return built.record
    },

    async search(query: string, maxResults: number): Promise<ProductRecord[]> {
      const searchUrl = buildSearchUrl(config.searchUrlTemplate, query)
      log.info('Searching', { query, searchUrl, maxResults })

      const html = await extractor.fetchHtml(searchUrl)
      const page = extractor.load(html)
      const items = page.items(definition.itemSelector).slice(0, maxResults)

      const records: ProductRecord[] = []
      let skipped = 0

      for (const [index, item] of items.entries()) {
        try {
          const raw = definition.readSearchItem(item)
          if (!raw) {
            skipped++
            continue
          }

          const built = buildProductRecord(raw, buildContext)
          if (!built.ok) {
            skipped++
            log.debug('Dropped search result', {
              index,
              reason: built.reason,
              title: built.candidate.title,
            })
            continue
          }

          records.push(built.record)
        } catch (error) {
          // One unreadable block never aborts the page
          skipped++
          log.warn('Failed to read search result', { index }, error)
        }
      }

      log.info('Search complete', {
        query,
        found: records.length,
        skipped,
      })

      return records
    },
  }
}
