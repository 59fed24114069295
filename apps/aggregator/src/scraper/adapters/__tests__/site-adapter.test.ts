import { describe, it, expect } from 'vitest'
import { createSiteAdapter, type SiteDefinition } from '../site-adapter.js'
import { CheerioPageExtractor } from '../../fetch/page-extractor.js'
import { TransportError } from '../../errors.js'
import { StaticFetcher, fixedClock, makeSiteConfig } from '../../../test-utils/fixtures.js'
import { createRecordingLogger, createSilentLogger } from '../../../test-utils/logger.js'
import type { PageDocument } from '../../types.js'

const definition: SiteDefinition = {
  id: 'shop',
  origin: 'https://shop.example',
  fallbackAvailability: 'Check site',
  itemSelector: '.result',
  readSearchItem: (item: PageDocument) => {
    const title = item.text('.name')
    if (!title) return null
    if (title === 'Explode') throw new Error('unreadable block')
    return {
      title,
      priceText: item.text('.cost'),
      url: item.attr('a', 'href'),
    }
  },
}

const PRODUCT_URL = 'https://shop.example/p/kettle'

const PRODUCT_PAGE = `
  <h1 class="product-title">Electric Kettle 1.7L</h1>
  <div class="product-price">$34.99</div>
  <img class="product-image" src="/img/kettle.jpg">
  <p class="stock-status">In stock</p>
`

const SEARCH_URL = 'https://shop.example/search?q=kettle'

const SEARCH_PAGE = `
  <div class="result"><span class="name">Glass Kettle</span><span class="cost">$29.00</span><a href="/p/glass"></a></div>
  <div class="result"><span class="cost">$1.00</span><a href="/p/untitled"></a></div>
  <div class="result"><span class="name">Explode</span></div>
  <div class="result"><span class="name">Xy</span><span class="cost">$3.00</span><a href="/p/xy"></a></div>
  <div class="result"><span class="name">Steel Kettle</span><a href="/p/steel"></a></div>
  <div class="result"><span class="name">Travel Kettle</span><span class="cost">$15.00</span><a href="/p/travel"></a></div>
`

function buildAdapter(pages: Record<string, string>, logger = createSilentLogger(), config = makeSiteConfig()) {
  const fetcher = new StaticFetcher(pages)
  const adapter = createSiteAdapter(definition, {
    config,
    extractor: new CheerioPageExtractor({ fetcher }),
    logger,
    clock: fixedClock,
  })
  return { adapter, fetcher }
}

describe('createSiteAdapter', () => {
  describe('scrapeOne', () => {
    it('extracts a record with the configured selectors', async () => {
      const { adapter } = buildAdapter({ [PRODUCT_URL]: PRODUCT_PAGE })

      const record = await adapter.scrapeOne(PRODUCT_URL)

      expect(record).toEqual({
        title: 'Electric Kettle 1.7L',
        price: 34.99,
        currency: 'USD',
        url: PRODUCT_URL,
        imageUrl: 'https://shop.example/img/kettle.jpg',
        availability: 'In stock',
        site: 'shop',
        scrapedAt: '2026-01-01T00:00:00.000Z',
      })
    })

    it('leaves a field absent when its selector cannot be evaluated', async () => {
      const { logger, entries } = createRecordingLogger()
      const config = makeSiteConfig({
        selectors: {
          title: 'h1.product-title',
          price: '.product-price',
          image: 'img.product-image',
          availability: 'p[data-x',
        },
      })
      const { adapter } = buildAdapter({ [PRODUCT_URL]: PRODUCT_PAGE }, logger, config)

      const record = await adapter.scrapeOne(PRODUCT_URL)

      expect(record).toMatchObject({ title: 'Electric Kettle 1.7L', price: 34.99, availability: 'Check site' })
      expect(entries.find(e => e.message === 'Could not extract field')).toMatchObject({
        level: 'warn',
        url: PRODUCT_URL,
        field: 'availability',
      })
    })

    it('uses the fallback availability when the page shows none', async () => {
      const { adapter } = buildAdapter({ [PRODUCT_URL]: '<h1 class="product-title">Kettle Pro</h1>' })

      const record = await adapter.scrapeOne(PRODUCT_URL)

      expect(record?.availability).toBe('Check site')
      expect(record?.price).toBeNull()
    })

    it('returns null when the title is missing', async () => {
      const { adapter } = buildAdapter({ [PRODUCT_URL]: '<div class="product-price">$5.00</div>' })

      expect(await adapter.scrapeOne(PRODUCT_URL)).toBeNull()
    })

    it('returns null for an invalid URL without fetching', async () => {
      const { adapter, fetcher } = buildAdapter({})

      expect(await adapter.scrapeOne('not a url')).toBeNull()
      expect(fetcher.requests).toEqual([])
    })

    it('throws TransportError when the page cannot be fetched', async () => {
      const { adapter } = buildAdapter({})

      await expect(adapter.scrapeOne(PRODUCT_URL)).rejects.toBeInstanceOf(TransportError)
    })
  })

  describe('search', () => {
    it('skips unreadable and invalid items without aborting', async () => {
      const { adapter, fetcher } = buildAdapter({ [SEARCH_URL]: SEARCH_PAGE })

      const records = await adapter.search('kettle', 10)

      expect(fetcher.requests).toEqual([SEARCH_URL])
      expect(records.map(r => [r.title, r.price, r.url])).toEqual([
        ['Glass Kettle', 29, 'https://shop.example/p/glass'],
        ['Steel Kettle', null, 'https://shop.example/p/steel'],
        ['Travel Kettle', 15, 'https://shop.example/p/travel'],
      ])
      expect(records.every(r => r.site === 'shop' && r.availability === 'Check site')).toBe(true)
    })

    it('considers at most maxResults item blocks', async () => {
      const { adapter } = buildAdapter({ [SEARCH_URL]: SEARCH_PAGE })

      const records = await adapter.search('kettle', 2)

      expect(records.map(r => r.title)).toEqual(['Glass Kettle'])
    })

    it('logs the number of records found', async () => {
      const { logger, entries } = createRecordingLogger()
      const { adapter } = buildAdapter({ [SEARCH_URL]: SEARCH_PAGE }, logger)

      await adapter.search('kettle', 10)

      const summary = entries.find(e => e.message === 'Search complete')
      expect(summary).toMatchObject({ component: 'shop', query: 'kettle', found: 3, skipped: 3 })
      expect(entries.find(e => e.message === 'Failed to read search result')?.level).toBe('warn')
    })

    it('throws TransportError when the search page cannot be fetched', async () => {
      const { adapter } = buildAdapter({})

      await expect(adapter.search('kettle', 5)).rejects.toBeInstanceOf(TransportError)
    })
  })
})
