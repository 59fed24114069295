import { describe, it, expect, vi } from 'vitest'
import { ScrapeOrchestrator } from '../orchestrator.js'
import {
  AdapterNotRegisteredError,
  ConfigurationError,
  InvalidRequestError,
  NoSitesSelectedError,
  TransportError,
} from '../errors.js'
import type { ProductRecord, SiteAdapter } from '../types.js'
import { makeRecord } from '../../test-utils/fixtures.js'
import { createRecordingLogger, createSilentLogger } from '../../test-utils/logger.js'

function fakeAdapter(
  id: string,
  search: (query: string, maxResults: number) => Promise<ProductRecord[]>,
  scrapeOne: (url: string) => Promise<ProductRecord | null> = async () => null
): SiteAdapter {
  return { id, search: vi.fn(search), scrapeOne: vi.fn(scrapeOne) }
}

function returning(id: string, ...prices: Array<number | null>): SiteAdapter {
  return fakeAdapter(id, async () => prices.map(price => makeRecord({ site: id, title: `${id} ${price}`, price })))
}

describe('ScrapeOrchestrator', () => {
  describe('construction', () => {
    it('refuses to start without adapters', () => {
      expect(() => new ScrapeOrchestrator({ adapters: [], logger: createSilentLogger() })).toThrow(ConfigurationError)
    })

    it('refuses duplicate site ids', () => {
      expect(
        () =>
          new ScrapeOrchestrator({
            adapters: [returning('ebay'), returning('ebay')],
            logger: createSilentLogger(),
          })
      ).toThrow("Adapter with ID 'ebay' is already registered")
    })

    it('refuses a pool size below one', () => {
      expect(
        () => new ScrapeOrchestrator({ adapters: [returning('ebay')], maxConcurrency: 0, logger: createSilentLogger() })
      ).toThrow(ConfigurationError)
    })

    it('lists registered sites in ascending order', () => {
      const orchestrator = new ScrapeOrchestrator({
        adapters: [returning('walmart'), returning('aliexpress'), returning('ebay')],
        logger: createSilentLogger(),
      })

      expect(orchestrator.listRegisteredSites()).toEqual(['aliexpress', 'ebay', 'walmart'])
    })
  })

  describe('searchAll', () => {
    it('isolates a failing site and keeps one entry per adapter', async () => {
      const orchestrator = new ScrapeOrchestrator({
        adapters: [
          returning('walmart', 12),
          fakeAdapter('ebay', async () => {
            throw new TransportError('https://www.ebay.com/sch/i.html?_nkw=lamp', {
              message: 'HTTP 503: Service Unavailable',
              statusCode: 503,
              attempts: 3,
            })
          }),
          returning('aliexpress', 3),
        ],
        logger: createSilentLogger(),
      })

      const results = await orchestrator.searchAll('lamp')

      expect(Object.keys(results)).toEqual(['aliexpress', 'ebay', 'walmart'])
      expect(results.ebay).toEqual({
        status: 'failed',
        site: 'ebay',
        records: [],
        error: {
          kind: 'transport',
          code: 'TRANSPORT_FAILED',
          message: 'Failed to fetch https://www.ebay.com/sch/i.html?_nkw=lamp: HTTP 503: Service Unavailable',
          isRetryable: true,
        },
      })
      expect(results.walmart.status).toBe('ok')
      expect(results.walmart.records.map(r => r.price)).toEqual([12])
      expect(results.aliexpress.records.map(r => r.price)).toEqual([3])
    })

    it('classifies unexpected throws', async () => {
      const orchestrator = new ScrapeOrchestrator({
        adapters: [
          fakeAdapter('target', async () => {
            throw new Error('selector engine crashed')
          }),
        ],
        logger: createSilentLogger(),
      })

      const results = await orchestrator.searchAll('lamp')

      expect(results.target).toMatchObject({
        status: 'failed',
        error: { kind: 'unexpected', code: 'UNEXPECTED_ERROR', message: 'selector engine crashed' },
      })
    })

    it('passes the trimmed query and the per-site limit to adapters', async () => {
      const adapter = returning('ebay', 1)
      const orchestrator = new ScrapeOrchestrator({ adapters: [adapter], logger: createSilentLogger() })

      await orchestrator.searchAll('  desk lamp ', 3)
      await orchestrator.searchAll('desk lamp')

      expect(adapter.search).toHaveBeenNthCalledWith(1, 'desk lamp', 3)
      expect(adapter.search).toHaveBeenNthCalledWith(2, 'desk lamp', 10)
    })

    it('rejects an empty query or a non-positive limit', async () => {
      const orchestrator = new ScrapeOrchestrator({ adapters: [returning('ebay')], logger: createSilentLogger() })

      await expect(orchestrator.searchAll('   ')).rejects.toBeInstanceOf(InvalidRequestError)
      await expect(orchestrator.searchAll('lamp', 0)).rejects.toBeInstanceOf(InvalidRequestError)
    })

    it('never runs more adapters at once than the pool allows', async () => {
      let inFlight = 0
      let maxInFlight = 0
      const slow = (id: string) =>
        fakeAdapter(id, async () => {
          inFlight++
          maxInFlight = Math.max(maxInFlight, inFlight)
          await new Promise(resolve => setTimeout(resolve, 5))
          inFlight--
          return []
        })

      const orchestrator = new ScrapeOrchestrator({
        adapters: ['a1', 'a2', 'a3', 'a4', 'a5'].map(slow),
        maxConcurrency: 2,
        logger: createSilentLogger(),
      })

      const results = await orchestrator.searchAll('lamp')

      expect(maxInFlight).toBe(2)
      expect(Object.keys(results)).toEqual(['a1', 'a2', 'a3', 'a4', 'a5'])
    })

    it('logs dispatch, merge and per-site failures', async () => {
      const { logger, entries } = createRecordingLogger()
      const orchestrator = new ScrapeOrchestrator({
        adapters: [
          returning('ebay', 1),
          fakeAdapter('walmart', async () => {
            throw new Error('boom')
          }),
        ],
        logger,
      })

      await orchestrator.searchAll('lamp')

      const messages = entries.filter(e => e.component === 'orchestrator').map(e => e.message)
      expect(messages).toEqual([
        'Orchestrator ready',
        'Search dispatched',
        'Collecting site results',
        'Site search failed',
        'Search results merged',
      ])
      const failure = entries.find(e => e.message === 'Site search failed')
      expect(failure).toMatchObject({ level: 'error', site: 'walmart', error: { message: 'boom' } })
    })
  })

  describe('searchSubset', () => {
    it('ignores unknown site ids', async () => {
      const ebay = returning('ebay', 5)
      const walmart = returning('walmart', 6)
      const orchestrator = new ScrapeOrchestrator({ adapters: [ebay, walmart], logger: createSilentLogger() })

      const results = await orchestrator.searchSubset('lamp', ['walmart', 'nope'])

      expect(Object.keys(results)).toEqual(['walmart'])
      expect(ebay.search).not.toHaveBeenCalled()
    })

    it('throws when no requested site is registered', async () => {
      const orchestrator = new ScrapeOrchestrator({ adapters: [returning('ebay')], logger: createSilentLogger() })

      await expect(orchestrator.searchSubset('lamp', ['nope', 'other'])).rejects.toThrow(
        new NoSitesSelectedError(['nope', 'other']).message
      )
      await expect(orchestrator.searchSubset('lamp', [])).rejects.toBeInstanceOf(NoSitesSelectedError)
    })
  })

  describe('searchAllCombined', () => {
    it('merges sites into one price-sorted sequence with null prices last', async () => {
      const orchestrator = new ScrapeOrchestrator({
        adapters: [returning('ebay', 15), returning('target', null), returning('walmart', 9.5)],
        logger: createSilentLogger(),
      })

      const combined = await orchestrator.searchAllCombined('lamp')

      expect(combined.map(r => r.price)).toEqual([9.5, 15, null])
      expect(combined.map(r => r.site)).toEqual(['walmart', 'ebay', 'target'])
    })
  })

  describe('scrapeUrl', () => {
    it('routes to the named adapter', async () => {
      const record = makeRecord({ site: 'target', url: 'https://www.target.com/p/1' })
      const target = fakeAdapter('target', async () => [], async () => record)
      const orchestrator = new ScrapeOrchestrator({
        adapters: [returning('ebay'), target],
        logger: createSilentLogger(),
      })

      await expect(orchestrator.scrapeUrl('https://www.target.com/p/1', 'target')).resolves.toBe(record)
      expect(target.scrapeOne).toHaveBeenCalledWith('https://www.target.com/p/1')
    })

    it('throws for an unregistered site', async () => {
      const orchestrator = new ScrapeOrchestrator({ adapters: [returning('ebay')], logger: createSilentLogger() })

      await expect(orchestrator.scrapeUrl('https://shop.example/p/1', 'bestbuy')).rejects.toBeInstanceOf(
        AdapterNotRegisteredError
      )
    })
  })

  describe('bestDeals', () => {
    it('returns the cheapest priced records', async () => {
      const orchestrator = new ScrapeOrchestrator({
        adapters: [returning('ebay', 0, 7, null), returning('walmart', 3, 11)],
        logger: createSilentLogger(),
      })

      const deals = await orchestrator.bestDeals('lamp', 2)

      expect(deals.map(r => r.price)).toEqual([3, 7])
    })

    it('rejects a non-positive topN', async () => {
      const orchestrator = new ScrapeOrchestrator({ adapters: [returning('ebay')], logger: createSilentLogger() })

      await expect(orchestrator.bestDeals('lamp', 0)).rejects.toBeInstanceOf(InvalidRequestError)
    })
  })

  describe('compare', () => {
    it('reports statistics and failed sites', async () => {
      const orchestrator = new ScrapeOrchestrator({
        adapters: [
          returning('ebay', 10, 30),
          returning('walmart', 20),
          fakeAdapter('target', async () => {
            throw new Error('blocked')
          }),
        ],
        logger: createSilentLogger(),
      })

      const report = await orchestrator.compare(' lamp ')

      expect(report).toMatchObject({
        query: 'lamp',
        totalResults: 3,
        lowestPrice: 10,
        highestPrice: 30,
        averagePrice: 20,
        failedSites: ['target'],
      })
      expect(report.bestDeal?.price).toBe(10)
    })

    it('returns a zeroed report when nothing was found', async () => {
      const orchestrator = new ScrapeOrchestrator({ adapters: [returning('ebay')], logger: createSilentLogger() })

      expect(await orchestrator.compare('lamp')).toEqual({
        query: 'lamp',
        totalResults: 0,
        lowestPrice: null,
        highestPrice: null,
        averagePrice: null,
        bestDeal: null,
        products: [],
        failedSites: [],
      })
    })
  })
})
