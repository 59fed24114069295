import { describe, it, expect } from 'vitest'
import { SITE_DEFINITIONS, createSiteAdapters } from '../index.js'
import type { AppConfig, RateLimiter } from '../../types.js'
import { StaticFetcher, fixedClock, makeSiteConfig } from '../../../test-utils/fixtures.js'
import { createRecordingLogger } from '../../../test-utils/logger.js'

const config: AppConfig = {
  scraper: { maxConcurrency: 5, rateLimitDelaySeconds: 1, timeoutSeconds: 10 },
  sites: {
    walmart: makeSiteConfig({ searchUrlTemplate: 'https://www.walmart.com/search?q={query}' }),
    ebay: makeSiteConfig({ searchUrlTemplate: 'https://www.ebay.com/sch/i.html?_nkw={query}' }),
    target: makeSiteConfig({ enabled: false }),
    bestbuy: makeSiteConfig(),
  },
}

describe('createSiteAdapters', () => {
  it('knows the four supported sites', () => {
    expect(Object.keys(SITE_DEFINITIONS).sort()).toEqual(['aliexpress', 'ebay', 'target', 'walmart'])
  })

  it('builds adapters for enabled, known sites only', () => {
    const { logger, entries } = createRecordingLogger()

    const adapters = createSiteAdapters(config, { logger, clock: fixedClock })

    expect(adapters.map(a => a.id)).toEqual(['walmart', 'ebay'])
    expect(entries.find(e => e.message === 'No adapter available for configured site')).toMatchObject({
      level: 'warn',
      site: 'bestbuy',
    })
  })

  it('gives every adapter its own rate limiter', () => {
    const limiters = new Map<string, RateLimiter>()
    const { logger } = createRecordingLogger()

    createSiteAdapters(config, {
      logger,
      clock: fixedClock,
      fetcherFactory: (siteId, rateLimiter) => {
        limiters.set(siteId, rateLimiter)
        return new StaticFetcher({})
      },
    })

    expect([...limiters.keys()]).toEqual(['walmart', 'ebay'])
    expect(limiters.get('walmart')).not.toBe(limiters.get('ebay'))
  })

  it('routes searches through the configured fetcher', async () => {
    const fetcher = new StaticFetcher({ 'https://www.ebay.com/sch/i.html?_nkw=mug': '<ul></ul>' })
    const { logger } = createRecordingLogger()

    const [, ebay] = createSiteAdapters(config, { logger, clock: fixedClock, fetcherFactory: () => fetcher })

    expect(await ebay.search('mug', 5)).toEqual([])
    expect(fetcher.requests).toEqual(['https://www.ebay.com/sch/i.html?_nkw=mug'])
  })
})
