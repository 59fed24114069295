import type { Fetcher, FetchResult, ProductRecord, SiteConfig } from '../scraper/types.js'

/**
 * Fetcher serving canned HTML by exact URL; anything else is a 404.
 */
export class StaticFetcher implements Fetcher {
  readonly requests: string[] = []

  constructor(private readonly pages: Record<string, string>) {}

  async fetch(url: string): Promise<FetchResult> {
    this.requests.push(url)
    const html = this.pages[url]
    if (html === undefined) {
      return { status: 'error', statusCode: 404, error: 'HTTP 404: Not Found', attempts: 1, durationMs: 0 }
    }
    return { status: 'ok', statusCode: 200, html, attempts: 1, durationMs: 0 }
  }
}

export function makeRecord(overrides: Partial<ProductRecord> = {}): ProductRecord {
  return {
    title: 'Test Product',
    price: 10,
    currency: 'USD',
    url: 'https://shop.example/item/1',
    imageUrl: '',
    availability: 'Available',
    site: 'ebay',
    scrapedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  }
}

export const fixedClock = (): string => '2026-01-01T00:00:00.000Z'

export function makeSiteConfig(overrides: Partial<SiteConfig> = {}): SiteConfig {
  return {
    enabled: true,
    searchUrlTemplate: 'https://shop.example/search?q={query}',
    selectors: {
      title: 'h1.product-title',
      price: '.product-price',
      image: 'img.product-image',
      availability: '.stock-status',
    },
    rateLimitDelaySeconds: 0,
    timeoutSeconds: 10,
    ...overrides,
  }
}
