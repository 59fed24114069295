import { describe, it, expect } from 'vitest'
import { createWalmartAdapter } from '../adapter.js'
import { CheerioPageExtractor } from '../../../fetch/page-extractor.js'
import { StaticFetcher, fixedClock, makeSiteConfig } from '../../../../test-utils/fixtures.js'
import { createSilentLogger } from '../../../../test-utils/logger.js'

const SEARCH_URL = 'https://www.walmart.com/search?q=desk+lamp'

const SEARCH_PAGE = `
  <div data-item-id="1">
    <a link-identifier="1" href="/ip/LED-Desk-Lamp/1">LED Desk Lamp</a>
    <div data-automation-id="product-price">current price $18.88</div>
    <img data-testid="productTileImage" src="https://i5.walmartimages.com/1.jpg">
  </div>
  <div class="search-result-gridview-item">
    <span class="product-title-link">Clamp Lamp</span>
    <a href="/ip/Clamp-Lamp/2">View</a>
    <div class="price-main"><span class="price-characteristic">12</span></div>
    <div class="product-image"><img src="//i5.walmartimages.com/2.jpg"></div>
  </div>
  <div data-item-id="3">
    <div data-automation-id="product-price">$9.99</div>
  </div>
`

describe('walmart adapter', () => {
  it('extracts results across layouts and falls back to the first link', async () => {
    const adapter = createWalmartAdapter({
      config: makeSiteConfig({ searchUrlTemplate: 'https://www.walmart.com/search?q={query}' }),
      extractor: new CheerioPageExtractor({ fetcher: new StaticFetcher({ [SEARCH_URL]: SEARCH_PAGE }) }),
      logger: createSilentLogger(),
      clock: fixedClock,
    })

    const records = await adapter.search('desk lamp', 10)

    expect(records.map(r => [r.title, r.price, r.url, r.imageUrl, r.availability])).toEqual([
      [
        'LED Desk Lamp',
        18.88,
        'https://www.walmart.com/ip/LED-Desk-Lamp/1',
        'https://i5.walmartimages.com/1.jpg',
        'Check site',
      ],
      [
        'Clamp Lamp',
        12,
        'https://www.walmart.com/ip/Clamp-Lamp/2',
        'https://i5.walmartimages.com/2.jpg',
        'Check site',
      ],
    ])
  })
})
