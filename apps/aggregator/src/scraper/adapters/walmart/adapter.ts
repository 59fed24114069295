/**
 * Walmart Adapter
 */

import type { PageDocument, RawListing, SiteAdapter, SiteAdapterDeps } from '../../types.js'
import { createSiteAdapter, type SiteDefinition } from '../site-adapter.js'
import { SELECTORS } from './selectors.js'

function readSearchItem(item: PageDocument): RawListing | null {
  const title = item.text(SELECTORS.title)
  if (!title) {
    return null
  }

  return {
    title,
    priceText: item.text(SELECTORS.price),
    url: item.attr(SELECTORS.title, 'href') ?? item.attr(SELECTORS.link, 'href'),
    imageUrl: item.attr(SELECTORS.image, 'src'),
  }
}

export const walmartDefinition: SiteDefinition = {
  id: 'walmart',
  origin: 'https://www.walmart.com',
  fallbackAvailability: 'Check site',
  itemSelector: SELECTORS.item,
  readSearchItem,
}

export function createWalmartAdapter(deps: SiteAdapterDeps): SiteAdapter {
  return createSiteAdapter(walmartDefinition, deps)
}
