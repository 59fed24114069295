/**
 * eBay Adapter
 *
 * Search results skip promoted blocks and the "Shop on eBay" placeholder.
 */

import type { PageDocument, RawListing, SiteAdapter, SiteAdapterDeps } from '../../types.js'
import { createSiteAdapter, type SiteDefinition } from '../site-adapter.js'
import { PLACEHOLDER_TITLE, SELECTORS } from './selectors.js'

function readSearchItem(item: PageDocument): RawListing | null {
  if (item.has(SELECTORS.sponsoredTag)) {
    return null
  }

  const title = item.text(SELECTORS.title)
  if (!title || title.includes(PLACEHOLDER_TITLE)) {
    return null
  }

  return {
    title,
    priceText: item.text(SELECTORS.price),
    url: item.attr(SELECTORS.link, 'href'),
    imageUrl: item.attr(SELECTORS.image, 'src'),
  }
}

export const ebayDefinition: SiteDefinition = {
  id: 'ebay',
  origin: 'https://www.ebay.com',
  fallbackAvailability: 'Available',
  itemSelector: SELECTORS.item,
  readSearchItem,
}

export function createEbayAdapter(deps: SiteAdapterDeps): SiteAdapter {
  return createSiteAdapter(ebayDefinition, deps)
}
