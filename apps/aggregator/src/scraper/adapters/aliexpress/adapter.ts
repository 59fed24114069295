/**
 * AliExpress Adapter
 *
 * Titles are read from the `title` attribute before the (often truncated)
 * link text. Images are lazy-loaded, so an empty `src` falls back to
 * `data-src`.
 */

import type { PageDocument, RawListing, SiteAdapter, SiteAdapterDeps } from '../../types.js'
import { createSiteAdapter, type SiteDefinition } from '../site-adapter.js'
import { SELECTORS } from './selectors.js'

function readSearchItem(item: PageDocument): RawListing | null {
  if (!item.has(SELECTORS.title)) {
    return null
  }

  const title = item.attr(SELECTORS.title, 'title') || item.text(SELECTORS.title)

  return {
    title,
    priceText: item.text(SELECTORS.price),
    url: item.attr(SELECTORS.title, 'href') || item.attr(SELECTORS.link, 'href'),
    imageUrl: item.attr(SELECTORS.image, 'src') || item.attr(SELECTORS.image, 'data-src'),
  }
}

export const aliexpressDefinition: SiteDefinition = {
  id: 'aliexpress',
  origin: 'https://www.aliexpress.com',
  fallbackAvailability: 'Available',
  itemSelector: SELECTORS.item,
  readSearchItem,
}

export function createAliexpressAdapter(deps: SiteAdapterDeps): SiteAdapter {
  return createSiteAdapter(aliexpressDefinition, deps)
}
