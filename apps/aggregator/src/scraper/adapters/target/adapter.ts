/**
 * Target Adapter
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
    url: item.attr(SELECTORS.link, 'href'),
    imageUrl: item.attr(SELECTORS.image, 'src'),
  }
}

export const targetDefinition: SiteDefinition = {
  id: 'target',
  origin: 'https://www.target.com',
  fallbackAvailability: 'Check site',
  itemSelector: SELECTORS.item,
  readSearchItem,
}

export function createTargetAdapter(deps: SiteAdapterDeps): SiteAdapter {
  return createSiteAdapter(targetDefinition, deps)
}
