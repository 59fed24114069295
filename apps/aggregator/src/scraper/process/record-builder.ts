/**
 * ProductRecord Builder
 *
 * Turns raw field values read off a page into a validated, frozen
 * ProductRecord. The only place records are constructed.
 */

import type { ProductCandidate, ProductRecord, RawListing } from '../types.js'
import { absolutizeUrl } from '../utils/url.js'
import { extractCurrency, normalizePrice } from './price-normalizer.js'
import { checkProductRecord, sanitizeText, type ValidationFailureReason } from './validator.js'

export interface BuildContext {
  /** Adapter id stamped on the record */
  site: string

  /** Origin used to absolutize relative hrefs */
  origin: string

  /** Availability used when the page shows none */
  fallbackAvailability: string

  clock: () => string
}

export type BuildResult =
  | { ok: true; record: ProductRecord }
  | { ok: false; reason: ValidationFailureReason; candidate: ProductCandidate }

export function buildProductRecord(raw: RawListing, ctx: BuildContext): BuildResult {
  const priceText = raw.priceText ?? ''
  const availability = sanitizeText(raw.availability)

  const candidate = {
    title: sanitizeText(raw.title),
    price: normalizePrice(priceText),
    currency: extractCurrency(priceText),
    url: absolutizeUrl(raw.url, ctx.origin),
    imageUrl: absolutizeUrl(raw.imageUrl, ctx.origin),
    availability: availability || ctx.fallbackAvailability,
    site: ctx.site,
    scrapedAt: ctx.clock(),
  }

  const check = checkProductRecord(candidate)
  if (!check.ok) {
    return { ok: false, reason: check.reason, candidate }
  }

  const record: ProductRecord = Object.freeze(candidate)
  return { ok: true, record }
}
