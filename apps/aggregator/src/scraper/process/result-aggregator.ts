/**
 * Result Aggregator
 *
 * Merges per-site results into one price-sorted sequence and derives
 * best deals and summary statistics from it. Pure functions; a report is
 * computed fresh for every query.
 */

import type { AggregateReport, ProductRecord, SiteResults } from '../types.js'

/** Default number of records returned by selectBestDeals */
export const DEFAULT_TOP_N = 5

/**
 * Ascending by price with null prices last.
 */
export function comparePrices(a: ProductRecord, b: ProductRecord): number {
  if (a.price === null && b.price === null) return 0
  if (a.price === null) return 1
  if (b.price === null) return -1
  return a.price - b.price
}

/**
 * Flatten successful site results (in ascending site order) and sort by
 * price. Array.prototype.sort is stable, so records with equal prices keep
 * their flattened order.
 */
export function combineResults(results: SiteResults): ProductRecord[] {
  const flattened = Object.keys(results)
    .sort()
    .flatMap(site => {
      const result = results[site]
      return result && result.status === 'ok' ? result.records : []
    })

  return flattened.sort(comparePrices)
}

function hasPositivePrice(record: ProductRecord): record is ProductRecord & { price: number } {
  return record.price !== null && record.price > 0
}

/**
 * The first `topN` records of a combined sequence that carry a strictly
 * positive price.
 */
export function selectBestDeals(combined: readonly ProductRecord[], topN: number = DEFAULT_TOP_N): ProductRecord[] {
  return combined.filter(hasPositivePrice).slice(0, Math.max(0, topN))
}

/**
 * Summary statistics over a combined sequence.
 * Price statistics consider strictly positive prices only; an empty
 * sequence yields a zeroed report.
 */
export function buildReport(
  query: string,
  combined: readonly ProductRecord[],
  failedSites: readonly string[] = []
): AggregateReport {
  const prices = combined.filter(hasPositivePrice).map(record => record.price)

  const total = prices.reduce((sum, price) => sum + price, 0)

  return {
    query,
    totalResults: combined.length,
    lowestPrice: prices.length > 0 ? Math.min(...prices) : null,
    highestPrice: prices.length > 0 ? Math.max(...prices) : null,
    averagePrice: prices.length > 0 ? total / prices.length : null,
    bestDeal: combined[0] ?? null,
    products: [...combined],
    failedSites: [...failedSites].sort(),
  }
}
