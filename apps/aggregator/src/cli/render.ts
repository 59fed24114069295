/**
 * Plain-text rendering of query results for the terminal.
 */

import type { AggregateReport, ProductRecord, SiteResults } from '../scraper/types.js'
import { formatPrice } from '../scraper/process/price-normalizer.js'

const MAX_URL_LENGTH = 80

export function truncateUrl(url: string, max: number = MAX_URL_LENGTH): string {
  return url.length > max ? `${url.slice(0, max)}...` : url
}

function renderPrice(record: ProductRecord): string {
  return record.price === null ? 'not listed' : formatPrice(record.price, record.currency)
}

function renderRecord(record: ProductRecord, position: number, showSite: boolean): string[] {
  const lines = [`${position}. ${record.title}`, `   Price: ${renderPrice(record)}`]
  if (showSite) {
    lines.push(`   Site: ${record.site}`)
  }
  lines.push(`   URL: ${truncateUrl(record.url)}`)
  return lines
}

export function renderSiteList(sites: string[]): string[] {
  return [`Available sites: ${sites.join(', ')}`]
}

export function renderCombined(records: ProductRecord[]): string[] {
  const lines = [`=== Combined Results (${records.length} products, sorted by price) ===`, '']
  records.forEach((record, index) => {
    lines.push(...renderRecord(record, index + 1, true), '')
  })
  return lines
}

export function renderBestDeals(records: ProductRecord[]): string[] {
  if (records.length === 0) {
    return ['No priced listings found.']
  }

  const lines = [`=== Top ${records.length} Best Deals ===`, '']
  records.forEach((record, index) => {
    lines.push(...renderRecord(record, index + 1, true), '')
  })
  return lines
}

export function renderSiteResults(results: SiteResults): string[] {
  const lines: string[] = []

  for (const [site, result] of Object.entries(results)) {
    if (result.status === 'failed') {
      lines.push(`=== ${site.toUpperCase()} (failed) ===`, `   ${result.error.message}`, '')
      continue
    }

    lines.push(`=== ${site.toUpperCase()} (${result.records.length} results) ===`, '')
    result.records.forEach((record, index) => {
      lines.push(...renderRecord(record, index + 1, false), '')
    })
  }

  return lines
}

export function renderComparison(report: AggregateReport): string[] {
  const lines = ['=== Price Comparison Analysis ===', '', `Total Results: ${report.totalResults}`]

  if (report.lowestPrice !== null && report.highestPrice !== null && report.averagePrice !== null) {
    lines.push(
      `Lowest Price: ${formatPrice(report.lowestPrice)}`,
      `Highest Price: ${formatPrice(report.highestPrice)}`,
      `Average Price: ${formatPrice(report.averagePrice)}`
    )
  }

  if (report.bestDeal) {
    const best = report.bestDeal
    lines.push('', 'Best Deal:', `  ${best.title}`, `  ${renderPrice(best)} on ${best.site}`, `  ${best.url}`)
  }

  if (report.failedSites.length > 0) {
    lines.push('', `Failed sites: ${report.failedSites.join(', ')}`)
  }

  return lines
}

export function renderProduct(record: ProductRecord | null): string[] {
  if (!record) {
    return ['No product could be extracted from that page.']
  }

  return [
    record.title,
    `   Price: ${renderPrice(record)}`,
    `   Availability: ${record.availability}`,
    `   Site: ${record.site}`,
    `   URL: ${record.url}`,
  ]
}
