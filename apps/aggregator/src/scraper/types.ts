/**
 * Scraper Core Types
 *
 * ProductRecord output contract, site configuration, fetch/extract
 * capabilities, adapter interface and per-request result shapes.
 */

import type { ILogger } from '@pricehound/logger'
import type { FailureNote } from './errors.js'

// ═══════════════════════════════════════════════════════════════════════════════
// ProductRecord - Output Contract
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A normalized listing from one site.
 *
 * Records only exist once they pass the validator; adapters drop
 * candidates that fail instead of storing them half-valid.
 */
export interface ProductRecord {
  /** Listing title, at least 3 characters after trimming */
  readonly title: string

  /**
   * Canonical price in `currency`.
   * null when the page showed no parseable price. Never negative.
   */
  readonly price: number | null

  /** 3-letter currency code, USD when undetectable */
  readonly currency: string

  /** Absolute http(s) URL of the listing */
  readonly url: string

  /** Best-effort image URL, may be empty */
  readonly imageUrl: string

  /** Free-text availability, adapter fallback when the page shows none */
  readonly availability: string

  /** Id of the adapter that produced the record */
  readonly site: string

  /** ISO-8601 capture time, never decreasing within a process */
  readonly scrapedAt: string
}

/**
 * Loosely-typed record candidate as handed to the validator.
 * Anything may be missing or of the wrong type.
 */
export interface ProductCandidate {
  title?: unknown
  price?: unknown
  currency?: unknown
  url?: unknown
  imageUrl?: unknown
  availability?: unknown
  site?: unknown
  scrapedAt?: unknown
}

/**
 * Raw field values read off a page before normalization.
 */
export interface RawListing {
  title?: string | null
  priceText?: string | null
  url?: string | null
  imageUrl?: string | null
  availability?: string | null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Site Configuration
// ═══════════════════════════════════════════════════════════════════════════════

/** Selectors for product-page extraction. Comma lists are tried left to right. */
export interface SiteSelectors {
  title: string
  price: string
  image: string
  availability: string
}

export interface SiteConfig {
  enabled: boolean

  /** Search page URL with a `{query}` placeholder */
  searchUrlTemplate: string

  selectors: SiteSelectors

  /** Minimum spacing between two fetches to this site */
  rateLimitDelaySeconds: number

  /** Per-request timeout */
  timeoutSeconds: number

  userAgent?: string
}

export interface ScraperSettings {
  /** Maximum simultaneous adapter operations (default: 5) */
  maxConcurrency: number

  /** Default spacing between fetches for sites that set none (default: 1) */
  rateLimitDelaySeconds: number

  /** Default request timeout (default: 10) */
  timeoutSeconds: number

  userAgent?: string
}

export interface AppConfig {
  scraper: ScraperSettings
  sites: Record<string, SiteConfig>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher Interface
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Fetcher interface - allows swapping the HTTP transport.
 */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export interface FetchOptions {
  /** Request timeout in ms (default: 10000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 10MB) */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>
}

export const DEFAULT_FETCH_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (compatible; PriceHound/1.0)',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
} as const

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 10_000,
  maxSizeBytes: 10 * 1024 * 1024, // 10 MB
} as const

export type FetchResultStatus = 'ok' | 'error' | 'timeout' | 'too_large'

export interface FetchResult {
  status: FetchResultStatus
  statusCode?: number
  html?: string
  error?: string
  /** Attempts made, including the successful one */
  attempts: number
  durationMs: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Retry Policy
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  maxAttempts: number // Default: 3
  initialDelayMs: number // Default: 2000
  maxDelayMs: number // Default: 10000
  backoffMultiplier: number // Default: 2
  retryableStatusCodes: number[] // Default: [429, 500, 502, 503, 504]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 2000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

// ═══════════════════════════════════════════════════════════════════════════════
// Rate Limiter Interface
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Per-adapter rate limiter.
 *
 * Each adapter owns one instance; there is no shared state between
 * adapters, so one site's backlog never delays another.
 */
export interface RateLimiter {
  /** Resolves once the caller may fetch. Concurrent callers are served in order. */
  acquire(): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Page Extraction
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A parsed page, or one block within it.
 * Missing elements read as null, never as errors.
 */
export interface PageDocument {
  /** Trimmed text of the first match, trying each comma-separated selector in turn */
  text(selector: string): string | null

  /** Attribute of the first match that carries it */
  attr(selector: string, name: string): string | null

  /** Whether any element matches */
  has(selector: string): boolean

  /** All matching blocks, in document order */
  items(selector: string): PageDocument[]
}

export interface PageExtractor {
  /**
   * Fetch a page as HTML.
   * @throws TransportError after retries are exhausted
   */
  fetchHtml(url: string): Promise<string>

  load(html: string): PageDocument
}

// ═══════════════════════════════════════════════════════════════════════════════
// SiteAdapter Interface
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Scraping capability for one site.
 */
export interface SiteAdapter {
  /** Stable site key (e.g., 'ebay'), used as the map key everywhere */
  readonly id: string

  /**
   * Scrape a single product page.
   * Resolves null when required fields cannot be extracted.
   * @throws TransportError when the page cannot be fetched
   */
  scrapeOne(url: string): Promise<ProductRecord | null>

  /**
   * Search the site. Items that fail extraction or validation are skipped.
   * @throws TransportError when the search page cannot be fetched
   */
  search(query: string, maxResults: number): Promise<ProductRecord[]>
}

export interface SiteAdapterDeps {
  config: SiteConfig
  extractor: PageExtractor
  logger: ILogger
  /** Capture-time source; one monotonic clock per orchestrator */
  clock: () => string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Results
// ═══════════════════════════════════════════════════════════════════════════════

export type ScrapeResult =
  | { status: 'ok'; site: string; records: ProductRecord[] }
  | { status: 'failed'; site: string; records: []; error: FailureNote }

/** Per-site results keyed by site id, keys in ascending order */
export type SiteResults = Record<string, ScrapeResult>

export interface AggregateReport {
  query: string
  totalResults: number
  lowestPrice: number | null
  highestPrice: number | null
  averagePrice: number | null
  bestDeal: ProductRecord | null
  products: ProductRecord[]
  /** Sites whose search failed; their slots contributed nothing */
  failedSites: string[]
}

/**
 * Consumer-facing query surface.
 */
export interface PriceQuerySurface {
  listRegisteredSites(): string[]
  searchAll(query: string, maxResultsPerSite?: number): Promise<SiteResults>
  searchSubset(query: string, sites: string[], maxResultsPerSite?: number): Promise<SiteResults>
  searchAllCombined(query: string, maxResultsPerSite?: number): Promise<ProductRecord[]>
  scrapeUrl(url: string, site: string): Promise<ProductRecord | null>
  bestDeals(query: string, topN?: number, maxResultsPerSite?: number): Promise<ProductRecord[]>
  compare(query: string, maxResultsPerSite?: number): Promise<AggregateReport>
}
