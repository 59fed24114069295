/**
 * Cheerio Page Extractor
 *
 * Fetches pages through a Fetcher and exposes selector-based reads.
 * Selector lists ("h1.title, .product-name") are tried left to right and
 * the first selector with a match wins, so a list encodes fallbacks.
 */

import * as cheerio from 'cheerio'
import type { Fetcher, PageDocument, PageExtractor } from '../types.js'
import { ExtractionError, TransportError } from '../errors.js'
import { sanitizeText } from '../process/validator.js'

type Selection = ReturnType<ReturnType<cheerio.CheerioAPI['root']>['find']>

export function splitSelectorList(selector: string): string[] {
  return selector
    .split(',')
    .map(part => part.trim())
    .filter(Boolean)
}

/**
 * A parsed page or one block within it.
 */
export class CheerioDocument implements PageDocument {
  constructor(
    private readonly $: cheerio.CheerioAPI,
    private readonly scope: Selection
  ) {}

  text(selector: string): string | null {
    for (const candidate of splitSelectorList(selector)) {
      const match = this.select(candidate).first()
      if (match.length > 0) {
        return sanitizeText(match.text())
      }
    }
    return null
  }

  attr(selector: string, name: string): string | null {
    for (const candidate of splitSelectorList(selector)) {
      const value = this.select(candidate).first().attr(name)
      if (value !== undefined) {
        return value.trim()
      }
    }
    return null
  }

  has(selector: string): boolean {
    return this.select(selector).length > 0
  }

  items(selector: string): PageDocument[] {
    return this.select(selector)
      .toArray()
      .map(element => new CheerioDocument(this.$, this.$(element)))
  }

  private select(selector: string): Selection {
    try {
      return this.scope.find(selector)
    } catch (error) {
      throw new ExtractionError(selector, error)
    }
  }
}

export interface CheerioPageExtractorOptions {
  fetcher: Fetcher

  /** Per-request timeout in ms */
  timeoutMs?: number

  /** Overrides the default User-Agent header */
  userAgent?: string
}

export class CheerioPageExtractor implements PageExtractor {
  private readonly fetcher: Fetcher
  private readonly timeoutMs?: number
  private readonly headers?: Record<string, string>

  constructor(options: CheerioPageExtractorOptions) {
    this.fetcher = options.fetcher
    this.timeoutMs = options.timeoutMs
    this.headers = options.userAgent ? { 'User-Agent': options.userAgent } : undefined
  }

  async fetchHtml(url: string): Promise<string> {
    const result = await this.fetcher.fetch(url, {
      timeoutMs: this.timeoutMs,
      headers: this.headers,
    })

    if (result.status !== 'ok' || result.html === undefined) {
      throw new TransportError(url, {
        message: result.error ?? result.status,
        statusCode: result.statusCode,
        attempts: result.attempts,
      })
    }

    return result.html
  }

  load(html: string): PageDocument {
    const $ = cheerio.load(html)
    return new CheerioDocument($, $.root().children())
  }
}
