/**
 * HTTP Fetcher Implementation
 *
 * Uses native fetch API for HTTP requests.
 * Supports timeout, size limits, retries with exponential backoff, and an
 * optional rate limiter consulted before every attempt.
 */

import type { Fetcher, FetchOptions, FetchResult, RateLimiter, RetryPolicy } from '../types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS, DEFAULT_RETRY_POLICY } from '../types.js'

export interface HttpFetcherOptions {
  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  /** Acquired before every network attempt, retries included */
  rateLimiter?: RateLimiter
}

type AttemptResult = Omit<FetchResult, 'attempts'>

/**
 * HTTP-based fetcher using native fetch.
 */
export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly rateLimiter?: RateLimiter

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.rateLimiter = options.rateLimiter
  }

  /**
   * Fetch a URL and return the HTML content.
   * Never throws; failures come back as a non-ok status.
   */
  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    const startTime = Date.now()
    const opts = { ...DEFAULT_FETCH_OPTIONS, ...options }

    const headers = {
      ...DEFAULT_FETCH_HEADERS,
      ...(opts.headers ?? {}),
    }

    let lastError: Error | null = null

    for (let attempt = 1; attempt <= this.retryPolicy.maxAttempts; attempt++) {
      if (this.rateLimiter) {
        await this.rateLimiter.acquire()
      }

      try {
        const result = await this.fetchOnce(url, headers, opts, startTime)

        if (!this.shouldRetry(result) || attempt === this.retryPolicy.maxAttempts) {
          return { ...result, attempts: attempt }
        }
      } catch (error) {
        // Network errors are retried like retryable statuses
        lastError = error instanceof Error ? error : new Error(String(error))
      }

      if (attempt < this.retryPolicy.maxAttempts) {
        await this.sleep(this.backoffDelay(attempt))
      }
    }

    // All retries exhausted on network errors
    return {
      status: 'error',
      attempts: this.retryPolicy.maxAttempts,
      durationMs: Date.now() - startTime,
      error: lastError?.message ?? 'Unknown error after retries',
    }
  }

  /**
   * Delay before the attempt after `attempt`, capped at maxDelayMs.
   */
  backoffDelay(attempt: number): number {
    return Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
      this.retryPolicy.maxDelayMs
    )
  }

  private shouldRetry(result: AttemptResult): boolean {
    if (result.status === 'timeout') return true
    return (
      result.status === 'error' &&
      result.statusCode !== undefined &&
      this.retryPolicy.retryableStatusCodes.includes(result.statusCode)
    )
  }

  /**
   * Single fetch attempt (no retries). Throws on network errors.
   */
  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    opts: FetchOptions,
    startTime: number
  ): Promise<AttemptResult> {
    const timeoutMs = opts.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs
    const maxSizeBytes = opts.maxSizeBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        return {
          status: 'error',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      // Check content length header for early size check
      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > maxSizeBytes) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const html = await this.readBodyWithLimit(response, maxSizeBytes)
      if (html === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        html,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${timeoutMs}ms`,
        }
      }

      throw error
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
  }
}
