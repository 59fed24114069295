/**
 * Minimum-interval Rate Limiter
 *
 * Enforces a minimum delay between successive fetches of ONE adapter.
 * Each adapter owns its own instance, so adapters never wait on each other.
 *
 * Concurrent acquire() calls on the same instance are chained: each waiter
 * starts measuring only after the previous one was granted, which makes the
 * limiter a small per-adapter mutual-exclusion point.
 */

import type { RateLimiter } from '../types.js'

export interface MinIntervalRateLimiterOptions {
  /** Minimum delay between two grants in ms */
  minDelayMs: number

  /** Clock override (for testing) */
  now?: () => number

  /** Sleep override (for testing) */
  sleep?: (ms: number) => Promise<void>
}

export class MinIntervalRateLimiter implements RateLimiter {
  private readonly minDelayMs: number
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>

  private lastGrantedAt: number | null = null
  private tail: Promise<void> = Promise.resolve()

  constructor(options: MinIntervalRateLimiterOptions) {
    if (!Number.isFinite(options.minDelayMs) || options.minDelayMs < 0) {
      throw new RangeError(`minDelayMs must be >= 0, got ${options.minDelayMs}`)
    }

    this.minDelayMs = options.minDelayMs
    this.now = options.now ?? (() => Date.now())
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))
  }

  /**
   * Wait until at least minDelayMs has passed since the previous grant.
   */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot())
    // A rejected waiter must not wedge the queue; its caller still sees the rejection
    this.tail = turn.catch(() => undefined)
    return turn
  }

  /**
   * Time until the next grant could be made, 0 if immediately.
   */
  getWaitMs(): number {
    if (this.lastGrantedAt === null) return 0
    return Math.max(0, this.minDelayMs - (this.now() - this.lastGrantedAt))
  }

  private async waitForSlot(): Promise<void> {
    const waitMs = this.getWaitMs()
    if (waitMs > 0) {
      await this.sleep(waitMs)
    }
    this.lastGrantedAt = this.now()
  }
}
