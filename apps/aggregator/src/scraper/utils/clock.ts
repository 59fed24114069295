/**
 * Capture-time clock that never goes backwards, even if the wall clock does.
 * Records scraped within one process therefore have ordered timestamps.
 */
export function createMonotonicClock(now: () => number = Date.now): () => string {
  let lastIssuedMs = Number.NEGATIVE_INFINITY

  return () => {
    lastIssuedMs = Math.max(lastIssuedMs, now())
    return new Date(lastIssuedMs).toISOString()
  }
}
