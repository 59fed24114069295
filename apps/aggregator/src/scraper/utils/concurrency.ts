/**
 * Bounded worker pool.
 *
 * Runs `worker` over `items` with at most `limit` calls in flight. When a
 * call settles, its slot takes the next queued item. Results keep the input
 * order regardless of completion order.
 *
 * A rejected call rejects the whole map, so workers that must not abort
 * their siblings catch their own failures.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`)
  }

  const results = new Array<R>(items.length)
  let nextIndex = 0

  const runSlot = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++
      results[index] = await worker(items[index], index)
    }
  }

  const slots = Array.from({ length: Math.min(limit, items.length) }, () => runSlot())
  await Promise.all(slots)

  return results
}
