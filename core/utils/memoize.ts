/**
 * Cache the promise of an async computation on first call.
 *
 * A rejection is cached as well, so repeated calls report the same failure.
 *
 * @param compute - Computation to run once.
 * @returns Function returning the cached promise.
 */
export function memoize<T>(compute: () => Promise<T>): () => Promise<T> {
  let cached: Promise<T> | null = null
  return () => {
    cached ??= compute()
    return cached
  }
}
