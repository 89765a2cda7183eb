export interface BackoffOptions {
  baseDelayMs: number
  maxDelayMs: number
}

/**
 * Delay before the next delivery attempt after `attempts` failed attempts:
 * `min(base * 2^(attempts - 1), max)`. The first retry waits `base`.
 */
export function computeBackoff(
  attempts: number,
  { baseDelayMs, maxDelayMs }: BackoffOptions,
): number {
  const exponent = Math.max(0, attempts - 1)
  // 2^exponent overflows to Infinity long before it matters, min() caps it
  return Math.min(baseDelayMs * 2 ** exponent, maxDelayMs)
}
