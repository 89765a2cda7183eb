/**
 * Parses a Retry-After header into milliseconds from `now`.
 *
 * Accepts delta-seconds ("120") and HTTP dates. Returns undefined when the
 * header is missing or unparseable. Dates in the past yield 0.
 */
export function parseRetryAfter(
  header: string | null | undefined,
  now: number = Date.now(),
): number | undefined {
  if (!header) return undefined
  const value = header.trim()

  if (/^\d+$/.test(value)) {
    return Number.parseInt(value, 10) * 1000
  }

  const date = Date.parse(value)
  if (Number.isNaN(date)) return undefined
  return Math.max(0, date - now)
}
