const DECIMAL = /^\d+$/

/**
 * Orders opaque notification item ids.
 *
 * Purely decimal ids compare numerically (length first, so ids longer than
 * a double can hold still order correctly). Any other pair falls back to a
 * plain string comparison.
 *
 * @returns negative, zero or positive, like a sort comparator
 */
export function compareItemIds(a: string, b: string): number {
  if (DECIMAL.test(a) && DECIMAL.test(b)) {
    const left = a.replace(/^0+(?=\d)/, '')
    const right = b.replace(/^0+(?=\d)/, '')
    if (left.length !== right.length) return left.length - right.length
    return left < right ? -1 : left > right ? 1 : 0
  }
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * True when `id` is strictly newer than `cursor`. A null cursor accepts
 * every id.
 */
export function isNewerThan(id: string, cursor: string | null): boolean {
  return cursor === null || compareItemIds(id, cursor) > 0
}

/**
 * Returns the greatest id, or null for an empty list.
 */
export function maxItemId(ids: Iterable<string>): string | null {
  let max: string | null = null
  for (const id of ids) {
    if (max === null || compareItemIds(id, max) > 0) max = id
  }
  return max
}
