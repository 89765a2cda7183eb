/**
 * A strategy that derives the per-request transaction token.
 *
 * The platform's algorithm is undocumented and changes without notice, so
 * every implementation sits behind this interface and can be swapped without
 * touching the poller.
 */
export interface TransactionTokenStrategy {
  /** Identifier of the derivation scheme, reported on the status route */
  readonly version: string

  /**
   * Derives a token from cached key material.
   * Throws StaleKeyError when the material is missing or past its TTL.
   */
  derive(path: string, method: string, timestamp: number): string

  /** Fetches fresh key material from the platform */
  refresh(signal?: AbortSignal): Promise<void>

  /** Drops cached key material so the next derive fails as stale */
  invalidate(): void

  describe(): SiteKeyCacheStatus
}

export interface SiteKeyCacheStatus {
  cached: boolean
  fetchedAt: Date | null
  expiresAt: Date | null
}

/**
 * Rotating verification material read from the platform.
 */
export interface SiteKeyCache {
  key: Buffer
  indices: number[]
  fetchedAt: number
  ttlMs: number
}

export interface TokenIssuer {
  issue(path: string, method: string, timestamp?: number): Promise<string>
  forceRefresh(signal?: AbortSignal): Promise<void>
}
