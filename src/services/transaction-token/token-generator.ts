import { StaleAuthTokenError, StaleKeyError } from '@root/types/errors.js'
import type {
  SiteKeyCacheStatus,
  TokenIssuer,
  TransactionTokenStrategy,
} from '@root/types/transaction-token.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

/**
 * Issues transaction tokens through a swappable strategy.
 *
 * Stale key material is refreshed once, shared by every caller that hits
 * the stale cache at the same time.
 */
export class TokenGenerator implements TokenIssuer {
  private refreshing: Promise<void> | null = null
  private readonly log: FastifyBaseLogger

  constructor(
    private readonly strategy: TransactionTokenStrategy,
    baseLog: FastifyBaseLogger,
    private readonly now: () => number = Date.now,
  ) {
    this.log = createServiceLogger(baseLog, 'TRANSACTION_TOKEN')
  }

  get version(): string {
    return this.strategy.version
  }

  /**
   * Derives a token for one request.
   *
   * @throws StaleAuthTokenError when the material is still stale after a refresh
   */
  async issue(
    path: string,
    method: string,
    timestamp: number = this.now(),
  ): Promise<string> {
    try {
      return this.strategy.derive(path, method, timestamp)
    } catch (error) {
      if (!(error instanceof StaleKeyError)) throw error
      this.log.debug({ reason: error.message }, 'Key material stale')
    }

    await this.refreshOnce()

    try {
      return this.strategy.derive(path, method, timestamp)
    } catch (error) {
      if (error instanceof StaleKeyError) {
        throw new StaleAuthTokenError(
          `Key material still stale after refresh: ${error.message}`,
          undefined,
          { cause: error },
        )
      }
      throw error
    }
  }

  /**
   * Drops cached material and fetches new material.
   */
  async forceRefresh(signal?: AbortSignal): Promise<void> {
    this.strategy.invalidate()
    await this.refreshOnce(signal)
  }

  describe(): SiteKeyCacheStatus & { version: string } {
    return { version: this.strategy.version, ...this.strategy.describe() }
  }

  private refreshOnce(signal?: AbortSignal): Promise<void> {
    if (!this.refreshing) {
      this.refreshing = this.strategy.refresh(signal).finally(() => {
        this.refreshing = null
      })
    }
    return this.refreshing
  }
}
