import {
  StaleAuthTokenError,
  TransientNetworkError,
} from '@root/types/errors.js'
import type {
  NotificationIntake,
  NotificationSource,
  PollExecutor,
  PollOutcome,
  SeenItemStore,
} from '@root/types/poller.types.js'
import type {
  PlatformCredentials,
  Target,
} from '@root/types/target.types.js'
import type { TokenIssuer } from '@root/types/transaction-token.types.js'
import { isNewerThan, maxItemId } from '@utils/item-id.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export interface PollWorkerOptions {
  /** Probe the unread badge before fetching the timeline */
  badgeCheckEnabled: boolean
}

/**
 * Performs one poll of one target: probe, fetch, filter against the cursor,
 * record atomically, then hand the new items to the dispatcher intake.
 *
 * Items are handed over only after recordIfNew commits, so a crash in
 * between loses the notification rather than sending it twice.
 */
export class PollWorker implements PollExecutor {
  private readonly log: FastifyBaseLogger

  constructor(
    private readonly platform: NotificationSource,
    private readonly tokens: TokenIssuer,
    private readonly store: SeenItemStore,
    private readonly intake: NotificationIntake,
    private readonly options: PollWorkerOptions,
    baseLog: FastifyBaseLogger,
  ) {
    this.log = createServiceLogger(baseLog, 'POLL_WORKER')
  }

  async poll(target: Target, signal: AbortSignal): Promise<PollOutcome> {
    const credentials: PlatformCredentials = {
      authToken: target.auth_token,
      csrfToken: target.csrf_token,
    }

    if (this.options.badgeCheckEnabled) {
      const unread = await this.withTokenRetry(
        () => this.platform.getUnreadCount(credentials, signal),
        signal,
      )
      if (unread === 0) {
        this.log.debug({ targetId: target.id }, 'No unread notifications')
        return { newItems: [], cursor: target.cursor, skipped: true }
      }
    }

    const items = await this.withTokenRetry(
      () => this.platform.getNotifications(credentials, signal),
      signal,
    )

    const candidates = items.filter((item) => isNewerThan(item.id, target.cursor))
    if (candidates.length === 0) {
      return { newItems: [], cursor: target.cursor, skipped: false }
    }

    const newItems = await this.store.recordIfNew(target.id, candidates)
    const newest = maxItemId(newItems.map((item) => item.id))
    const cursor =
      newest !== null && isNewerThan(newest, target.cursor)
        ? newest
        : target.cursor

    if (newItems.length > 0) {
      this.log.info(
        { targetId: target.id, count: newItems.length },
        'Recorded new notifications',
      )
      await this.intake.enqueue(target, newItems)
    }

    return { newItems, cursor, skipped: false }
  }

  /**
   * Runs a platform call, and once more after a forced key refresh when the
   * platform rejects the token. A second rejection is reported as a
   * transient failure so the target simply waits for its next interval.
   */
  private async withTokenRetry<T>(
    call: () => Promise<T>,
    signal: AbortSignal,
  ): Promise<T> {
    try {
      return await call()
    } catch (error) {
      if (!(error instanceof StaleAuthTokenError)) throw error
      this.log.debug({ reason: error.message }, 'Token rejected, refreshing')
    }

    await this.tokens.forceRefresh(signal)

    try {
      return await call()
    } catch (error) {
      if (error instanceof StaleAuthTokenError) {
        throw new TransientNetworkError(
          `Token rejected again after refresh: ${error.message}`,
          error.status,
          { cause: error },
        )
      }
      throw error
    }
  }
}
