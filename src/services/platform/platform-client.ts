/**
 * Platform Client
 *
 * Authenticated GET requests against the platform API on behalf of a
 * target. Every request carries a freshly issued transaction token, and
 * every failure is mapped onto the error taxonomy the poll scheduler acts
 * on:
 * - 403/404: StaleAuthTokenError (the token was rejected)
 * - 429: RateLimitError with the Retry-After hint
 * - other non-2xx, network errors, unreadable bodies: TransientNetworkError
 */
import {
  RateLimitError,
  StaleAuthTokenError,
  TransientNetworkError,
} from '@root/types/errors.js'
import type { PlatformItem } from '@root/types/platform.types.js'
import type { NotificationSource } from '@root/types/poller.types.js'
import type { PlatformCredentials } from '@root/types/target.types.js'
import type { TokenIssuer } from '@root/types/transaction-token.types.js'
import { createServiceLogger } from '@utils/logger.js'
import { parseRetryAfter } from '@utils/retry-after.js'
import { USER_AGENT } from '@utils/version.js'
import type { FastifyBaseLogger } from 'fastify'
import { BadgeCountSchema, parseTimeline } from './timeline-parser.js'

export interface PlatformClientOptions {
  baseUrl: string
  /** Sent as `Authorization: Bearer ...` when non-empty */
  bearerToken: string
  badgePath: string
  notificationsPath: string
  requestTimeoutMs: number
  tokenHeaderName: string
  /** Number of timeline entries requested per poll */
  pageSize?: number
}

export class PlatformClient implements NotificationSource {
  private readonly log: FastifyBaseLogger

  constructor(
    private readonly options: PlatformClientOptions,
    private readonly tokens: TokenIssuer,
    baseLog: FastifyBaseLogger,
  ) {
    this.log = createServiceLogger(baseLog, 'PLATFORM')
  }

  /**
   * Reads the unread notification count from the badge endpoint.
   */
  async getUnreadCount(
    credentials: PlatformCredentials,
    signal?: AbortSignal,
  ): Promise<number> {
    const body = await this.request(
      this.options.badgePath,
      new URLSearchParams({ supports_ntab_urt: '1' }),
      credentials,
      signal,
    )
    const parsed = BadgeCountSchema.safeParse(body)
    if (!parsed.success) {
      throw new TransientNetworkError('Unexpected badge count response shape')
    }
    return parsed.data.ntab_unread_count
  }

  /**
   * Fetches the newest notification items, newest first.
   */
  async getNotifications(
    credentials: PlatformCredentials,
    signal?: AbortSignal,
  ): Promise<PlatformItem[]> {
    const variables = {
      count: this.options.pageSize ?? 20,
      includePromotedContent: false,
    }
    const body = await this.request(
      this.options.notificationsPath,
      new URLSearchParams({ variables: JSON.stringify(variables) }),
      credentials,
      signal,
    )
    return parseTimeline(body, this.options.baseUrl)
  }

  private buildHeaders(
    credentials: PlatformCredentials,
    token: string,
  ): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: '*/*',
      'Content-Type': 'application/json',
      'User-Agent': USER_AGENT,
      'x-csrf-token': credentials.csrfToken,
      Cookie: `auth_token=${credentials.authToken}; ct0=${credentials.csrfToken}`,
      [this.options.tokenHeaderName]: token,
    }
    if (this.options.bearerToken) {
      headers.Authorization = `Bearer ${this.options.bearerToken}`
    }
    return headers
  }

  private async request(
    path: string,
    query: URLSearchParams,
    credentials: PlatformCredentials,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const url = new URL(path, this.options.baseUrl)
    url.search = query.toString()

    const token = await this.tokens.issue(url.pathname, 'GET')
    const timeout = AbortSignal.timeout(this.options.requestTimeoutMs)

    let response: Response
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: this.buildHeaders(credentials, token),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      })
    } catch (error) {
      throw new TransientNetworkError(
        `Request to ${url.pathname} failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error },
      )
    }

    if (response.status === 403 || response.status === 404) {
      this.log.debug(
        { path: url.pathname, status: response.status },
        'Platform rejected transaction token',
      )
      throw new StaleAuthTokenError(
        `Platform rejected request to ${url.pathname} (HTTP ${response.status})`,
        response.status,
      )
    }

    if (response.status === 429) {
      throw new RateLimitError(
        `Platform rate limited ${url.pathname}`,
        parseRetryAfter(response.headers.get('retry-after')),
      )
    }

    if (!response.ok) {
      throw new TransientNetworkError(
        `Platform error on ${url.pathname}: HTTP ${response.status}`,
        response.status,
      )
    }

    try {
      return await response.json()
    } catch (error) {
      throw new TransientNetworkError(
        `Malformed JSON from ${url.pathname}`,
        response.status,
        { cause: error },
      )
    }
  }
}
