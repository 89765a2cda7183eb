import {
  RateLimitError,
  StaleAuthTokenError,
  TransientNetworkError,
} from '@root/types/errors.js'
import type { TokenIssuer } from '@root/types/transaction-token.types.js'
import { PlatformClient } from '@services/platform/platform-client.js'
import { HttpResponse, http } from 'msw'
import { type Mock, beforeEach, describe, expect, it, vi } from 'vitest'
import timeline from '../../../fixtures/timeline.json' with { type: 'json' }
import { createMockLogger } from '../../../mocks/logger.js'
import { server } from '../../../setup/msw-setup.js'

const BASE_URL = 'http://platform.test'
const BADGE_URL = `${BASE_URL}/i/api/badge.json`
const TIMELINE_URL = `${BASE_URL}/i/api/graphql/Notifications`

const credentials = {
  authToken: 'test-auth-token',
  csrfToken: 'test-csrf-token',
}

describe('PlatformClient', () => {
  let tokens: {
    issue: Mock<TokenIssuer['issue']>
    forceRefresh: Mock<TokenIssuer['forceRefresh']>
  }

  const createClient = (bearerToken = '') =>
    new PlatformClient(
      {
        baseUrl: BASE_URL,
        bearerToken,
        badgePath: '/i/api/badge.json',
        notificationsPath: '/i/api/graphql/Notifications',
        requestTimeoutMs: 1000,
        tokenHeaderName: 'x-test-transaction',
      },
      tokens,
      createMockLogger(),
    )

  beforeEach(() => {
    tokens = {
      issue: vi.fn<TokenIssuer['issue']>(async (path) => `token-for-${path}`),
      forceRefresh: vi.fn<TokenIssuer['forceRefresh']>(async () => {}),
    }
  })

  describe('getUnreadCount', () => {
    it('should send session credentials and the transaction token', async () => {
      let captured: Request | undefined
      server.use(
        http.get(BADGE_URL, ({ request }) => {
          captured = request
          return HttpResponse.json({ ntab_unread_count: 4, dm_unread_count: 1 })
        }),
      )

      await expect(createClient().getUnreadCount(credentials)).resolves.toBe(4)

      expect(tokens.issue).toHaveBeenCalledWith('/i/api/badge.json', 'GET')
      expect(captured?.url).toBe(`${BADGE_URL}?supports_ntab_urt=1`)
      expect(captured?.headers.get('x-test-transaction')).toBe(
        'token-for-/i/api/badge.json',
      )
      expect(captured?.headers.get('x-csrf-token')).toBe('test-csrf-token')
      expect(captured?.headers.get('cookie')).toBe(
        'auth_token=test-auth-token; ct0=test-csrf-token',
      )
      expect(captured?.headers.get('user-agent')).toMatch(/^xitter-notify\//)
      expect(captured?.headers.get('authorization')).toBeNull()
    })

    it('should send the bearer token when one is configured', async () => {
      let authorization: string | null = null
      server.use(
        http.get(BADGE_URL, ({ request }) => {
          authorization = request.headers.get('authorization')
          return HttpResponse.json({ ntab_unread_count: 0 })
        }),
      )

      await createClient('test-bearer').getUnreadCount(credentials)

      expect(authorization).toBe('Bearer test-bearer')
    })

    it('should default a missing count to zero', async () => {
      server.use(http.get(BADGE_URL, () => HttpResponse.json({})))

      await expect(createClient().getUnreadCount(credentials)).resolves.toBe(0)
    })
  })

  describe('getNotifications', () => {
    it('should request one page of the timeline and parse it', async () => {
      let variables: string | null = null
      server.use(
        http.get(TIMELINE_URL, ({ request }) => {
          variables = new URL(request.url).searchParams.get('variables')
          return HttpResponse.json(timeline)
        }),
      )

      const items = await createClient().getNotifications(credentials)

      expect(variables).toBe('{"count":20,"includePromotedContent":false}')
      expect(items.map((item) => item.id)).toEqual([
        '1790000000000000003',
        '1790000000000000002',
        '1790000000000000001',
      ])
      expect(items[1].url).toBe('http://platform.test/i/status/4242')
    })
  })

  describe('error mapping', () => {
    it.each([403, 404])(
      'should treat HTTP %i as a rejected token',
      async (status) => {
        server.use(
          http.get(TIMELINE_URL, () => new HttpResponse(null, { status })),
        )

        const error = await createClient()
          .getNotifications(credentials)
          .catch((e: unknown) => e)

        expect(error).toBeInstanceOf(StaleAuthTokenError)
        expect(error).toMatchObject({ status })
      },
    )

    it('should carry the retry-after hint of a 429', async () => {
      server.use(
        http.get(
          TIMELINE_URL,
          () =>
            new HttpResponse(null, {
              status: 429,
              headers: { 'Retry-After': '30' },
            }),
        ),
      )

      const error = await createClient()
        .getNotifications(credentials)
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(RateLimitError)
      expect(error).toMatchObject({ retryAfterMs: 30000, status: 429 })
    })

    it('should treat other error statuses as transient', async () => {
      server.use(
        http.get(TIMELINE_URL, () => new HttpResponse(null, { status: 502 })),
      )

      await expect(
        createClient().getNotifications(credentials),
      ).rejects.toThrow(
        new TransientNetworkError(
          'Platform error on /i/api/graphql/Notifications: HTTP 502',
        ),
      )
    })

    it('should treat a network failure as transient', async () => {
      server.use(http.get(TIMELINE_URL, () => HttpResponse.error()))

      const error = await createClient()
        .getNotifications(credentials)
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(TransientNetworkError)
    })

    it('should treat an unreadable body as transient', async () => {
      server.use(
        http.get(TIMELINE_URL, () => HttpResponse.text('<html></html>')),
      )

      await expect(
        createClient().getNotifications(credentials),
      ).rejects.toThrow('Malformed JSON from /i/api/graphql/Notifications')
    })

    it('should not issue a request when the token cannot be derived', async () => {
      tokens.issue.mockRejectedValue(
        new StaleAuthTokenError('Key material still stale after refresh'),
      )

      await expect(createClient().getUnreadCount(credentials)).rejects.toThrow(
        StaleAuthTokenError,
      )
    })
  })
})
