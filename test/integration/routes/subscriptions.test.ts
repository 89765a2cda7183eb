import type { FastifyInstance } from 'fastify'
import { describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'

async function registerTarget(app: FastifyInstance): Promise<number> {
  const { target } = await app.db.upsertTarget({
    handle: 'alice',
    auth_token: 'test-auth-token',
    csrf_token: 'test-csrf-token',
  })
  return target.id
}

describe('Subscriptions API', () => {
  describe('POST /subscriptions', () => {
    it('should generate a signing secret when none is given', async (t) => {
      const app = await build(t)
      const targetId = await registerTarget(app)

      const response = await app.inject({
        method: 'POST',
        url: '/subscriptions',
        payload: { targetId, endpoint: 'http://push.test/up/a' },
      })

      expect(response.statusCode).toBe(201)
      const { subscription } = response.json()
      expect(subscription).toMatchObject({
        targetId,
        endpoint: 'http://push.test/up/a',
      })
      expect(subscription.secret).toMatch(/^[0-9a-f]{64}$/)
    })

    it('should keep a secret supplied by the subscriber', async (t) => {
      const app = await build(t)
      const targetId = await registerTarget(app)

      const response = await app.inject({
        method: 'POST',
        url: '/subscriptions',
        payload: {
          targetId,
          endpoint: 'https://push.test/up/b',
          secret: 'test-secret-0123456789',
        },
      })

      expect(response.statusCode).toBe(201)
      const { subscription } = response.json()
      expect(subscription.secret).toBe('test-secret-0123456789')
      const [stored] = await app.db.getSubscriptionsForTarget(targetId)
      expect(stored.secret).toBe('test-secret-0123456789')
    })

    it('should return 404 for an unknown target', async (t) => {
      const app = await build(t)

      const response = await app.inject({
        method: 'POST',
        url: '/subscriptions',
        payload: { targetId: 999, endpoint: 'http://push.test/up/a' },
      })

      expect(response.statusCode).toBe(404)
      expect(response.json().message).toBe('Target not found')
    })

    it('should reject an endpoint that is not an http(s) URL', async (t) => {
      const app = await build(t)
      const targetId = await registerTarget(app)

      const response = await app.inject({
        method: 'POST',
        url: '/subscriptions',
        payload: { targetId, endpoint: 'ftp://push.test/up/a' },
      })

      expect(response.statusCode).toBe(400)
    })

    it('should reject a short secret', async (t) => {
      const app = await build(t)
      const targetId = await registerTarget(app)

      const response = await app.inject({
        method: 'POST',
        url: '/subscriptions',
        payload: {
          targetId,
          endpoint: 'http://push.test/up/a',
          secret: 'short',
        },
      })

      expect(response.statusCode).toBe(400)
    })
  })

  describe('DELETE /subscriptions/:id', () => {
    it('should delete a subscription once', async (t) => {
      const app = await build(t)
      const targetId = await registerTarget(app)
      const subscription = await app.db.createSubscription({
        target_id: targetId,
        endpoint: 'http://push.test/up/a',
        secret: 'test-secret-0123456789',
      })

      const first = await app.inject({
        method: 'DELETE',
        url: `/subscriptions/${subscription.id}`,
      })
      const second = await app.inject({
        method: 'DELETE',
        url: `/subscriptions/${subscription.id}`,
      })

      expect(first.statusCode).toBe(204)
      expect(second.statusCode).toBe(404)
      expect(second.json().message).toBe('Subscription not found')
    })
  })
})
