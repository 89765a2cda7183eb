import { describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'

describe('GET /health', () => {
  it('should report healthy with database and scheduler checks', async (t) => {
    const app = await build(t)

    const response = await app.inject({ method: 'GET', url: '/health' })

    expect(response.statusCode).toBe(200)
    const body = response.json()
    expect(body).toMatchObject({
      status: 'healthy',
      checks: { database: 'ok', scheduler: 'ok' },
      targets: 0,
    })
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false)
  })

  it('should count registered targets', async (t) => {
    const app = await build(t)
    await app.db.upsertTarget({
      handle: 'alice',
      auth_token: 'test-auth-token',
      csrf_token: 'test-csrf-token',
    })

    const response = await app.inject({ method: 'GET', url: '/health' })

    expect(response.json().targets).toBe(1)
  })

  it('should report unhealthy once the scheduler has stopped', async (t) => {
    const app = await build(t)
    app.scheduler.stop()

    const response = await app.inject({ method: 'GET', url: '/health' })

    expect(response.statusCode).toBe(503)
    expect(response.json()).toMatchObject({
      status: 'unhealthy',
      checks: { database: 'ok', scheduler: 'stopped' },
    })
  })
})
