import { HttpResponse, http } from 'msw'
import { describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'
import { server } from '../../setup/msw-setup.js'

const BASE_URL = 'http://platform.test'
const KEY = Buffer.from(Array.from({ length: 32 }, (_, i) => i))

function useHomeDocument() {
  let homeRequests = 0
  server.use(
    http.get(`${BASE_URL}/`, () => {
      homeRequests++
      return HttpResponse.text(`<html><head>
<meta name="site-verification" content="${KEY.toString('base64')}">
<link rel="verification-marker" href="/marker.txt">
</head></html>`)
    }),
    http.get(`${BASE_URL}/marker.txt`, () => HttpResponse.text('[1][2]')),
  )
  return () => homeRequests
}

describe('GET /token', () => {
  it('should load key material and derive a token', async (t) => {
    const homeRequests = useHomeDocument()
    const app = await build(t)

    const response = await app.inject({
      method: 'GET',
      url: '/token?path=/i/api/graphql/NotificationsTimeline',
    })

    expect(response.statusCode).toBe(200)
    const body = response.json()
    expect(body.header).toBe('x-client-transaction-id')
    expect(body.version).toBe('sk1')
    expect(body.token).toMatch(/^[A-Za-z0-9_-]{30}$/)
    expect(homeRequests()).toBe(1)
    expect(app.tokens.describe().cached).toBe(true)
  })

  it('should reuse cached key material unless forced', async (t) => {
    const homeRequests = useHomeDocument()
    const app = await build(t)

    await app.inject({ method: 'GET', url: '/token?path=/a' })
    await app.inject({ method: 'GET', url: '/token?path=/b&method=POST' })
    expect(homeRequests()).toBe(1)

    const forced = await app.inject({
      method: 'GET',
      url: '/token?path=/a&force=true',
    })

    expect(forced.statusCode).toBe(200)
    expect(homeRequests()).toBe(2)
  })

  it('should report a bad gateway when key material cannot be loaded', async (t) => {
    server.use(
      http.get(`${BASE_URL}/`, () => new HttpResponse(null, { status: 503 })),
    )
    const app = await build(t)

    const response = await app.inject({ method: 'GET', url: '/token?path=/a' })

    expect(response.statusCode).toBe(502)
    expect(response.json().statusCode).toBe(502)
  })

  it('should reject a path without a leading slash', async (t) => {
    const app = await build(t)

    const response = await app.inject({ method: 'GET', url: '/token?path=a' })

    expect(response.statusCode).toBe(400)
  })
})
