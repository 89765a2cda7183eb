import { setupServer } from 'msw/node'
import { afterAll, afterEach, beforeAll } from 'vitest'

/**
 * MSW (Mock Service Worker) setup for Vitest
 *
 * No default handlers: every test registers the platform or subscriber
 * endpoints it talks to, and any other request fails the test.
 *
 * @see https://mswjs.io/docs/integrations/node
 */
export const server = setupServer()

beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' })
})

afterEach(() => {
  server.resetHandlers()
})

afterAll(() => {
  server.close()
})
