import { setupServer } from 'msw/node'
import { afterAll, afterEach, beforeAll } from 'vitest'

/**
 * MSW (Mock Service Worker) setup for Vitest
 *
 * Tests register the Spotify handlers they need with `server.use`; any
 * request without a handler fails the test instead of leaving the process.
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
