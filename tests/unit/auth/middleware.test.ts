import { describe, it, expect, vi, beforeEach } from 'vitest'
import Fastify from 'fastify'
import cookie from '@fastify/cookie'
import { createAuthMiddleware } from '../../../src/auth/middleware.js'
import type { Authenticator, Credentials } from '../../../src/auth/authenticate.js'
import type { AuthenticatedUser } from '../../../src/auth/access.js'
import { unauthorized } from '../../../src/lib/api-errors.js'
import { createMockLogger } from '../../helpers/logger.js'

const TEST_USER: AuthenticatedUser = { id: 42n, username: 'alice', role: 'developer', method: 'session' }

const authenticateFn = vi.fn<(credentials: Credentials) => Promise<AuthenticatedUser>>()
const authenticator: Authenticator = { authenticate: authenticateFn }

async function buildTestApp() {
  const { logger, errorFn } = createMockLogger()
  const middleware = createAuthMiddleware(authenticator, logger, { sessionCookieName: 'session' })

  const app = Fastify({ logger: false })
  await app.register(cookie)
  app.get('/any', { preHandler: [middleware.requireAuth] }, (request) => ({
    username: request.user?.username,
  }))
  app.get('/session-only', { preHandler: [middleware.requireSession] }, (request) => ({
    username: request.user?.username,
  }))
  await app.ready()
  return { app, errorFn }
}

describe('createAuthMiddleware', () => {
  beforeEach(() => {
    authenticateFn.mockReset()
  })

  it('passes the cookie and Authorization header to the authenticator', async () => {
    authenticateFn.mockResolvedValueOnce(TEST_USER)
    const { app } = await buildTestApp()

    const response = await app.inject({
      method: 'GET',
      url: '/any',
      cookies: { session: 'test-session' },
      headers: { authorization: 'Bearer test-token' },
    })

    expect(response.statusCode).toBe(200)
    expect(response.json()).toEqual({ username: 'alice' })
    expect(authenticateFn).toHaveBeenCalledWith({
      sessionToken: 'test-session',
      authorization: 'Bearer test-token',
    })
  })

  it('ignores the Authorization header on session-only routes', async () => {
    authenticateFn.mockResolvedValueOnce(TEST_USER)
    const { app } = await buildTestApp()

    await app.inject({
      method: 'GET',
      url: '/session-only',
      headers: { authorization: 'Bearer test-token' },
    })

    expect(authenticateFn).toHaveBeenCalledWith({ sessionToken: undefined })
  })

  it('answers 401 with the authenticator message', async () => {
    authenticateFn.mockRejectedValueOnce(unauthorized('Authentication required'))
    const { app } = await buildTestApp()

    const response = await app.inject({ method: 'GET', url: '/any' })

    expect(response.statusCode).toBe(401)
    expect(response.json()).toEqual({ error: 'Authentication required' })
  })

  it('answers 502 when credential resolution fails', async () => {
    authenticateFn.mockRejectedValueOnce(new Error('cache down'))
    const { app, errorFn } = await buildTestApp()

    const response = await app.inject({ method: 'GET', url: '/any' })

    expect(response.statusCode).toBe(502)
    expect(response.json()).toEqual({ error: 'Service temporarily unavailable' })
    expect(errorFn).toHaveBeenCalledTimes(1)
  })
})
