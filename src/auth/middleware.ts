import type { FastifyReply, FastifyRequest } from 'fastify'
import type { Authenticator, Credentials } from './authenticate.js'
import type { AuthenticatedUser } from './access.js'
import type { Logger } from '../lib/logger.js'
import { ApiError } from '../lib/api-errors.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Auth middleware hooks returned by createAuthMiddleware. */
export interface AuthMiddleware {
  /** Session cookie or PAT. */
  requireAuth: (request: FastifyRequest, reply: FastifyReply) => Promise<void>
  /** Session cookie only; PATs cannot manage PATs. */
  requireSession: (request: FastifyRequest, reply: FastifyReply) => Promise<void>
}

export interface AuthMiddlewareOptions {
  /** Name of the identity provider's session cookie. */
  sessionCookieName: string
}

// ---------------------------------------------------------------------------
// Extend Fastify's request type
// ---------------------------------------------------------------------------

declare module 'fastify' {
  interface FastifyRequest {
    /** Authenticated caller (set by requireAuth or requireSession). */
    user?: AuthenticatedUser
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create auth preHandler hooks.
 *
 * 401 when the credentials do not resolve, 502 when the session store or
 * database fails while resolving them. On success `request.user` is set.
 */
export function createAuthMiddleware(
  authenticator: Authenticator,
  logger: Logger,
  options: AuthMiddlewareOptions
): AuthMiddleware {
  function sessionCookie(request: FastifyRequest): string | undefined {
    return request.cookies[options.sessionCookieName]
  }

  async function run(
    request: FastifyRequest,
    reply: FastifyReply,
    credentials: Credentials
  ): Promise<void> {
    try {
      request.user = await authenticator.authenticate(credentials)
    } catch (err: unknown) {
      if (err instanceof ApiError && err.statusCode === 401) {
        await reply.status(401).send({ error: err.message })
        return
      }
      logger.error({ err, url: request.url }, 'Credential resolution failed')
      await reply.status(502).send({ error: 'Service temporarily unavailable' })
    }
  }

  async function requireAuth(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    await run(request, reply, {
      sessionToken: sessionCookie(request),
      authorization: request.headers.authorization,
    })
  }

  async function requireSession(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    await run(request, reply, { sessionToken: sessionCookie(request) })
  }

  return { requireAuth, requireSession }
}
