import type { FastifyReply, FastifyRequest } from 'fastify'
import type { AuthMiddleware } from './middleware.js'
import type { Logger } from '../lib/logger.js'
import { isModerator } from './access.js'
import { toBase62 } from '../lib/base62.js'

/**
 * Create a requireModerator preHandler hook for Fastify routes.
 *
 * Runs requireAuth first (401 on failure), then answers 403 unless the caller
 * is a moderator or admin. Denials and grants are logged for the audit trail.
 *
 * @param authMiddleware - Auth middleware with requireAuth hook
 * @param logger - Optional Pino logger for audit trail
 */
export function createRequireModerator(
  authMiddleware: AuthMiddleware,
  logger?: Logger
): (request: FastifyRequest, reply: FastifyReply) => Promise<void> {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    await authMiddleware.requireAuth(request, reply)

    // requireAuth already answered (401/502)
    if (reply.sent) {
      return
    }

    const user = request.user
    if (!user || !isModerator(user)) {
      logger?.warn(
        {
          userId: user ? toBase62(user.id) : undefined,
          role: user?.role,
          url: request.url,
          method: request.method,
        },
        'Moderator access denied'
      )
      await reply.status(403).send({ error: 'Moderator access required' })
      return
    }

    logger?.info(
      { userId: toBase62(user.id), role: user.role, url: request.url, method: request.method },
      'Moderator access granted'
    )
  }
}
