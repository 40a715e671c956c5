import { Redis } from 'ioredis'
import type { Logger } from '../lib/logger.js'

/**
 * Valkey client holding identity-provider sessions. Connects lazily so the
 * app can boot (and answer /api/health) before the cache is reachable.
 */
export function createCache(valkeyUrl: string, logger: Logger) {
  const cache = new Redis(valkeyUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy(times: number) {
      return Math.min(times * 200, 2000)
    },
    lazyConnect: true,
  })

  cache.on('error', (err: Error) => {
    logger.error({ err }, 'Valkey connection error')
  })

  cache.on('ready', () => {
    logger.info('Valkey ready')
  })

  return cache
}

export type Cache = ReturnType<typeof createCache>
