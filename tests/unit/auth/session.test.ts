import { describe, it, expect, vi } from 'vitest'
import crypto from 'node:crypto'
import { createSessionService } from '../../../src/auth/session.js'
import type { Cache } from '../../../src/cache/index.js'
import { createMockLogger } from '../../helpers/logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createMockCache() {
  const getFn = vi.fn<(...args: unknown[]) => Promise<string | null>>().mockResolvedValue(null)
  return {
    cache: { get: getFn } as unknown as Cache,
    getFn,
  }
}

function sha256(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex')
}

const TEST_TOKEN = 'test-session-token'
const TEST_KEY = `moderation:session:${sha256(TEST_TOKEN)}`

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('validateSession', () => {
  it('returns the stored session', async () => {
    const { cache, getFn } = createMockCache()
    const { logger } = createMockLogger()
    getFn.mockResolvedValueOnce(JSON.stringify({ userId: '10', createdAt: 1700000000000 }))
    const service = createSessionService(cache, logger)

    await expect(service.validateSession(TEST_TOKEN)).resolves.toEqual({
      userId: 62n,
      createdAt: 1700000000000,
    })
    expect(getFn).toHaveBeenCalledWith(TEST_KEY)
  })

  it('returns undefined for an unknown token', async () => {
    const { cache } = createMockCache()
    const { logger } = createMockLogger()
    const service = createSessionService(cache, logger)

    await expect(service.validateSession(TEST_TOKEN)).resolves.toBeUndefined()
  })

  it('discards malformed session data', async () => {
    const { cache, getFn } = createMockCache()
    const { logger, warnFn } = createMockLogger()
    getFn.mockResolvedValueOnce(JSON.stringify({ userId: 10 }))
    const service = createSessionService(cache, logger)

    await expect(service.validateSession(TEST_TOKEN)).resolves.toBeUndefined()
    expect(warnFn).toHaveBeenCalledWith(
      { tokenHash: sha256(TEST_TOKEN).slice(0, 8) },
      'Discarding malformed session data'
    )
  })

  it('logs and rethrows cache failures', async () => {
    const { cache, getFn } = createMockCache()
    const { logger, errorFn } = createMockLogger()
    getFn.mockRejectedValueOnce(new Error('cache down'))
    const service = createSessionService(cache, logger)

    await expect(service.validateSession(TEST_TOKEN)).rejects.toThrow('cache down')
    expect(errorFn).toHaveBeenCalledTimes(1)
  })
})
