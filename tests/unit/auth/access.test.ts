import { describe, it, expect } from 'vitest'
import { canEditReport, canViewReport, isModerator } from '../../../src/auth/access.js'
import type { AuthenticatedUser } from '../../../src/auth/access.js'

const REPORTER_ID = 1001n
const TARGET_ID = 1002n
const OTHER_ID = 1003n

function user(id: bigint, role: AuthenticatedUser['role'] = 'developer'): AuthenticatedUser {
  return { id, username: `user-${String(id)}`, role, method: 'session' }
}

describe('isModerator', () => {
  it('accepts moderators and admins', () => {
    expect(isModerator({ role: 'moderator' })).toBe(true)
    expect(isModerator({ role: 'admin' })).toBe(true)
  })

  it('rejects developers', () => {
    expect(isModerator({ role: 'developer' })).toBe(false)
  })
})

describe('canViewReport', () => {
  const report = { reporter: REPORTER_ID, targetUserId: TARGET_ID }

  it('lets the reporter view', () => {
    expect(canViewReport(user(REPORTER_ID), report)).toBe(true)
  })

  it('lets a moderator view any report', () => {
    expect(canViewReport(user(OTHER_ID, 'moderator'), report)).toBe(true)
  })

  it('hides the report from the reported user', () => {
    expect(canViewReport(user(TARGET_ID), report)).toBe(false)
  })

  it('hides the report from everyone else', () => {
    expect(canViewReport(user(OTHER_ID), report)).toBe(false)
  })
})

describe('canEditReport', () => {
  it('lets the reported user edit', () => {
    expect(canEditReport(user(TARGET_ID), { reporter: REPORTER_ID, targetUserId: TARGET_ID })).toBe(true)
  })

  it('does not let the reporter edit', () => {
    expect(canEditReport(user(REPORTER_ID), { reporter: REPORTER_ID, targetUserId: TARGET_ID })).toBe(false)
  })

  it('lets an admin edit', () => {
    expect(canEditReport(user(OTHER_ID, 'admin'), { reporter: REPORTER_ID, targetUserId: null })).toBe(true)
  })

  it('denies non-moderators when the report targets no user', () => {
    expect(canEditReport(user(REPORTER_ID), { reporter: REPORTER_ID, targetUserId: null })).toBe(false)
  })
})
