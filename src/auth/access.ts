import type { UserRole } from '../db/schema/users.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** How the caller proved its identity. */
export type AuthMethod = 'session' | 'pat'

/** Caller identity attached to authenticated requests. */
export interface AuthenticatedUser {
  id: bigint
  username: string
  role: UserRole
  method: AuthMethod
}

/** The report fields access decisions depend on. */
export interface ReportOwnership {
  reporter: bigint
  /** Set only when the report targets a user account. */
  targetUserId: bigint | null
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

/** Moderators and admins both moderate. */
export function isModerator(user: Pick<AuthenticatedUser, 'role'>): boolean {
  return user.role === 'moderator' || user.role === 'admin'
}

/** Moderators see every report; everyone else only the ones they filed. */
export function canViewReport(user: AuthenticatedUser, report: ReportOwnership): boolean {
  return isModerator(user) || report.reporter === user.id
}

/**
 * Edit access keys on the reported user, not the reporter.
 * TODO(product): confirm whether reporters should be able to edit their own
 * reports; today only the reported account (and moderators) can.
 */
export function canEditReport(user: AuthenticatedUser, report: ReportOwnership): boolean {
  return isModerator(user) || report.targetUserId === user.id
}
