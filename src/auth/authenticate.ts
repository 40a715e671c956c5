import { eq } from "drizzle-orm";
import type { Database } from "../db/index.js";
import type { Logger } from "../lib/logger.js";
import type { SessionService } from "./session.js";
import type { PatService } from "../services/pat.js";
import type { AuthenticatedUser } from "./access.js";
import { users } from "../db/schema/users.js";
import { unauthorized } from "../lib/api-errors.js";
import { toBase62 } from "../lib/base62.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Whatever the request presented. Either may be absent. */
export interface Credentials {
  /** Session cookie issued by the identity provider. */
  sessionToken?: string | undefined;
  /** Raw Authorization header; holds a PAT, optionally behind "Bearer ". */
  authorization?: string | undefined;
}

export interface Authenticator {
  /**
   * Resolve credentials to a platform user. The session cookie is tried
   * first, then the PAT.
   *
   * @throws ApiError 401 when neither resolves
   */
  authenticate(credentials: Credentials): Promise<AuthenticatedUser>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Strip an optional "Bearer " prefix. Undefined for an empty token. */
export function extractAccessToken(authorization: string): string | undefined {
  const token = authorization.startsWith("Bearer ")
    ? authorization.slice("Bearer ".length)
    : authorization;
  const trimmed = token.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createAuthenticator(
  db: Database,
  sessionService: SessionService,
  patService: PatService,
  logger: Logger,
): Authenticator {
  async function fromSession(token: string): Promise<AuthenticatedUser | undefined> {
    const session = await sessionService.validateSession(token);
    if (!session) {
      return undefined;
    }

    const rows = await db
      .select({ id: users.id, username: users.username, role: users.role })
      .from(users)
      .where(eq(users.id, session.userId));

    const user = rows[0];
    if (!user) {
      logger.warn({ userId: toBase62(session.userId) }, "Session refers to a missing user");
      return undefined;
    }
    return { ...user, method: "session" };
  }

  async function authenticate(credentials: Credentials): Promise<AuthenticatedUser> {
    const { sessionToken, authorization } = credentials;

    if (sessionToken !== undefined && sessionToken.length > 0) {
      const user = await fromSession(sessionToken);
      if (user) {
        return user;
      }
    }

    const accessToken = authorization === undefined ? undefined : extractAccessToken(authorization);
    if (accessToken !== undefined) {
      const user = await patService.resolve(accessToken);
      if (user) {
        return user;
      }
    }

    if (sessionToken === undefined && accessToken === undefined) {
      throw unauthorized("Authentication required");
    }
    throw unauthorized("Invalid or expired credentials");
  }

  return { authenticate };
}
