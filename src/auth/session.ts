import crypto from "node:crypto";
import type { Cache } from "../cache/index.js";
import type { Logger } from "../lib/logger.js";
import { parseBase62 } from "../lib/base62.js";

// ---------------------------------------------------------------------------
// Key prefixes
// ---------------------------------------------------------------------------

const SESSION_PREFIX = "moderation:session:";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Session written by the identity provider integration and read on every
 * cookie-authenticated request. Keyed by the SHA-256 of the cookie value; the
 * raw value is never stored.
 */
export interface Session {
  /** Platform user id */
  userId: bigint;
  /** When the session was created (epoch ms) */
  createdAt: number;
}

/** Session data as serialized in Valkey. */
interface StoredSession {
  userId: string;
  createdAt: number;
}

/** Read side of the provider's sessions; the provider writes and expires them. */
export interface SessionService {
  /**
   * Look up a session by cookie value. Undefined when unknown or expired.
   */
  validateSession(token: string): Promise<Session | undefined>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** SHA-256 hash a value and return the hex digest. */
function sha256(value: string): string {
  return crypto.createHash("sha256").update(value).digest("hex");
}

/** Truncate a hash to 8 characters for safe logging. */
function truncateForLog(value: string): string {
  return value.slice(0, 8);
}

function isStoredSession(value: unknown): value is StoredSession {
  return (
    typeof value === "object" &&
    value !== null &&
    "userId" in value &&
    typeof value.userId === "string" &&
    "createdAt" in value &&
    typeof value.createdAt === "number"
  );
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createSessionService(
  cache: Cache,
  logger: Logger,
): SessionService {
  async function validateSession(token: string): Promise<Session | undefined> {
    const tokenHash = sha256(token);

    try {
      const data = await cache.get(`${SESSION_PREFIX}${tokenHash}`);
      if (data === null) {
        logger.debug({ tokenHash: truncateForLog(tokenHash) }, "Session not found");
        return undefined;
      }

      const parsed: unknown = JSON.parse(data);
      if (!isStoredSession(parsed)) {
        logger.warn({ tokenHash: truncateForLog(tokenHash) }, "Discarding malformed session data");
        return undefined;
      }

      return { userId: parseBase62(parsed.userId), createdAt: parsed.createdAt };
    } catch (err: unknown) {
      logger.error({ err, tokenHash: truncateForLog(tokenHash) }, "Failed to validate session");
      throw err;
    }
  }

  return { validateSession };
}
