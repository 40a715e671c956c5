import { and, asc, eq } from "drizzle-orm";
import type { Database } from "../db/index.js";
import type { Logger } from "../lib/logger.js";
import type { IdGenerator } from "../lib/ids.js";
import type { AuthenticatedUser } from "../auth/access.js";
import { pats } from "../db/schema/pats.js";
import { users } from "../db/schema/users.js";
import { badRequest, notFound } from "../lib/api-errors.js";
import { toBase62, tryParseBase62 } from "../lib/base62.js";
import { addDays, systemClock } from "../lib/clock.js";
import type { Clock } from "../lib/clock.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Token as returned to its owner. Ids and the secret are base62. */
export interface PatView {
  id: string;
  access_token: string;
  scope: string;
  user_id: string;
  expires_at: string;
}

export interface CreatePatParams {
  scope: string;
  /** Lifetime in days, counted from now. */
  expireInDays: number;
}

export interface EditPatParams {
  scope?: string | undefined;
  /** Resets expiry to this many days from now (not from the old expiry). */
  expireInDays?: number | undefined;
}

export interface PatService {
  create(owner: bigint, params: CreatePatParams): Promise<PatView>;
  /** Every token the owner has, expired ones included. */
  list(owner: bigint): Promise<PatView[]>;
  edit(owner: bigint, accessToken: string, params: EditPatParams): Promise<PatView>;
  revoke(owner: bigint, accessToken: string): Promise<void>;
  /**
   * Resolve a presented secret to its owner. Unknown, malformed and expired
   * secrets all resolve to undefined.
   */
  resolve(accessToken: string): Promise<AuthenticatedUser | undefined>;
}

export interface PatServiceDeps {
  ids: IdGenerator;
  clock?: Clock | undefined;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function serializePat(row: typeof pats.$inferSelect): PatView {
  return {
    id: toBase62(row.id),
    access_token: toBase62(row.accessToken),
    scope: row.scope,
    user_id: toBase62(row.userId),
    expires_at: row.expiresAt.toISOString(),
  };
}

/** Decode a client-supplied secret or reject the request. */
function decodeAccessToken(accessToken: string): bigint {
  const secret = tryParseBase62(accessToken);
  if (secret === undefined) {
    throw badRequest("Invalid access token");
  }
  return secret;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create the personal access token store.
 *
 * Mutations each run in one transaction; `resolve` is a single read since it
 * sits on the hot path of every PAT-authenticated request.
 *
 * @param db - Drizzle database instance
 * @param logger - Pino logger instance
 * @param deps - Id generator and clock
 */
export function createPatService(
  db: Database,
  logger: Logger,
  deps: PatServiceDeps,
): PatService {
  const { ids } = deps;
  const clock = deps.clock ?? systemClock;

  async function create(owner: bigint, params: CreatePatParams): Promise<PatView> {
    const row = await db.transaction(async (tx) => {
      const id = await ids.generate(tx, "pat");
      const accessToken = await ids.generate(tx, "patToken");
      const values = {
        id,
        accessToken,
        userId: owner,
        scope: params.scope,
        expiresAt: addDays(clock(), params.expireInDays),
      };
      await tx.insert(pats).values(values);
      return values;
    });

    logger.info(
      { patId: toBase62(row.id), userId: toBase62(owner), expiresAt: row.expiresAt.toISOString() },
      "Personal access token created",
    );
    return serializePat(row);
  }

  async function list(owner: bigint): Promise<PatView[]> {
    const rows = await db
      .select()
      .from(pats)
      .where(eq(pats.userId, owner))
      .orderBy(asc(pats.expiresAt));

    return rows.map(serializePat);
  }

  async function edit(owner: bigint, accessToken: string, params: EditPatParams): Promise<PatView> {
    const secret = decodeAccessToken(accessToken);

    const updated = await db.transaction(async (tx) => {
      const rows = await tx
        .select()
        .from(pats)
        .where(and(eq(pats.accessToken, secret), eq(pats.userId, owner)))
        .for("update");

      const row = rows[0];
      if (!row) {
        throw notFound("Personal access token not found");
      }

      const next = {
        ...row,
        scope: params.scope ?? row.scope,
        expiresAt:
          params.expireInDays !== undefined
            ? addDays(clock(), params.expireInDays)
            : row.expiresAt,
      };

      await tx
        .update(pats)
        .set({ scope: next.scope, expiresAt: next.expiresAt })
        .where(eq(pats.id, row.id));

      return next;
    });

    logger.info(
      { patId: toBase62(updated.id), userId: toBase62(owner) },
      "Personal access token updated",
    );
    return serializePat(updated);
  }

  async function revoke(owner: bigint, accessToken: string): Promise<void> {
    const secret = decodeAccessToken(accessToken);

    const deleted = await db.transaction(async (tx) => {
      return await tx
        .delete(pats)
        .where(and(eq(pats.accessToken, secret), eq(pats.userId, owner)))
        .returning({ id: pats.id });
    });

    const row = deleted[0];
    if (!row) {
      throw notFound("Personal access token not found");
    }

    logger.info(
      { patId: toBase62(row.id), userId: toBase62(owner) },
      "Personal access token revoked",
    );
  }

  async function resolve(accessToken: string): Promise<AuthenticatedUser | undefined> {
    const secret = tryParseBase62(accessToken);
    if (secret === undefined) {
      logger.debug("Rejected malformed personal access token");
      return undefined;
    }

    const rows = await db
      .select({
        expiresAt: pats.expiresAt,
        id: users.id,
        username: users.username,
        role: users.role,
      })
      .from(pats)
      .innerJoin(users, eq(pats.userId, users.id))
      .where(eq(pats.accessToken, secret))
      .limit(1);

    const row = rows[0];
    if (!row) {
      return undefined;
    }

    if (row.expiresAt.getTime() < clock().getTime()) {
      logger.debug({ userId: toBase62(row.id) }, "Rejected expired personal access token");
      return undefined;
    }

    return { id: row.id, username: row.username, role: row.role, method: "pat" };
  }

  return { create, list, edit, revoke, resolve };
}
