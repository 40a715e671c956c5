import crypto from "node:crypto";
import { sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { DbExecutor } from "../db/index.js";
import type { Logger } from "./logger.js";
import { MAX_ID } from "./base62.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Collisions tolerated per call before giving up. */
export const ID_RETRY_COUNT = 20;

/** Row ids render as exactly eight base62 characters: [62^7, 62^8). */
const ROW_ID_MIN = 62n ** 7n;
const ROW_ID_MAX = 62n ** 8n;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type IdKind = "pat" | "patToken" | "report" | "thread" | "threadMessage";

/** Draws a random bigint in [min, max). */
export type RandomBigInt = (min: bigint, max: bigint) => bigint;

export interface IdGenerator {
  /**
   * Mint an id of the given kind that is not yet stored. Runs its existence
   * checks on `executor`, so callers pass their open transaction.
   */
  generate(executor: DbExecutor, kind: IdKind): Promise<bigint>;
}

/** Raised when every attempt collided. Operational anomaly, never user error. */
export class IdExhaustedError extends Error {
  readonly kind: IdKind;

  constructor(kind: IdKind) {
    super(`Could not mint a unique ${kind} id after ${ID_RETRY_COUNT} attempts`);
    this.name = "IdExhaustedError";
    this.kind = kind;
  }
}

interface IdSpace {
  min: bigint;
  max: bigint;
  exists: (candidate: bigint) => SQL;
}

const ID_SPACES: Record<IdKind, IdSpace> = {
  pat: {
    min: ROW_ID_MIN,
    max: ROW_ID_MAX,
    exists: (id) => sql`SELECT EXISTS(SELECT 1 FROM pats WHERE id = ${id}) AS "exists"`,
  },
  patToken: {
    min: 1n,
    max: MAX_ID,
    exists: (id) => sql`SELECT EXISTS(SELECT 1 FROM pats WHERE access_token = ${id}) AS "exists"`,
  },
  report: {
    min: ROW_ID_MIN,
    max: ROW_ID_MAX,
    exists: (id) => sql`SELECT EXISTS(SELECT 1 FROM reports WHERE id = ${id}) AS "exists"`,
  },
  thread: {
    min: ROW_ID_MIN,
    max: ROW_ID_MAX,
    exists: (id) => sql`SELECT EXISTS(SELECT 1 FROM threads WHERE id = ${id}) AS "exists"`,
  },
  threadMessage: {
    min: ROW_ID_MIN,
    max: ROW_ID_MAX,
    exists: (id) => sql`SELECT EXISTS(SELECT 1 FROM threads_messages WHERE id = ${id}) AS "exists"`,
  },
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Uniform random bigint in [min, max) from the CSPRNG, by rejection sampling
 * over 64-bit draws.
 */
export const cryptoRandomBigInt: RandomBigInt = (min, max) => {
  const span = max - min;
  const limit = (1n << 64n) - ((1n << 64n) % span);
  for (;;) {
    const draw = crypto.randomBytes(8).readBigUInt64BE();
    if (draw < limit) {
      return min + (draw % span);
    }
  }
};

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create the id generator. Ids are random rather than sequential so they
 * cannot be enumerated.
 *
 * @param logger - Pino logger instance
 * @param random - Randomness source (overridable in tests)
 */
export function createIdGenerator(
  logger: Logger,
  random: RandomBigInt = cryptoRandomBigInt,
): IdGenerator {
  async function generate(executor: DbExecutor, kind: IdKind): Promise<bigint> {
    const space = ID_SPACES[kind];

    for (let attempt = 1; attempt <= ID_RETRY_COUNT; attempt++) {
      const candidate = random(space.min, space.max);
      const rows = await executor.execute<{ exists: boolean }>(space.exists(candidate));
      if (rows[0]?.exists !== true) {
        return candidate;
      }
      logger.debug({ kind, attempt }, "Id collision, drawing again");
    }

    logger.error({ kind, attempts: ID_RETRY_COUNT }, "Id space exhausted");
    throw new IdExhaustedError(kind);
  }

  return { generate };
}
