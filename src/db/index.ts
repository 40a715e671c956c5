import { drizzle } from "drizzle-orm/postgres-js";
import type { PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js";
import type { PgDatabase } from "drizzle-orm/pg-core";
import postgres from "postgres";
import * as schema from "./schema/index.js";

/** Connection pool sizing and timeouts (seconds). */
const POOL_OPTIONS = {
  max: 20,
  idle_timeout: 30,
  connect_timeout: 5,
} as const;

/**
 * Open the postgres.js pool and wrap it in Drizzle. The caller owns `client`
 * and ends it on shutdown.
 */
export function createDb(databaseUrl: string) {
  const client = postgres(databaseUrl, POOL_OPTIONS);
  return { db: drizzle(client, { schema }), client };
}

export type Database = ReturnType<typeof createDb>["db"];

/**
 * Anything queries can run against: the pool itself or an open transaction.
 * Helpers that must join the caller's transaction take this instead of
 * `Database`.
 */
export type DbExecutor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;
