import { eq } from "drizzle-orm";
import type { DbExecutor } from "../db/index.js";
import { projects } from "../db/schema/projects.js";
import { versions } from "../db/schema/versions.js";
import { users } from "../db/schema/users.js";

/** Entity kinds a report can point at. */
export type TargetKind = "project" | "version" | "user";

/**
 * Confirms that an id belongs to an entity of the given kind. The tables are
 * owned by other services; this only reads them.
 */
export interface EntityOracle {
  exists(executor: DbExecutor, kind: TargetKind, id: bigint): Promise<boolean>;
}

export function createEntityOracle(): EntityOracle {
  async function exists(executor: DbExecutor, kind: TargetKind, id: bigint): Promise<boolean> {
    switch (kind) {
      case "project": {
        const rows = await executor
          .select({ id: projects.id })
          .from(projects)
          .where(eq(projects.id, id))
          .limit(1);
        return rows.length > 0;
      }
      case "version": {
        const rows = await executor
          .select({ id: versions.id })
          .from(versions)
          .where(eq(versions.id, id))
          .limit(1);
        return rows.length > 0;
      }
      case "user": {
        const rows = await executor
          .select({ id: users.id })
          .from(users)
          .where(eq(users.id, id))
          .limit(1);
        return rows.length > 0;
      }
    }
  }

  return { exists };
}
