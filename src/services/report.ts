import { and, asc, eq } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { Database } from "../db/index.js";
import type { Logger } from "../lib/logger.js";
import type { IdGenerator } from "../lib/ids.js";
import type { ThreadService } from "./thread.js";
import type { EntityOracle, TargetKind } from "./entity-oracle.js";
import type { AuthenticatedUser } from "../auth/access.js";
import { canEditReport, canViewReport, isModerator } from "../auth/access.js";
import { reports } from "../db/schema/reports.js";
import { reportTypes } from "../db/schema/report-types.js";
import { badRequest, notFound } from "../lib/api-errors.js";
import { toBase62, tryParseBase62 } from "../lib/base62.js";
import { systemClock } from "../lib/clock.js";
import type { Clock } from "../lib/clock.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What a report points at. Storage spreads this over three nullable columns. */
export type ReportTarget =
  | { kind: "project"; id: bigint }
  | { kind: "version"; id: bigint }
  | { kind: "user"; id: bigint }
  | { kind: "none" };

export type ItemType = TargetKind | "unknown";

/** Report as returned by the API. */
export interface ReportView {
  id: string;
  report_type: string;
  item_id: string;
  item_type: ItemType;
  reporter: string;
  body: string;
  created: string;
  closed: boolean;
  thread_id: string;
}

export interface CreateReportParams {
  /** Catalog name, e.g. "spam". */
  reportType: string;
  /** Base62 id of the reported entity. */
  itemId: string;
  /** Checked here rather than by the request schema so the message names it. */
  itemType: string;
  body: string;
}

export interface ListReportsParams {
  count: number;
  /** Moderators only: every open report instead of their own. */
  all: boolean;
}

export interface EditReportParams {
  body?: string | undefined;
  closed?: boolean | undefined;
}

export interface ReportService {
  create(reporter: AuthenticatedUser, params: CreateReportParams): Promise<ReportView>;
  list(caller: AuthenticatedUser, params: ListReportsParams): Promise<ReportView[]>;
  get(caller: AuthenticatedUser, id: bigint): Promise<ReportView>;
  edit(caller: AuthenticatedUser, id: bigint, params: EditReportParams): Promise<void>;
  /** Moderator-only; the route gate enforces that before calling. */
  remove(id: bigint): Promise<void>;
  listTypes(): Promise<string[]>;
}

export interface ReportServiceDeps {
  ids: IdGenerator;
  threads: ThreadService;
  oracle: EntityOracle;
  clock?: Clock | undefined;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const TARGET_KINDS: readonly TargetKind[] = ["project", "version", "user"];

const TARGET_LABELS: Record<TargetKind, string> = {
  project: "Project",
  version: "Version",
  user: "User",
};

// ---------------------------------------------------------------------------
// Target mapping (domain <-> storage)
// ---------------------------------------------------------------------------

interface TargetColumns {
  projectId: bigint | null;
  versionId: bigint | null;
  userId: bigint | null;
}

export function targetToColumns(target: ReportTarget): TargetColumns {
  return {
    projectId: target.kind === "project" ? target.id : null,
    versionId: target.kind === "version" ? target.id : null,
    userId: target.kind === "user" ? target.id : null,
  };
}

/** Project wins over version over user should a row ever carry several. */
export function targetFromColumns(columns: TargetColumns): ReportTarget {
  if (columns.projectId !== null) {
    return { kind: "project", id: columns.projectId };
  }
  if (columns.versionId !== null) {
    return { kind: "version", id: columns.versionId };
  }
  if (columns.userId !== null) {
    return { kind: "user", id: columns.userId };
  }
  return { kind: "none" };
}

function isTargetKind(value: string): value is TargetKind {
  return TARGET_KINDS.some((kind) => kind === value);
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

const reportSelection = {
  id: reports.id,
  reportType: reportTypes.name,
  projectId: reports.projectId,
  versionId: reports.versionId,
  userId: reports.userId,
  body: reports.body,
  reporter: reports.reporter,
  created: reports.created,
  closed: reports.closed,
  threadId: reports.threadId,
};

export interface ReportRecord extends TargetColumns {
  id: bigint;
  reportType: string;
  body: string;
  reporter: bigint;
  created: Date;
  closed: boolean;
  threadId: bigint;
}

export function serializeReport(row: ReportRecord): ReportView {
  const target = targetFromColumns(row);
  return {
    id: toBase62(row.id),
    report_type: row.reportType,
    item_id: target.kind === "none" ? "" : toBase62(target.id),
    item_type: target.kind === "none" ? "unknown" : target.kind,
    reporter: toBase62(row.reporter),
    body: row.body,
    created: row.created.toISOString(),
    closed: row.closed,
    thread_id: toBase62(row.threadId),
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create the report lifecycle service.
 *
 * Reports are `Open` until a moderator closes them; closing and reopening
 * leave a system message in the report's thread. Every mutation is one
 * transaction, so a failed target check or id exhaustion leaves no thread
 * or report behind.
 *
 * @param db - Drizzle database instance
 * @param logger - Pino logger instance
 * @param deps - Id generator, thread service, entity oracle and clock
 */
export function createReportService(
  db: Database,
  logger: Logger,
  deps: ReportServiceDeps,
): ReportService {
  const { ids, threads, oracle } = deps;
  const clock = deps.clock ?? systemClock;

  async function selectReports(where: SQL | undefined, limit?: number): Promise<ReportRecord[]> {
    const query = db
      .select(reportSelection)
      .from(reports)
      .innerJoin(reportTypes, eq(reports.reportTypeId, reportTypes.id))
      .where(where)
      .orderBy(asc(reports.created));

    return limit === undefined ? await query : await query.limit(limit);
  }

  async function create(
    reporter: AuthenticatedUser,
    params: CreateReportParams,
  ): Promise<ReportView> {
    if (!isTargetKind(params.itemType)) {
      throw badRequest(`Invalid report item type: ${params.itemType}`);
    }
    const kind: TargetKind = params.itemType;

    const targetId = tryParseBase62(params.itemId);
    if (targetId === undefined) {
      throw badRequest(`Invalid ${kind} id: ${params.itemId}`);
    }

    const created = clock();

    const record = await db.transaction(async (tx): Promise<ReportRecord> => {
      const typeRows = await tx
        .select({ id: reportTypes.id })
        .from(reportTypes)
        .where(eq(reportTypes.name, params.reportType));
      const reportType = typeRows[0];
      if (!reportType) {
        throw badRequest(`Invalid report type: ${params.reportType}`);
      }

      if (!(await oracle.exists(tx, kind, targetId))) {
        throw badRequest(`${TARGET_LABELS[kind]} could not be found: ${params.itemId}`);
      }

      const id = await ids.generate(tx, "report");
      const threadId = await threads.createThread(tx, "report", []);
      const columns = targetToColumns({ kind, id: targetId });

      await tx.insert(reports).values({
        id,
        reportTypeId: reportType.id,
        ...columns,
        body: params.body,
        reporter: reporter.id,
        created,
        closed: false,
        threadId,
      });

      return {
        id,
        reportType: params.reportType,
        ...columns,
        body: params.body,
        reporter: reporter.id,
        created,
        closed: false,
        threadId,
      };
    });

    logger.info(
      {
        reportId: toBase62(record.id),
        reporter: toBase62(reporter.id),
        itemType: kind,
        itemId: params.itemId,
      },
      "Report created",
    );
    return serializeReport(record);
  }

  async function list(
    caller: AuthenticatedUser,
    params: ListReportsParams,
  ): Promise<ReportView[]> {
    const where =
      isModerator(caller) && params.all
        ? eq(reports.closed, false)
        : and(eq(reports.closed, false), eq(reports.reporter, caller.id));

    const rows = await selectReports(where, params.count);
    return rows.map(serializeReport);
  }

  async function get(caller: AuthenticatedUser, id: bigint): Promise<ReportView> {
    const rows = await selectReports(eq(reports.id, id));
    const row = rows[0];

    // Hidden and missing reports look the same from outside
    if (!row || !canViewReport(caller, { reporter: row.reporter, targetUserId: row.userId })) {
      throw notFound("Report not found");
    }
    return serializeReport(row);
  }

  async function edit(
    caller: AuthenticatedUser,
    id: bigint,
    params: EditReportParams,
  ): Promise<void> {
    const transition = await db.transaction(async (tx) => {
      const rows = await tx
        .select({
          reporter: reports.reporter,
          userId: reports.userId,
          closed: reports.closed,
          threadId: reports.threadId,
        })
        .from(reports)
        .where(eq(reports.id, id))
        .for("update");

      const report = rows[0];
      if (!report || !canEditReport(caller, { reporter: report.reporter, targetUserId: report.userId })) {
        throw notFound("Report not found");
      }

      if (params.closed !== undefined && !isModerator(caller)) {
        throw badRequest("You cannot reopen or close a report!");
      }

      const changes: { body?: string; closed?: boolean } = {};
      if (params.body !== undefined) {
        changes.body = params.body;
      }

      let flipped: "closed" | "reopened" | undefined;
      if (params.closed !== undefined) {
        if (params.closed !== report.closed) {
          flipped = params.closed ? "closed" : "reopened";
          await threads.postMessage(
            tx,
            report.threadId,
            null,
            params.closed ? { type: "thread_closure" } : { type: "thread_reopen" },
          );
        }
        changes.closed = params.closed;
      }

      if (Object.keys(changes).length > 0) {
        await tx.update(reports).set(changes).where(eq(reports.id, id));
      }

      return flipped;
    });

    logger.info(
      {
        reportId: toBase62(id),
        editor: toBase62(caller.id),
        bodyChanged: params.body !== undefined,
        ...(transition ? { transition } : {}),
      },
      "Report edited",
    );
  }

  async function remove(id: bigint): Promise<void> {
    await db.transaction(async (tx) => {
      const rows = await tx
        .select({ threadId: reports.threadId })
        .from(reports)
        .where(eq(reports.id, id));

      const report = rows[0];
      if (!report) {
        throw notFound("Report not found");
      }

      await threads.deleteThread(tx, report.threadId);
      await tx.delete(reports).where(eq(reports.id, id));
    });

    logger.info({ reportId: toBase62(id) }, "Report deleted");
  }

  async function listTypes(): Promise<string[]> {
    const rows = await db
      .select({ name: reportTypes.name })
      .from(reportTypes)
      .orderBy(asc(reportTypes.name));
    return rows.map((r) => r.name);
  }

  return { create, list, get, edit, remove, listTypes };
}
