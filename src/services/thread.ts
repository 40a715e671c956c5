import { asc, eq } from "drizzle-orm";
import type { Database, DbExecutor } from "../db/index.js";
import type { Logger } from "../lib/logger.js";
import type { IdGenerator } from "../lib/ids.js";
import { threads, threadMembers, threadMessages } from "../db/schema/threads.js";
import type { MessageBody, ThreadType } from "../db/schema/threads.js";
import { reports } from "../db/schema/reports.js";
import { toBase62 } from "../lib/base62.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ThreadMessageView {
  id: string;
  /** Null for system messages. */
  author_id: string | null;
  body: MessageBody;
  created: string;
}

export interface ThreadView {
  id: string;
  type: ThreadType;
  members: string[];
  messages: ThreadMessageView[];
}

/** Report bound to a thread, as far as thread access needs to know. */
export interface ThreadReportLink {
  reportId: bigint;
  reporter: bigint;
}

/**
 * Thread storage. Write methods take the caller's executor so they join the
 * surrounding transaction.
 */
export interface ThreadService {
  createThread(executor: DbExecutor, type: ThreadType, members: bigint[]): Promise<bigint>;
  postMessage(
    executor: DbExecutor,
    threadId: bigint,
    authorId: bigint | null,
    body: MessageBody,
  ): Promise<bigint>;
  /** Removes messages, members and the thread itself. */
  deleteThread(executor: DbExecutor, threadId: bigint): Promise<void>;
  getThread(threadId: bigint): Promise<ThreadView | undefined>;
  findReportForThread(threadId: bigint): Promise<ThreadReportLink | undefined>;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createThreadService(
  db: Database,
  logger: Logger,
  ids: IdGenerator,
): ThreadService {
  async function createThread(
    executor: DbExecutor,
    type: ThreadType,
    members: bigint[],
  ): Promise<bigint> {
    const id = await ids.generate(executor, "thread");
    await executor.insert(threads).values({ id, threadType: type });

    if (members.length > 0) {
      await executor
        .insert(threadMembers)
        .values(members.map((userId) => ({ threadId: id, userId })))
        .onConflictDoNothing();
    }

    logger.debug({ threadId: toBase62(id), type, memberCount: members.length }, "Thread created");
    return id;
  }

  async function postMessage(
    executor: DbExecutor,
    threadId: bigint,
    authorId: bigint | null,
    body: MessageBody,
  ): Promise<bigint> {
    const id = await ids.generate(executor, "threadMessage");
    await executor.insert(threadMessages).values({ id, threadId, authorId, body });

    logger.debug(
      { threadId: toBase62(threadId), messageId: toBase62(id), kind: body.type },
      "Thread message posted",
    );
    return id;
  }

  async function deleteThread(executor: DbExecutor, threadId: bigint): Promise<void> {
    await executor.delete(threadMessages).where(eq(threadMessages.threadId, threadId));
    await executor.delete(threadMembers).where(eq(threadMembers.threadId, threadId));
    await executor.delete(threads).where(eq(threads.id, threadId));

    logger.debug({ threadId: toBase62(threadId) }, "Thread deleted");
  }

  async function getThread(threadId: bigint): Promise<ThreadView | undefined> {
    const threadRows = await db.select().from(threads).where(eq(threads.id, threadId));
    const thread = threadRows[0];
    if (!thread) {
      return undefined;
    }

    const memberRows = await db
      .select({ userId: threadMembers.userId })
      .from(threadMembers)
      .where(eq(threadMembers.threadId, threadId));

    const messageRows = await db
      .select()
      .from(threadMessages)
      .where(eq(threadMessages.threadId, threadId))
      .orderBy(asc(threadMessages.created));

    return {
      id: toBase62(thread.id),
      type: thread.threadType,
      members: memberRows.map((m) => toBase62(m.userId)),
      messages: messageRows.map((m) => ({
        id: toBase62(m.id),
        author_id: m.authorId === null ? null : toBase62(m.authorId),
        body: m.body,
        created: m.created.toISOString(),
      })),
    };
  }

  async function findReportForThread(threadId: bigint): Promise<ThreadReportLink | undefined> {
    const rows = await db
      .select({ reportId: reports.id, reporter: reports.reporter })
      .from(reports)
      .where(eq(reports.threadId, threadId));

    return rows[0];
  }

  return { createThread, postMessage, deleteThread, getThread, findReportForThread };
}
