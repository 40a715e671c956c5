import { describe, it, expect, vi, beforeEach } from "vitest";
import { createThreadService } from "../../../src/services/thread.js";
import type { IdGenerator, IdKind } from "../../../src/lib/ids.js";
import type { DbExecutor } from "../../../src/db/index.js";
import { createMockDb, resetDbMocks, createChainableProxy } from "../../helpers/mock-db.js";
import { createMockLogger } from "../../helpers/logger.js";

const mockDb = createMockDb();
const generateFn = vi.fn<(executor: DbExecutor, kind: IdKind) => Promise<bigint>>();
const ids: IdGenerator = { generate: generateFn };

const THREAD_ID = 62n ** 7n;
const MESSAGE_ID = 62n ** 7n + 1n;

function buildService() {
  const { logger } = createMockLogger();
  return createThreadService(mockDb as never, logger, ids);
}

describe("thread service", () => {
  beforeEach(() => {
    resetDbMocks(mockDb);
    generateFn.mockReset();
  });

  describe("createThread", () => {
    it("inserts an empty report thread without members", async () => {
      generateFn.mockResolvedValueOnce(THREAD_ID);
      const insertChain = createChainableProxy();
      mockDb.insert.mockReturnValueOnce(insertChain);

      const id = await buildService().createThread(mockDb as never, "report", []);

      expect(id).toBe(THREAD_ID);
      expect(generateFn).toHaveBeenCalledWith(mockDb, "thread");
      expect(insertChain.values).toHaveBeenCalledWith({ id: THREAD_ID, threadType: "report" });
      expect(mockDb.insert).toHaveBeenCalledTimes(1);
    });

    it("adds members when given", async () => {
      generateFn.mockResolvedValueOnce(THREAD_ID);
      const threadInsert = createChainableProxy();
      const memberInsert = createChainableProxy();
      mockDb.insert.mockReturnValueOnce(threadInsert).mockReturnValueOnce(memberInsert);

      await buildService().createThread(mockDb as never, "direct_message", [1n, 2n]);

      expect(memberInsert.values).toHaveBeenCalledWith([
        { threadId: THREAD_ID, userId: 1n },
        { threadId: THREAD_ID, userId: 2n },
      ]);
      expect(memberInsert.onConflictDoNothing).toHaveBeenCalledTimes(1);
    });
  });

  describe("postMessage", () => {
    it("stores a system message with no author", async () => {
      generateFn.mockResolvedValueOnce(MESSAGE_ID);
      const insertChain = createChainableProxy();
      mockDb.insert.mockReturnValueOnce(insertChain);

      const id = await buildService().postMessage(mockDb as never, THREAD_ID, null, {
        type: "thread_closure",
      });

      expect(id).toBe(MESSAGE_ID);
      expect(generateFn).toHaveBeenCalledWith(mockDb, "threadMessage");
      expect(insertChain.values).toHaveBeenCalledWith({
        id: MESSAGE_ID,
        threadId: THREAD_ID,
        authorId: null,
        body: { type: "thread_closure" },
      });
    });
  });

  describe("deleteThread", () => {
    it("deletes messages, members and the thread", async () => {
      await buildService().deleteThread(mockDb as never, THREAD_ID);
      expect(mockDb.delete).toHaveBeenCalledTimes(3);
    });
  });

  describe("getThread", () => {
    it("returns the thread with members and messages", async () => {
      const created = new Date("2026-02-01T10:00:00.000Z");
      mockDb.select
        .mockReturnValueOnce(createChainableProxy([{ id: THREAD_ID, threadType: "report" }]))
        .mockReturnValueOnce(createChainableProxy([{ userId: 62n }]))
        .mockReturnValueOnce(
          createChainableProxy([
            { id: MESSAGE_ID, threadId: THREAD_ID, authorId: null, body: { type: "thread_reopen" }, created },
            {
              id: MESSAGE_ID + 1n,
              threadId: THREAD_ID,
              authorId: 62n,
              body: { type: "text", body: "Thanks" },
              created,
            },
          ]),
        );

      await expect(buildService().getThread(THREAD_ID)).resolves.toEqual({
        id: "10000000",
        type: "report",
        members: ["10"],
        messages: [
          {
            id: "10000001",
            author_id: null,
            body: { type: "thread_reopen" },
            created: "2026-02-01T10:00:00.000Z",
          },
          {
            id: "10000002",
            author_id: "10",
            body: { type: "text", body: "Thanks" },
            created: "2026-02-01T10:00:00.000Z",
          },
        ],
      });
    });

    it("returns undefined for an unknown thread", async () => {
      await expect(buildService().getThread(THREAD_ID)).resolves.toBeUndefined();
      expect(mockDb.select).toHaveBeenCalledTimes(1);
    });
  });

  describe("findReportForThread", () => {
    it("returns the bound report's reporter", async () => {
      mockDb.select.mockReturnValueOnce(createChainableProxy([{ reportId: 9n, reporter: 62n }]));
      await expect(buildService().findReportForThread(THREAD_ID)).resolves.toEqual({
        reportId: 9n,
        reporter: 62n,
      });
    });

    it("returns undefined when no report is bound", async () => {
      await expect(buildService().findReportForThread(THREAD_ID)).resolves.toBeUndefined();
    });
  });
});
