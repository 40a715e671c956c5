import type { FastifyPluginCallback } from "fastify";
import type { AuthenticatedUser } from "../auth/access.js";
import type { ThreadService, ThreadView } from "../services/thread.js";
import { isModerator } from "../auth/access.js";
import { badRequest, notFound } from "../lib/api-errors.js";
import { toBase62, tryParseBase62 } from "../lib/base62.js";
import { postMessageSchema } from "../validation/threads.js";

// ---------------------------------------------------------------------------
// OpenAPI JSON Schema definitions
// ---------------------------------------------------------------------------

const errorJsonSchema = {
  type: "object" as const,
  properties: {
    error: { type: "string" as const },
  },
};

const threadJsonSchema = {
  type: "object" as const,
  properties: {
    id: { type: "string" as const },
    type: { type: "string" as const },
    members: { type: "array" as const, items: { type: "string" as const } },
    messages: {
      type: "array" as const,
      items: {
        type: "object" as const,
        properties: {
          id: { type: "string" as const },
          author_id: { type: ["string", "null"] as const },
          body: {
            type: "object" as const,
            additionalProperties: true,
          },
          created: { type: "string" as const, format: "date-time" as const },
        },
      },
    },
  },
};

const idParamsJsonSchema = {
  type: "object" as const,
  required: ["id"],
  properties: { id: { type: "string" as const } },
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Load a thread the caller may read: moderators, members, and the reporter
 * of the report the thread belongs to. Anything else is a 404.
 */
async function loadVisibleThread(
  threads: ThreadService,
  user: AuthenticatedUser,
  rawId: string,
): Promise<{ id: bigint; thread: ThreadView }> {
  const id = tryParseBase62(rawId);
  if (id === undefined) {
    throw notFound("Thread not found");
  }

  const thread = await threads.getThread(id);
  if (!thread) {
    throw notFound("Thread not found");
  }

  if (isModerator(user) || thread.members.includes(toBase62(user.id))) {
    return { id, thread };
  }

  if (thread.type === "report") {
    const report = await threads.findReportForThread(id);
    if (report?.reporter === user.id) {
      return { id, thread };
    }
  }

  throw notFound("Thread not found");
}

// ---------------------------------------------------------------------------
// Thread routes plugin
// ---------------------------------------------------------------------------

/**
 * Discussion thread routes.
 *
 * - GET  /v2/thread/:id -- Thread with members and messages
 * - POST /v2/thread/:id -- Post a text message
 */
export function threadRoutes(): FastifyPluginCallback {
  return (app, _opts, done) => {
    const { db, authMiddleware, threadService } = app;

    // -------------------------------------------------------------------
    // GET /v2/thread/:id (auth required)
    // -------------------------------------------------------------------

    app.get("/v2/thread/:id", {
      preHandler: [authMiddleware.requireAuth],
      schema: {
        tags: ["Threads"],
        summary: "Get a thread and its messages",
        security: [{ bearerAuth: [] }],
        params: idParamsJsonSchema,
        response: {
          200: threadJsonSchema,
          401: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const user = request.user;
      if (!user) {
        return reply.status(401).send({ error: "Authentication required" });
      }

      const { id } = request.params as { id: string };
      const { thread } = await loadVisibleThread(threadService, user, id);
      return reply.status(200).send(thread);
    });

    // -------------------------------------------------------------------
    // POST /v2/thread/:id (auth required)
    // -------------------------------------------------------------------

    app.post("/v2/thread/:id", {
      preHandler: [authMiddleware.requireAuth],
      schema: {
        tags: ["Threads"],
        summary: "Post a message to a thread",
        security: [{ bearerAuth: [] }],
        params: idParamsJsonSchema,
        body: {
          type: "object",
          required: ["body"],
          properties: {
            body: { type: "string" },
          },
        },
        response: {
          204: { type: "null" },
          400: errorJsonSchema,
          401: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const user = request.user;
      if (!user) {
        return reply.status(401).send({ error: "Authentication required" });
      }

      const { id } = request.params as { id: string };
      const parsed = postMessageSchema.safeParse(request.body);
      if (!parsed.success) {
        throw badRequest("Invalid message");
      }

      const { id: threadId } = await loadVisibleThread(threadService, user, id);
      await threadService.postMessage(db, threadId, user.id, {
        type: "text",
        body: parsed.data.body,
      });

      app.log.info(
        { threadId: id, authorId: toBase62(user.id) },
        "Thread message posted",
      );
      return reply.status(204).send();
    });

    done();
  };
}
