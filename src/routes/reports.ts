import type { FastifyPluginCallback } from "fastify";
import { badRequest, notFound } from "../lib/api-errors.js";
import { tryParseBase62 } from "../lib/base62.js";
import {
  createReportSchema,
  editReportSchema,
  reportsQuerySchema,
} from "../validation/reports.js";
import { createRequireModerator } from "../auth/require-moderator.js";

// ---------------------------------------------------------------------------
// OpenAPI JSON Schema definitions
// ---------------------------------------------------------------------------

const errorJsonSchema = {
  type: "object" as const,
  properties: {
    error: { type: "string" as const },
  },
};

const reportJsonSchema = {
  type: "object" as const,
  properties: {
    id: { type: "string" as const },
    report_type: { type: "string" as const },
    item_id: { type: "string" as const },
    item_type: { type: "string" as const, enum: ["project", "version", "user", "unknown"] },
    reporter: { type: "string" as const },
    body: { type: "string" as const },
    created: { type: "string" as const, format: "date-time" as const },
    closed: { type: "boolean" as const },
    thread_id: { type: "string" as const },
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

/** Undecodable ids are reported as missing, like ids that decode to nothing. */
function decodeReportId(id: string): bigint {
  const decoded = tryParseBase62(id);
  if (decoded === undefined) {
    throw notFound("Report not found");
  }
  return decoded;
}

// ---------------------------------------------------------------------------
// Report routes plugin
// ---------------------------------------------------------------------------

/**
 * Moderation report routes.
 *
 * - POST   /v2/report       -- File a report
 * - GET    /v2/report       -- List open reports (own, or all for moderators)
 * - GET    /v2/report/:id   -- Get one report (404 unless reporter or moderator)
 * - PATCH  /v2/report/:id   -- Edit body; moderators may also close/reopen
 * - DELETE /v2/report/:id   -- Delete report and its thread (moderator+)
 * - GET    /v2/tag/report_type -- Report type catalog
 */
export function reportRoutes(): FastifyPluginCallback {
  return (app, _opts, done) => {
    const { authMiddleware, reportService } = app;
    const requireModerator = createRequireModerator(authMiddleware, app.log);

    // -------------------------------------------------------------------
    // POST /v2/report (auth required)
    // -------------------------------------------------------------------

    app.post("/v2/report", {
      preHandler: [authMiddleware.requireAuth],
      schema: {
        tags: ["Reports"],
        summary: "File a report against a project, version or user",
        security: [{ bearerAuth: [] }],
        body: {
          type: "object",
          required: ["report_type", "item_id", "item_type", "body"],
          properties: {
            report_type: { type: "string", minLength: 1 },
            item_id: { type: "string", minLength: 1 },
            item_type: { type: "string", minLength: 1 },
            body: { type: "string" },
          },
        },
        response: {
          200: reportJsonSchema,
          400: errorJsonSchema,
          401: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const user = request.user;
      if (!user) {
        return reply.status(401).send({ error: "Authentication required" });
      }

      const parsed = createReportSchema.safeParse(request.body);
      if (!parsed.success) {
        throw badRequest("Invalid report data");
      }

      const report = await reportService.create(user, {
        reportType: parsed.data.report_type,
        itemId: parsed.data.item_id,
        itemType: parsed.data.item_type,
        body: parsed.data.body,
      });
      return reply.status(200).send(report);
    });

    // -------------------------------------------------------------------
    // GET /v2/report (auth required)
    // -------------------------------------------------------------------

    app.get("/v2/report", {
      preHandler: [authMiddleware.requireAuth],
      schema: {
        tags: ["Reports"],
        summary: "List open reports, oldest first",
        security: [{ bearerAuth: [] }],
        querystring: {
          type: "object",
          properties: {
            count: { type: "string" },
            all: { type: "string", enum: ["true", "false"] },
          },
        },
        response: {
          200: { type: "array", items: reportJsonSchema },
          400: errorJsonSchema,
          401: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const user = request.user;
      if (!user) {
        return reply.status(401).send({ error: "Authentication required" });
      }

      const parsed = reportsQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        throw badRequest("Invalid query parameters");
      }

      const reports = await reportService.list(user, parsed.data);
      return reply.status(200).send(reports);
    });

    // -------------------------------------------------------------------
    // GET /v2/report/:id (auth required)
    // -------------------------------------------------------------------

    app.get("/v2/report/:id", {
      preHandler: [authMiddleware.requireAuth],
      schema: {
        tags: ["Reports"],
        summary: "Get a report",
        security: [{ bearerAuth: [] }],
        params: idParamsJsonSchema,
        response: {
          200: reportJsonSchema,
          401: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const user = request.user;
      if (!user) {
        return reply.status(401).send({ error: "Authentication required" });
      }

      const { id } = request.params as { id: string };
      const report = await reportService.get(user, decodeReportId(id));
      return reply.status(200).send(report);
    });

    // -------------------------------------------------------------------
    // PATCH /v2/report/:id (auth required)
    // -------------------------------------------------------------------

    app.patch("/v2/report/:id", {
      preHandler: [authMiddleware.requireAuth],
      schema: {
        tags: ["Reports"],
        summary: "Edit a report body, or close/reopen it (moderator+)",
        security: [{ bearerAuth: [] }],
        params: idParamsJsonSchema,
        body: {
          type: "object",
          properties: {
            // null means "leave unchanged", so keep Ajv from coercing it
            body: { type: ["string", "null"] },
            closed: { type: ["boolean", "null"] },
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
      const reportId = decodeReportId(id);

      const parsed = editReportSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        throw badRequest("Invalid report data");
      }

      const { body, closed } = parsed.data;
      await reportService.edit(user, reportId, {
        body: body ?? undefined,
        closed: closed ?? undefined,
      });
      return reply.status(204).send();
    });

    // -------------------------------------------------------------------
    // DELETE /v2/report/:id (moderator+)
    // -------------------------------------------------------------------

    app.delete("/v2/report/:id", {
      preHandler: [requireModerator],
      schema: {
        tags: ["Reports"],
        summary: "Delete a report and its thread",
        security: [{ bearerAuth: [] }],
        params: idParamsJsonSchema,
        response: {
          204: { type: "null" },
          401: errorJsonSchema,
          403: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const { id } = request.params as { id: string };
      await reportService.remove(decodeReportId(id));
      return reply.status(204).send();
    });

    // -------------------------------------------------------------------
    // GET /v2/tag/report_type (public)
    // -------------------------------------------------------------------

    app.get("/v2/tag/report_type", {
      schema: {
        tags: ["Reports"],
        summary: "List report types",
        response: {
          200: { type: "array", items: { type: "string" } },
        },
      },
    }, async (_request, reply) => {
      const types = await reportService.listTypes();
      return reply.status(200).send(types);
    });

    done();
  };
}
