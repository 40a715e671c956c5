import type { FastifyPluginCallback } from "fastify";
import { badRequest } from "../lib/api-errors.js";
import {
  createPatQuerySchema,
  editPatQuerySchema,
  deletePatQuerySchema,
} from "../validation/pats.js";

// ---------------------------------------------------------------------------
// OpenAPI JSON Schema definitions
// ---------------------------------------------------------------------------

const errorJsonSchema = {
  type: "object" as const,
  properties: {
    error: { type: "string" as const },
  },
};

const patJsonSchema = {
  type: "object" as const,
  properties: {
    id: { type: "string" as const },
    access_token: { type: "string" as const },
    scope: { type: "string" as const },
    user_id: { type: "string" as const },
    expires_at: { type: "string" as const, format: "date-time" as const },
  },
};

// ---------------------------------------------------------------------------
// Personal access token routes plugin
// ---------------------------------------------------------------------------

/**
 * Personal access token management. All routes need the identity provider's
 * session cookie; a PAT cannot be used to manage PATs.
 *
 * - POST   /v2/pat  -- Create a token
 * - GET    /v2/pat  -- List own tokens (expired included)
 * - PATCH  /v2/pat  -- Change scope and/or expiry
 * - DELETE /v2/pat  -- Revoke a token
 */
export function patRoutes(): FastifyPluginCallback {
  return (app, _opts, done) => {
    const { env, authMiddleware, patService } = app;
    const createQuerySchema = createPatQuerySchema(env.PAT_MAX_EXPIRE_DAYS);
    const editQuerySchema = editPatQuerySchema(env.PAT_MAX_EXPIRE_DAYS);

    // -------------------------------------------------------------------
    // POST /v2/pat (session required)
    // -------------------------------------------------------------------

    app.post("/v2/pat", {
      preHandler: [authMiddleware.requireSession],
      schema: {
        tags: ["Personal Access Tokens"],
        summary: "Create a personal access token; the secret is only shown here and in listings",
        querystring: {
          type: "object",
          required: ["scope", "expire_in_days"],
          properties: {
            scope: { type: "string" },
            expire_in_days: { type: "string" },
          },
        },
        response: {
          200: patJsonSchema,
          400: errorJsonSchema,
          401: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const user = request.user;
      if (!user) {
        return reply.status(401).send({ error: "Authentication required" });
      }

      const parsed = createQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        throw badRequest("Invalid personal access token parameters");
      }

      const pat = await patService.create(user.id, {
        scope: parsed.data.scope,
        expireInDays: parsed.data.expire_in_days,
      });
      return reply.status(200).send(pat);
    });

    // -------------------------------------------------------------------
    // GET /v2/pat (session required)
    // -------------------------------------------------------------------

    app.get("/v2/pat", {
      preHandler: [authMiddleware.requireSession],
      schema: {
        tags: ["Personal Access Tokens"],
        summary: "List the caller's personal access tokens",
        response: {
          200: { type: "array", items: patJsonSchema },
          401: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const user = request.user;
      if (!user) {
        return reply.status(401).send({ error: "Authentication required" });
      }

      const pats = await patService.list(user.id);
      return reply.status(200).send(pats);
    });

    // -------------------------------------------------------------------
    // PATCH /v2/pat (session required)
    // -------------------------------------------------------------------

    app.patch("/v2/pat", {
      preHandler: [authMiddleware.requireSession],
      schema: {
        tags: ["Personal Access Tokens"],
        summary: "Change a token's scope or reset its expiry from now",
        querystring: {
          type: "object",
          required: ["access_token"],
          properties: {
            access_token: { type: "string" },
            scope: { type: "string" },
            expire_in_days: { type: "string" },
          },
        },
        response: {
          200: patJsonSchema,
          400: errorJsonSchema,
          401: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const user = request.user;
      if (!user) {
        return reply.status(401).send({ error: "Authentication required" });
      }

      const parsed = editQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        throw badRequest("Invalid personal access token parameters");
      }

      const pat = await patService.edit(user.id, parsed.data.access_token, {
        scope: parsed.data.scope,
        expireInDays: parsed.data.expire_in_days,
      });
      return reply.status(200).send(pat);
    });

    // -------------------------------------------------------------------
    // DELETE /v2/pat (session required)
    // -------------------------------------------------------------------

    app.delete("/v2/pat", {
      preHandler: [authMiddleware.requireSession],
      schema: {
        tags: ["Personal Access Tokens"],
        summary: "Revoke a personal access token",
        querystring: {
          type: "object",
          required: ["access_token"],
          properties: {
            access_token: { type: "string" },
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

      const parsed = deletePatQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        throw badRequest("Invalid personal access token parameters");
      }

      await patService.revoke(user.id, parsed.data.access_token);
      return reply.status(204).send();
    });

    done();
  };
}
