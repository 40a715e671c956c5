import type { FastifyInstance, FastifyPluginCallback } from "fastify";
import { sql } from "drizzle-orm";

const VERSION = "0.1.0";

interface CheckResult {
  status: "healthy" | "unhealthy";
  latency?: number;
}

/** Time one dependency check; failures are logged and reported, never thrown. */
async function checkDependency(
  app: FastifyInstance,
  name: string,
  run: () => Promise<unknown>,
): Promise<CheckResult> {
  const started = performance.now();
  try {
    await run();
    return { status: "healthy", latency: Math.round(performance.now() - started) };
  } catch (err: unknown) {
    app.log.warn({ err, check: name }, "Readiness check failed");
    return { status: "unhealthy" };
  }
}

/**
 * - GET /api/health       -- Liveness
 * - GET /api/health/ready -- PostgreSQL (reports, PATs) and Valkey (sessions)
 */
const healthRoutes: FastifyPluginCallback = (app, _opts, done) => {
  app.get("/api/health", { schema: { tags: ["Health"], summary: "Liveness" } }, async (_request, reply) => {
    return reply.send({
      status: "healthy",
      version: VERSION,
      uptime: process.uptime(),
    });
  });

  app.get("/api/health/ready", { schema: { tags: ["Health"], summary: "Readiness" } }, async (_request, reply) => {
    const checks: Record<string, CheckResult> = {
      database: await checkDependency(app, "database", () => app.db.execute(sql`SELECT 1`)),
      cache: await checkDependency(app, "cache", () => app.cache.ping()),
    };

    const ready = Object.values(checks).every((c) => c.status === "healthy");
    return reply.status(ready ? 200 : 503).send({
      status: ready ? "ready" : "degraded",
      checks,
    });
  });

  done();
};

export default healthRoutes;
