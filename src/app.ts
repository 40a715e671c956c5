import Fastify from "fastify";
import helmet from "@fastify/helmet";
import cors from "@fastify/cors";
import cookie from "@fastify/cookie";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import scalarApiReference from "@scalar/fastify-api-reference";
import * as Sentry from "@sentry/node";
import type { Env } from "./config/env.js";
import { isVerbose } from "./config/env.js";
import { createDb } from "./db/index.js";
import type { Database } from "./db/index.js";
import { createCache } from "./cache/index.js";
import type { Cache } from "./cache/index.js";
import { createSessionService } from "./auth/session.js";
import type { SessionService } from "./auth/session.js";
import { createAuthenticator } from "./auth/authenticate.js";
import { createAuthMiddleware } from "./auth/middleware.js";
import type { AuthMiddleware } from "./auth/middleware.js";
import type { AuthenticatedUser } from "./auth/access.js";
import { createIdGenerator } from "./lib/ids.js";
import { registerErrorHandler } from "./lib/error-handler.js";
import { createPatService } from "./services/pat.js";
import type { PatService } from "./services/pat.js";
import { createThreadService } from "./services/thread.js";
import type { ThreadService } from "./services/thread.js";
import { createReportService } from "./services/report.js";
import type { ReportService } from "./services/report.js";
import { createEntityOracle } from "./services/entity-oracle.js";
import healthRoutes from "./routes/health.js";
import { patRoutes } from "./routes/pats.js";
import { reportRoutes } from "./routes/reports.js";
import { threadRoutes } from "./routes/threads.js";

// Extend Fastify types with decorated properties
declare module "fastify" {
  interface FastifyInstance {
    db: Database;
    cache: Cache;
    env: Env;
    sessionService: SessionService;
    authMiddleware: AuthMiddleware;
    patService: PatService;
    threadService: ThreadService;
    reportService: ReportService;
  }
}

export async function buildApp(env: Env) {
  // Initialize GlitchTip/Sentry if DSN provided
  if (env.GLITCHTIP_DSN) {
    Sentry.init({
      dsn: env.GLITCHTIP_DSN,
      environment: isVerbose(env) ? "development" : "production",
    });
  }

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      ...(isVerbose(env) ? { transport: { target: "pino-pretty" } } : {}),
    },
    trustProxy: true,
  });

  // Database
  const { db, client: dbClient } = createDb(env.DATABASE_URL);
  app.decorate("db", db);
  app.decorate("env", env);

  // Cache (identity provider sessions)
  const cache = createCache(env.VALKEY_URL, app.log);
  app.decorate("cache", cache);

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'", "'unsafe-inline'", "https://cdn.jsdelivr.net"],
        styleSrc: ["'self'", "'unsafe-inline'", "https://cdn.jsdelivr.net"],
        imgSrc: ["'self'", "data:", "https:"],
        connectSrc: ["'self'"],
        fontSrc: ["'self'", "https://cdn.jsdelivr.net"],
        objectSrc: ["'none'"],
        frameSrc: ["'none'"],
      },
    },
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true,
      preload: true,
    },
  });

  // CORS
  await app.register(cors, {
    origin: env.CORS_ORIGINS.split(",").map((o) => o.trim()),
    credentials: true,
    methods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  });

  // Rate limiting
  await app.register(rateLimit, {
    max: env.RATE_LIMIT_READ,
    timeWindow: "1 minute",
  });

  // Cookies (the provider session cookie is read by the auth middleware)
  await app.register(cookie);

  // Services
  const ids = createIdGenerator(app.log);
  const sessionService = createSessionService(cache, app.log);
  app.decorate("sessionService", sessionService);

  const patService = createPatService(db, app.log, { ids });
  app.decorate("patService", patService);

  const threadService = createThreadService(db, app.log, ids);
  app.decorate("threadService", threadService);

  const reportService = createReportService(db, app.log, {
    ids,
    threads: threadService,
    oracle: createEntityOracle(),
  });
  app.decorate("reportService", reportService);

  // Auth middleware (request decoration must happen before hooks can set the property)
  app.decorateRequest("user", undefined as AuthenticatedUser | undefined);
  const authenticator = createAuthenticator(db, sessionService, patService, app.log);
  const authMiddleware = createAuthMiddleware(authenticator, app.log, {
    sessionCookieName: env.SESSION_COOKIE_NAME,
  });
  app.decorate("authMiddleware", authMiddleware);

  // OpenAPI documentation (register before routes so schemas are collected)
  await app.register(swagger, {
    openapi: {
      openapi: "3.1.0",
      info: {
        title: "Moderation Reports API",
        description:
          "Moderation reports with discussion threads, and personal access tokens.",
        version: "0.1.0",
      },
      components: {
        securitySchemes: {
          bearerAuth: {
            type: "http",
            scheme: "bearer",
            description: "Personal access token from POST /v2/pat",
          },
        },
      },
    },
  });

  await app.register(scalarApiReference, {
    routePrefix: "/docs",
    configuration: {
      theme: "kepler",
    },
  });

  // Routes
  await app.register(healthRoutes);
  await app.register(patRoutes());
  await app.register(reportRoutes());
  await app.register(threadRoutes());

  // OpenAPI document endpoint (after routes so all schemas are registered)
  app.get("/api/openapi.json", { schema: { hide: true } }, async (_request, reply) => {
    return reply
      .header("Content-Type", "application/json")
      .send(app.swagger());
  });

  app.addHook("onClose", async () => {
    app.log.info("Shutting down...");
    await cache.quit();
    await dbClient.end();
    app.log.info("Connections closed");
  });

  registerErrorHandler(app, {
    reportToSentry: Boolean(env.GLITCHTIP_DSN),
    exposeInternalMessages: isVerbose(env),
  });

  return app;
}
