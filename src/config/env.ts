import { z } from "zod/v4";

const portSchema = z
  .string()
  .default("3000")
  .transform((val) => Number(val))
  .pipe(z.number().int().min(1).max(65535));

const positiveIntFromString = (defaultVal: string) =>
  z
    .string()
    .default(defaultVal)
    .transform((val) => Number(val))
    .pipe(z.number().int().positive());

export const envSchema = z.object({
  // Required
  DATABASE_URL: z.url(),
  VALKEY_URL: z.url(),

  // Server
  HOST: z.string().default("0.0.0.0"),
  PORT: portSchema,
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),

  // CORS
  CORS_ORIGINS: z.string().default("http://localhost:3001"),

  // Rate limiting (requests per minute per client)
  RATE_LIMIT_READ: positiveIntFromString("300"),

  // Identity provider session (cookie issued by the provider, looked up in Valkey)
  SESSION_COOKIE_NAME: z.string().min(1).default("session"),

  // Personal access tokens
  PAT_MAX_EXPIRE_DAYS: positiveIntFromString("365"),

  // Monitoring (GlitchTip - Sentry SDK compatible)
  GLITCHTIP_DSN: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(env: Record<string, unknown>): Env {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const formatted = z.prettifyError(result.error);
    throw new Error(`Invalid environment configuration:\n${formatted}`);
  }
  return result.data;
}

/** Verbose logging also unmasks 5xx messages and enables pretty output. */
export function isVerbose(env: Pick<Env, "LOG_LEVEL">): boolean {
  return env.LOG_LEVEL === "debug" || env.LOG_LEVEL === "trace";
}
