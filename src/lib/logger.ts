// Pino logger owned by Fastify (see buildApp). Services take it by this type
// so they can be constructed outside a request and mocked in tests.
export type { FastifyBaseLogger as Logger } from "fastify";
