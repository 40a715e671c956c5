import * as Sentry from "@sentry/node";
import type { FastifyError, FastifyInstance } from "fastify";
import { ApiError } from "./api-errors.js";

export interface ErrorHandlerOptions {
  /** Report 5xx errors to GlitchTip/Sentry (only when a DSN was configured). */
  reportToSentry: boolean;
  /** Include the original message of 5xx errors in the response body. */
  exposeInternalMessages: boolean;
}

function clientStatus(error: FastifyError | Error): number | undefined {
  if (error instanceof ApiError) {
    return error.statusCode;
  }
  if ("validation" in error && error.validation !== undefined) {
    return 400;
  }
  if ("statusCode" in error && typeof error.statusCode === "number" && error.statusCode < 500) {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Install the application-wide error handler.
 *
 * - 404s go out with an empty body, whether the record is missing or hidden.
 * - Other client errors carry `{ error: message }`.
 * - Everything else is logged and answered with a generic 500.
 */
export function registerErrorHandler(app: FastifyInstance, options: ErrorHandlerOptions): void {
  app.setErrorHandler((error: FastifyError | Error, request, reply) => {
    const status = clientStatus(error);

    if (status === 404) {
      return reply.status(404).send();
    }

    if (status !== undefined) {
      request.log.debug({ err: error, statusCode: status }, "Client error");
      return reply.status(status).send({ error: error.message });
    }

    if (options.reportToSentry) {
      Sentry.captureException(error);
    }
    request.log.error({ err: error, requestId: request.id }, "Unhandled error");

    return reply.status(500).send({
      error: "Internal Server Error",
      message: options.exposeInternalMessages ? error.message : "An unexpected error occurred",
      statusCode: 500,
    });
  });
}
