// ---------------------------------------------------------------------------
// Standard API error helpers
// ---------------------------------------------------------------------------
// Services and routes throw these; the error handler in error-handler.ts
// turns `statusCode` into the HTTP response code.
// ---------------------------------------------------------------------------

/**
 * Base API error with an HTTP status code.
 * Fastify uses `statusCode` on thrown errors to set the response status.
 */
export class ApiError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.statusCode = statusCode;
    this.name = "ApiError";
  }
}

/**
 * Create a 400 Bad Request error (malformed or unresolvable input).
 *
 * @param message - Human-readable description of the validation failure.
 */
export function badRequest(message: string): ApiError {
  return new ApiError(400, message);
}

/**
 * Create a 401 Unauthorized error (no resolvable identity).
 */
export function unauthorized(message: string): ApiError {
  return new ApiError(401, message);
}

/**
 * Create a 404 Not Found error. Also used to mask records the caller may not
 * see, so the message never reaches the client.
 */
export function notFound(message: string): ApiError {
  return new ApiError(404, message);
}
