/**
 * Global Error Handler Middleware
 *
 * Catches unhandled errors in any route and returns a consistent
 * structured JSON response. Also logs errors with timestamps for
 * debugging.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { CapabilityError, ErrorCodes } from "../lib/errors.ts";

// ---------------------------------------------------------------------------
// Error response type
// ---------------------------------------------------------------------------

export interface StructuredError {
  error: string;
  code: string;
  status: ContentfulStatusCode;
}

// ---------------------------------------------------------------------------
// Error mapper: known error types → structured response
// ---------------------------------------------------------------------------

/** Codes recognised in a "code: details" message prefix */
const PREFIXED_CODES: Record<string, keyof typeof ErrorCodes> = {
  session_not_found: "SESSION_NOT_FOUND",
  session_busy: "SESSION_BUSY",
  session_exists: "SESSION_EXISTS",
  validation_failed: "VALIDATION_FAILED",
};

export function mapErrorToResponse(err: unknown): StructuredError {
  if (err instanceof CapabilityError) {
    const { status, code } = ErrorCodes.CAPABILITY_FAILED;
    return { error: err.message, code, status };
  }

  if (err instanceof Error) {
    if (err.name === "ZodError") {
      return {
        error: "Validation failed",
        code: ErrorCodes.VALIDATION_FAILED.code,
        status: ErrorCodes.VALIDATION_FAILED.status,
      };
    }

    const colonIndex = err.message.indexOf(":");
    const known = colonIndex > 0 ? PREFIXED_CODES[err.message.slice(0, colonIndex)] : undefined;
    if (known) {
      const { status, code } = ErrorCodes[known];
      return { error: err.message.slice(colonIndex + 1).trim(), code, status };
    }

    if (err instanceof SyntaxError && err.message.includes("JSON")) {
      return {
        error: "Invalid request body",
        code: ErrorCodes.INVALID_JSON.code,
        status: ErrorCodes.INVALID_JSON.status,
      };
    }
  }

  return {
    error: "Internal server error",
    code: ErrorCodes.INTERNAL_ERROR.code,
    status: ErrorCodes.INTERNAL_ERROR.status,
  };
}

// ---------------------------------------------------------------------------
// Logging helper
// ---------------------------------------------------------------------------

function logError(err: unknown, path: string, method: string): void {
  const timestamp = new Date().toISOString();
  const errMsg =
    err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  const stack = err instanceof Error ? err.stack : undefined;

  console.error(
    JSON.stringify({
      level: "error",
      timestamp,
      method,
      path,
      error: errMsg,
      ...(stack && { stack }),
    })
  );
}

// ---------------------------------------------------------------------------
// Hono onError handler
// ---------------------------------------------------------------------------

/**
 * Global error handler for Hono's app.onError().
 *
 * Usage:
 *   app.onError(globalErrorHandler);
 */
export function globalErrorHandler(err: Error, c: Context): Response {
  logError(err, c.req.path, c.req.method);

  const structured = mapErrorToResponse(err);
  return c.json(structured, structured.status);
}

// ---------------------------------------------------------------------------
// 404 Not Found handler
// ---------------------------------------------------------------------------

/**
 * Global 404 handler for Hono's app.notFound().
 */
export function notFoundHandler(c: Context): Response {
  return c.json(
    {
      error: `Route ${c.req.method} ${c.req.path} not found`,
      code: "not_found",
      status: 404,
    },
    404
  );
}
