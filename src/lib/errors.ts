/**
 * Standardized Error Handling
 *
 * Provides consistent error response format across all API routes.
 * Format: { error: string, code: string, details?: unknown }
 */

import type { Context } from "hono";

export interface ApiError {
  error: string;
  code: string;
  details?: unknown;
}

/**
 * Standard error codes mapped to HTTP status codes
 */
export const ErrorCodes = {
  // 400 Bad Request
  VALIDATION_FAILED: { status: 400, code: "validation_failed" },
  INVALID_JSON: { status: 400, code: "invalid_json" },

  // 404 Not Found
  SESSION_NOT_FOUND: { status: 404, code: "session_not_found" },

  // 409 Conflict
  SESSION_BUSY: { status: 409, code: "session_busy" },
  SESSION_EXISTS: { status: 409, code: "session_exists" },

  // 500 Internal Server Error
  INTERNAL_ERROR: { status: 500, code: "internal_error" },

  // 502 Bad Gateway
  CAPABILITY_FAILED: { status: 502, code: "capability_failed" },
} as const;

/**
 * Extract a printable message from any thrown value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Raised when the text-generation capability is unreachable, times out, or
 * returns nothing usable. The orchestrator treats it as a step-level failure.
 */
export class CapabilityError extends Error {
  public readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CapabilityError";
    this.provider = provider;
  }
}

/**
 * Create a standardized API error response
 */
export function apiError(
  c: Context,
  errorCode: keyof typeof ErrorCodes,
  details?: unknown
) {
  const { status, code } = ErrorCodes[errorCode];
  const response: ApiError = {
    error: code,
    code,
    ...(details !== undefined && { details }),
  };
  return c.json(response, status);
}

/**
 * Parse error from caught exception and return appropriate API error
 */
export function handleError(c: Context, err: unknown): Response {
  if (err instanceof CapabilityError) {
    return apiError(c, "CAPABILITY_FAILED", err.message);
  }

  if (err instanceof Error) {
    const message = err.message;

    // Try to extract error code from message (format: "code: details")
    const colonIndex = message.indexOf(":");
    if (colonIndex > 0) {
      const prefix = message.substring(0, colonIndex);
      const details = message.substring(colonIndex + 2); // Skip ": "

      const errorMap: Record<string, keyof typeof ErrorCodes> = {
        session_not_found: "SESSION_NOT_FOUND",
        session_busy: "SESSION_BUSY",
        session_exists: "SESSION_EXISTS",
        validation_failed: "VALIDATION_FAILED",
      };

      const errorCode = errorMap[prefix];
      if (errorCode) {
        return apiError(c, errorCode, details);
      }
    }

    // Fallback to generic internal error with message
    return apiError(c, "INTERNAL_ERROR", message);
  }

  // Handle non-Error thrown values
  return apiError(c, "INTERNAL_ERROR", String(err));
}

/**
 * Helper to throw an error that will be handled by handleError
 */
export function throwApiError(code: keyof typeof ErrorCodes, details?: string): never {
  const { code: errorCode } = ErrorCodes[code];
  const message = details ? `${errorCode}: ${details}` : errorCode;
  throw new Error(message);
}
