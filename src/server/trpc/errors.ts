/**
 * tRPC Error Helpers
 *
 * Consistent error creation across the API. The application code travels in
 * the error's cause; the tRPC code decides the HTTP status.
 */

import { TRPCError } from "@trpc/server";

/**
 * Error codes used across the API.
 */
export const ErrorCodes = {
  // Authentication errors (401)
  UNAUTHORIZED: "UNAUTHORIZED",

  // Server errors (500)
  USER_RESOLUTION_FAILED: "USER_RESOLUTION_FAILED",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Maps our error codes to tRPC error codes
 */
const errorCodeToTRPCCode: Record<ErrorCode, "UNAUTHORIZED" | "INTERNAL_SERVER_ERROR"> = {
  UNAUTHORIZED: "UNAUTHORIZED",
  USER_RESOLUTION_FAILED: "INTERNAL_SERVER_ERROR",
};

/**
 * Creates a TRPCError with consistent formatting.
 *
 * @param code - The application error code
 * @param message - Human-readable error message
 * @param details - Optional additional context
 */
export function createError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): TRPCError {
  return new TRPCError({
    code: errorCodeToTRPCCode[code],
    message,
    cause: details ? { code, details } : { code },
  });
}

/**
 * Reads the application error code back out of a TRPCError.
 */
export function getErrorCode(error: TRPCError): ErrorCode | undefined {
  const cause: unknown = error.cause;
  if (typeof cause !== "object" || cause === null || !("code" in cause)) {
    return undefined;
  }
  const code = cause.code;
  return Object.values(ErrorCodes).find((candidate) => candidate === code);
}

/**
 * Convenience functions for common errors
 */
export const errors = {
  unauthorized: (message = "You must be logged in") =>
    createError(ErrorCodes.UNAUTHORIZED, message),

  userResolutionFailed: (reason?: string) =>
    createError(
      ErrorCodes.USER_RESOLUTION_FAILED,
      "Unable to load user settings",
      reason ? { reason } : undefined
    ),
};
