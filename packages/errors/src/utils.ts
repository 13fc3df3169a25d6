import { FaultlineError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Return a FaultlineError for a failure caught during `operation`.
 *
 * FaultlineErrors pass through unchanged; anything else becomes an
 * `INTERNAL_ERROR` naming the operation and keeping the original as cause.
 */
export function wrapError(error: unknown, operation: string): FaultlineError {
  if (error instanceof FaultlineError) {
    return error;
  }

  return new InternalError({
    code: "INTERNAL_ERROR",
    message: `${operation} failed: ${getErrorMessage(error)}`,
    metadata: {
      operation,
      ...(error instanceof Error ? { originalName: error.name } : {}),
    },
    cause: error,
  });
}
