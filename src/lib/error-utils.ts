/**
 * Error handling utilities for consistent error message extraction
 */

/**
 * Extract a log-friendly message from an unknown error.
 * Handles Error instances, strings, and unknown types safely.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "An unexpected error occurred";
}

function errorCode(error: unknown): string | null {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

/** True for fs errors raised because the path does not exist */
export function isFileNotFound(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

/**
 * Describe a rejected fetch() call.
 *
 * fetch rejects with "fetch failed" and hides the socket error in `cause`;
 * AbortSignal.timeout rejects with a TimeoutError.
 */
export function describeFetchError(error: unknown): string {
  if (error instanceof Error && error.name === "TimeoutError") {
    return "request timed out";
  }

  const message = getErrorMessage(error);
  if (error instanceof Error && error.cause !== undefined) {
    const cause = errorCode(error.cause) ?? getErrorMessage(error.cause);
    return `${message} (${cause})`;
  }
  return message;
}
