/**
 * Error Classification
 * Maps thrown errors to FailureCause data at the network and disk boundaries
 */

import { ZodError } from "zod";
import type { FailureCause } from "../types";
import { HttpError } from "./errors";

// Disk conditions that will not clear up between attempts
const PERMANENT_FS_CODES = new Set([
  "ENOSPC",
  "EDQUOT",
  "EACCES",
  "EPERM",
  "EROFS",
  "EISDIR",
  "ENOTDIR",
  "ENAMETOOLONG",
]);

/**
 * Read the system error code (e.g. "ECONNRESET") from an error, if any
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

/**
 * Classify an error thrown while requesting or parsing a remote resource
 *
 * - 5xx and 429 responses are retryable server failures
 * - Other non-2xx responses are not retryable
 * - Invalid JSON or an unexpected body shape is a retryable malformed response
 * - Everything else (timeouts, refused connections, DNS) is a retryable network failure
 */
export function classifyRequestError(error: unknown): FailureCause {
  if (error instanceof HttpError) {
    return {
      kind: "server",
      message: error.message,
      retryable: error.status >= 500 || error.status === 429,
      status: error.status,
    };
  }

  if (error instanceof ZodError) {
    return {
      kind: "malformed",
      message: `Unexpected response shape: ${error.issues.map((e) => `${e.path.map(String).join(".") || "body"}: ${e.message}`).join("; ")}`,
      retryable: true,
    };
  }

  if (error instanceof SyntaxError) {
    return {
      kind: "malformed",
      message: `Invalid response body: ${error.message}`,
      retryable: true,
    };
  }

  if (isAbortError(error)) {
    return {
      kind: "network",
      message: "Request timed out",
      retryable: true,
      code: "ETIMEDOUT",
    };
  }

  if (error instanceof Error) {
    // fetch() reports socket errors as TypeError("fetch failed") with the
    // system error attached as its cause
    const code = systemErrorCode(error.cause) ?? systemErrorCode(error);
    return {
      kind: "network",
      message: code ? `${error.message} (${code})` : error.message,
      retryable: true,
      ...(code ? { code } : {}),
    };
  }

  return { kind: "network", message: String(error), retryable: true };
}

/**
 * Classify an error thrown while writing artifacts to disk
 * Disk-full and permission errors fail fast; anything else may be retried.
 */
export function classifyPersistenceError(error: unknown): FailureCause {
  const code = systemErrorCode(error);
  const message = error instanceof Error ? error.message : String(error);
  return {
    kind: "persistence",
    message,
    retryable: !(code && PERMANENT_FS_CODES.has(code)),
    ...(code ? { code } : {}),
  };
}
