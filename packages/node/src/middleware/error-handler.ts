/**
 * Global error handler.
 *
 * Maps domain error codes to HTTP statuses and answers with the error
 * envelope. Anything without a known code is a 500 whose message is
 * not exposed.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Runtime errors
  UNKNOWN_BLOCK: 404,

  // Ledger errors
  ACCOUNT_ALREADY_HAS_PET: 409,
  ACCOUNT_HAS_NO_PET: 404,
  INVALID_HEIGHT: 400,

  // Event store errors
  INVALID_POSITION: 400,
  INVALID_LIMIT: 400,
};

function codeOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/**
 * Build the onError handler. `onInternalError` sees every error that
 * becomes a 500.
 */
export function createErrorHandler(
  onInternalError?: (err: Error, c: Context) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    const code = codeOf(err);
    const status = code === undefined ? undefined : STATUS_MAP[code];

    if (code === undefined || status === undefined) {
      onInternalError?.(err, c);
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code, err.message), status);
  };
}
