/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope response. Known domain error codes map to HTTP status
 * codes; anything else is a 500 whose details stay in the log.
 */

import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

const STATUS_MAP: ReadonlyMap<string, ErrorStatus> = new Map<string, ErrorStatus>([
  // Multisig errors
  ["THRESHOLD_INVALID", 400],
  ["DUPLICATE_SIGNER", 400],
  ["MALFORMED_SIGNER", 400],
  ["INVALID_ACTION", 400],
  ["INVALID_SIGNER", 403],
  ["ALREADY_EXECUTED", 409],
  ["ALREADY_APPROVED", 409],
  ["NOT_ENOUGH_APPROVALS", 422],

  // Record store errors
  ["RECORD_NOT_FOUND", 404],
  ["RECORD_EXISTS", 409],
  ["CONCURRENCY_CONFLICT", 409],
  ["OWNER_MISMATCH", 409],
  ["SEED_MISMATCH", 409],

  // Delegate errors
  ["UNKNOWN_HANDLER", 422],
  ["MISSING_RECORD", 400],
  ["MISSING_SIGNATURE", 403],
  ["READONLY_RECORD", 400],
  ["HANDLER_REJECTED", 422],
]);

function errorCodeOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export const handleError: ErrorHandler<AppEnv> = (err, c) => {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  const code = errorCodeOf(err);
  const status = (code !== undefined ? STATUS_MAP.get(code) : undefined) ?? 500;

  if (status === 500) {
    c.get("log").error({ err }, "Unhandled error");
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
};
