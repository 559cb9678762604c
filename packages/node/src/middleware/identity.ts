/**
 * Identity middleware.
 *
 * Mutating requests carry the caller's Ed25519 public key in X-Identity,
 * the signing time (milliseconds since the epoch) in X-Timestamp, and a
 * signature in X-Signature over the canonical JSON (RFC 8785) of
 *
 *   { method, path, body, timestamp }
 *
 * where `body` is the parsed JSON body, or null when there is none.
 *
 * A timestamp further than `maxAgeMs` from the server clock is refused,
 * and each signature is accepted once within that window.
 *
 * On success, sets `c.set("identity", key)`. On failure, returns 401
 * before any handler runs. GET and HEAD pass through unauthenticated.
 */

import { ed25519 } from "@noble/curves/ed25519";
import { utf8ToBytes } from "@noble/hashes/utils";
import { canonicalize } from "json-canonicalize";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const IDENTITY_HEADER = "X-Identity";
export const SIGNATURE_HEADER = "X-Signature";
export const TIMESTAMP_HEADER = "X-Timestamp";

export const DEFAULT_SIGNATURE_MAX_AGE_MS = 5 * 60 * 1000;

const IDENTITY_PATTERN = /^[0-9a-f]{64}$/;
const SIGNATURE_PATTERN = /^[0-9a-f]{128}$/;
const TIMESTAMP_PATTERN = /^[0-9]{1,15}$/;

/**
 * Bytes a caller signs for a request.
 */
export function signingMessage(
  method: string,
  path: string,
  body: unknown,
  timestamp: number,
): Uint8Array {
  return utf8ToBytes(
    canonicalize({ method: method.toUpperCase(), path, body: body ?? null, timestamp }),
  );
}

// =============================================================================
// Replay Cache
// =============================================================================

/**
 * Signatures seen within the acceptance window, with the time each one
 * stops being acceptable anyway.
 */
export class SeenSignatures {
  private readonly _expiresAt = new Map<string, number>();

  /**
   * Record a signature. Returns false if it was already recorded and has
   * not expired.
   */
  claim(signature: string, expiresAt: number, now: number): boolean {
    for (const [seen, expiry] of this._expiresAt) {
      if (expiry < now) this._expiresAt.delete(seen);
    }
    if (this._expiresAt.has(signature)) {
      return false;
    }
    this._expiresAt.set(signature, expiresAt);
    return true;
  }

  get size(): number {
    return this._expiresAt.size;
  }
}

// =============================================================================
// Middleware
// =============================================================================

export interface IdentityOptions {
  /** Largest accepted distance between X-Timestamp and the server clock */
  readonly maxAgeMs?: number;
  readonly now?: () => number;
}

export function identityMiddleware(options: IdentityOptions = {}): MiddlewareHandler<AppEnv> {
  const maxAgeMs = options.maxAgeMs ?? DEFAULT_SIGNATURE_MAX_AGE_MS;
  const now = options.now ?? Date.now;
  const seen = new SeenSignatures();

  return async (c, next) => {
    if (c.req.method === "GET" || c.req.method === "HEAD") {
      return next();
    }

    const identity = c.req.header(IDENTITY_HEADER);
    const signature = c.req.header(SIGNATURE_HEADER);
    const timestampHeader = c.req.header(TIMESTAMP_HEADER);
    if (identity === undefined || signature === undefined || timestampHeader === undefined) {
      return c.json(
        createErrorEnvelope(
          "UNAUTHORIZED",
          `Missing ${IDENTITY_HEADER}, ${SIGNATURE_HEADER} or ${TIMESTAMP_HEADER} header`,
        ),
        401,
      );
    }
    if (
      !IDENTITY_PATTERN.test(identity) ||
      !SIGNATURE_PATTERN.test(signature) ||
      !TIMESTAMP_PATTERN.test(timestampHeader)
    ) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Malformed identity, signature or timestamp"),
        401,
      );
    }

    const timestamp = Number(timestampHeader);
    const current = now();
    if (Math.abs(current - timestamp) > maxAgeMs) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Request timestamp is outside the accepted window"),
        401,
      );
    }

    const text = await c.req.text();
    let body: unknown = null;
    if (text !== "") {
      try {
        body = JSON.parse(text);
      } catch {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
          400,
        );
      }
    }

    const message = signingMessage(c.req.method, c.req.path, body, timestamp);
    if (!ed25519.verify(signature, message, identity)) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Signature does not match request"),
        401,
      );
    }

    if (!seen.claim(signature, timestamp + maxAgeMs, current)) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Request has already been used"),
        401,
      );
    }

    c.set("identity", identity);
    return next();
  };
}
