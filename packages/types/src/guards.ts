/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types, used where values cross
 * a boundary (request bodies, decoded records, stored events).
 */

import type { Address, IdentityKey } from "./identity.js";
import type { ActionDescriptor, RecordRef } from "./action.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Identity guards
// =============================================================================

const KEY_PATTERN = /^[0-9a-f]{64}$/;
const HEX_PATTERN = /^(?:[0-9a-f]{2})*$/;

export function isIdentityKey(value: unknown): value is IdentityKey {
  return typeof value === "string" && KEY_PATTERN.test(value);
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && KEY_PATTERN.test(value);
}

/**
 * Even-length lowercase hex, including the empty string.
 */
export function isHexBytes(value: unknown): value is string {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

// =============================================================================
// Action guards
// =============================================================================

export function isRecordRef(value: unknown): value is RecordRef {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAddress(v.address) &&
    typeof v.isSigner === "boolean" &&
    typeof v.isWritable === "boolean"
  );
}

export function isActionDescriptor(value: unknown): value is ActionDescriptor {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.handler === "string" &&
    v.handler.length > 0 &&
    isHexBytes(v.payload) &&
    Array.isArray(v.records) &&
    v.records.every(isRecordRef)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["wallet", "proposal"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
