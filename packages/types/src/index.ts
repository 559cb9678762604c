/**
 * @cosign/types — Shared domain types for the Cosign stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Identity types
export type { IdentityKey, Address } from "./identity.js";

// Action types
export type { ActionDescriptor, RecordRef } from "./action.js";

// Event types
export type { DomainEvent, EventMetadata } from "./event.js";

// Runtime type guards
export {
  isIdentityKey,
  isAddress,
  isHexBytes,
  isRecordRef,
  isActionDescriptor,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
