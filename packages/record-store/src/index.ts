/**
 * @cosign/record-store — Transactional record substrate.
 *
 * Provides:
 * - Derived authority addresses (seeds + owner → off-curve address)
 * - Authority tokens scoped to one invocation
 * - RecordStore interface with all-or-nothing optimistic transactions
 * - InMemoryRecordStore for tests and single-process deployments
 *
 * @packageDocumentation
 */

// Core types
export type {
  RecordData,
  StoredRecord,
  CommitResult,
  RecordTransaction,
  RecordStore,
  RecordStoreErrorCode,
} from "./types.js";
export { RecordStoreError } from "./types.js";

// Derivation
export type { Seed, DerivedAddress, DerivationErrorCode } from "./derive.js";
export {
  MAX_SEEDS,
  MAX_SEED_LENGTH,
  DerivationError,
  createDerivedAddress,
  findDerivedAddress,
  isOnCurve,
  seedFromAddress,
  seedFromIndex,
} from "./derive.js";

// Authority
export type { AuthorityToken } from "./authority.js";
export { mintAuthority, withAuthority, isAuthorityFor } from "./authority.js";

// Implementations
export { InMemoryRecordStore } from "./in-memory-store.js";
