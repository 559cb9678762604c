/**
 * @cosign/event-store — Append-only notification log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a tamper-evident hash chain
 * - Multisig domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashableEvent,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";

// Multisig domain events
export { MULTISIG_EVENTS, walletStreamId } from "./multisig-events.js";
export type {
  MultisigEventType,
  WalletInitializedPayload,
  ProposalCreatedPayload,
  ProposalApprovedPayload,
  ProposalExecutedPayload,
} from "./multisig-events.js";
