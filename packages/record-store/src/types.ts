/**
 * @cosign/record-store — Core types.
 *
 * The record store is the substrate the multisig engine runs on: records
 * live at addresses, every record has an owner, and every change happens
 * inside a transaction that commits all of its writes or none of them.
 *
 * Design principles:
 * - Records are versioned (1 on creation, +1 per committed write)
 * - Only a record's owner may rewrite it
 * - Optimistic concurrency: a transaction that read a record another
 *   transaction has since committed is rejected outright, never merged
 * - Reads return copies; nothing outside a commit mutates stored data
 */

import type { Address } from "@cosign/types";

// =============================================================================
// Records
// =============================================================================

/**
 * Record contents. JSON-shaped; owners decode it with their own schema.
 */
export type RecordData = Readonly<Record<string, unknown>>;

/**
 * A record as held by the store.
 */
export interface StoredRecord {
  /** Address the record lives at */
  readonly address: Address;

  /** Id of the component allowed to rewrite this record */
  readonly owner: string;

  /** Record contents */
  readonly data: RecordData;

  /** Committed version (1-based, monotonically increasing) */
  readonly version: number;
}

// =============================================================================
// Transactions
// =============================================================================

/**
 * Result of a successful commit.
 */
export interface CommitResult {
  /** Transaction id */
  readonly transactionId: number;

  /** Addresses written by the transaction, in first-write order */
  readonly written: readonly Address[];
}

/**
 * An open unit of work against the store.
 *
 * Reads see the transaction's own pending writes. Nothing becomes visible
 * to other readers until commit().
 */
export interface RecordTransaction {
  /** Monotonically increasing transaction id */
  readonly id: number;

  /** False once committed or rolled back */
  readonly isOpen: boolean;

  /** Read a record, or undefined if none exists at the address. */
  get(address: Address): StoredRecord | undefined;

  /**
   * Read a record that must exist.
   * @throws RecordStoreError RECORD_NOT_FOUND
   */
  require(address: Address): StoredRecord;

  /**
   * Create a record at an empty address.
   * @throws RecordStoreError RECORD_EXISTS
   */
  create(address: Address, owner: string, data: RecordData): StoredRecord;

  /**
   * Rewrite an existing record on behalf of `owner`.
   * @throws RecordStoreError RECORD_NOT_FOUND, OWNER_MISMATCH
   */
  update(address: Address, owner: string, data: RecordData): StoredRecord;

  /**
   * Apply all pending writes atomically.
   * @throws RecordStoreError CONCURRENCY_CONFLICT, TRANSACTION_CLOSED
   */
  commit(): CommitResult;

  /** Discard all pending writes. No-op on a closed transaction. */
  rollback(): void;
}

// =============================================================================
// Record Store Interface
// =============================================================================

export interface RecordStore {
  /** Open a new transaction. */
  begin(): RecordTransaction;

  /**
   * Run `work` inside a transaction: commit if it returns, roll back and
   * rethrow if it throws.
   */
  transact<T>(work: (tx: RecordTransaction) => T): T;

  /** Read the committed state of a record. */
  get(address: Address): StoredRecord | undefined;

  /** Number of committed records. */
  readonly size: number;
}

// =============================================================================
// Errors
// =============================================================================

export type RecordStoreErrorCode =
  | "RECORD_NOT_FOUND"
  | "RECORD_EXISTS"
  | "CONCURRENCY_CONFLICT"
  | "OWNER_MISMATCH"
  | "TRANSACTION_CLOSED"
  | "SEED_MISMATCH"
  | "RECORD_DECODE_FAILED";

/**
 * Error thrown by RecordStore operations.
 */
export class RecordStoreError extends Error {
  constructor(
    public readonly code: RecordStoreErrorCode,
    message: string,
    public readonly address?: Address,
  ) {
    super(message);
    this.name = "RecordStoreError";
  }
}
