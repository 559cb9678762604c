/**
 * @cosign/record-store — In-memory RecordStore implementation.
 *
 * Holds committed records in a Map. Suitable for tests, development and
 * single-process deployments; all state is lost on process exit.
 *
 * Properties:
 * - Each transaction tracks the version of every record it read
 * - Writes are buffered per transaction and applied in one step at commit
 * - Commit fails with CONCURRENCY_CONFLICT if any tracked version moved,
 *   and then applies nothing
 */

import type { Address } from "@cosign/types";
import type {
  CommitResult,
  RecordData,
  RecordStore,
  RecordTransaction,
  StoredRecord,
} from "./types.js";
import { RecordStoreError } from "./types.js";

function copyRecord(record: StoredRecord): StoredRecord {
  return { ...record, data: structuredClone(record.data) };
}

/**
 * In-memory record store with optimistic transactions.
 */
export class InMemoryRecordStore implements RecordStore {
  /** Committed records by address */
  private readonly _records = new Map<Address, StoredRecord>();

  /** Next transaction id to assign */
  private _nextTransactionId = 1;

  // ─── Transactions ───────────────────────────────────────────────────

  begin(): RecordTransaction {
    return new InMemoryTransaction(this._nextTransactionId++, this._records);
  }

  transact<T>(work: (tx: RecordTransaction) => T): T {
    const tx = this.begin();
    try {
      const result = work(tx);
      tx.commit();
      return result;
    } catch (err) {
      tx.rollback();
      throw err;
    }
  }

  // ─── Query ──────────────────────────────────────────────────────────

  get(address: Address): StoredRecord | undefined {
    const record = this._records.get(address);
    return record !== undefined ? copyRecord(record) : undefined;
  }

  get size(): number {
    return this._records.size;
  }
}

// =============================================================================
// Transaction
// =============================================================================

class InMemoryTransaction implements RecordTransaction {
  /** Version observed at first read (0 = absent) */
  private readonly _readVersions = new Map<Address, number>();

  /** Pending writes, in first-write order */
  private readonly _writes = new Map<Address, StoredRecord>();

  private _open = true;

  constructor(
    readonly id: number,
    private readonly _records: Map<Address, StoredRecord>,
  ) {}

  get isOpen(): boolean {
    return this._open;
  }

  get(address: Address): StoredRecord | undefined {
    this._assertOpen();

    const pending = this._writes.get(address);
    if (pending !== undefined) {
      return copyRecord(pending);
    }

    const committed = this._records.get(address);
    if (!this._readVersions.has(address)) {
      this._readVersions.set(address, committed?.version ?? 0);
    }
    return committed !== undefined ? copyRecord(committed) : undefined;
  }

  require(address: Address): StoredRecord {
    const record = this.get(address);
    if (record === undefined) {
      throw new RecordStoreError(
        "RECORD_NOT_FOUND",
        `No record at ${address}`,
        address,
      );
    }
    return record;
  }

  create(address: Address, owner: string, data: RecordData): StoredRecord {
    if (this.get(address) !== undefined) {
      throw new RecordStoreError(
        "RECORD_EXISTS",
        `A record already exists at ${address}`,
        address,
      );
    }
    return this._stage(address, owner, data);
  }

  update(address: Address, owner: string, data: RecordData): StoredRecord {
    const current = this.require(address);
    if (current.owner !== owner) {
      throw new RecordStoreError(
        "OWNER_MISMATCH",
        `Record ${address} is owned by "${current.owner}", not "${owner}"`,
        address,
      );
    }
    return this._stage(address, owner, data);
  }

  commit(): CommitResult {
    this._assertOpen();
    this._open = false;

    for (const [address, version] of this._readVersions) {
      const current = this._records.get(address)?.version ?? 0;
      if (current !== version) {
        throw new RecordStoreError(
          "CONCURRENCY_CONFLICT",
          `Record ${address} is at version ${current}, transaction ${this.id} read version ${version}`,
          address,
        );
      }
    }

    for (const [address, record] of this._writes) {
      this._records.set(address, record);
    }

    return { transactionId: this.id, written: [...this._writes.keys()] };
  }

  rollback(): void {
    this._open = false;
    this._writes.clear();
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _stage(address: Address, owner: string, data: RecordData): StoredRecord {
    const baseVersion = this._readVersions.get(address) ?? 0;
    const record: StoredRecord = {
      address,
      owner,
      data: structuredClone(data),
      version: baseVersion + 1,
    };
    this._writes.set(address, record);
    return copyRecord(record);
  }

  private _assertOpen(): void {
    if (!this._open) {
      throw new RecordStoreError(
        "TRANSACTION_CLOSED",
        `Transaction ${this.id} is no longer open`,
      );
    }
  }
}
