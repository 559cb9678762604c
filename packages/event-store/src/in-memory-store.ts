/**
 * @cosign/event-store — In-memory EventStore implementation.
 *
 * One global array in append order, plus a per-stream index into it.
 * Nothing survives a restart; the log is read back over HTTP while the
 * process runs.
 */

import type { DomainEvent } from "@cosign/types";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  private readonly _log: StoredEvent[] = [];
  private readonly _streams = new Map<string, StoredEvent[]>();

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const stream = this._streams.get(streamId) ?? [];
    const fromVersion = stream.length + 1;
    const appendedAt = new Date().toISOString();
    let previousHash = this._log[this._log.length - 1]?.hash ?? GENESIS_HASH;

    for (const event of events) {
      const base = {
        event,
        streamId,
        version: stream.length + 1,
        globalPosition: this._log.length + 1,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      const stored: StoredEvent = { ...base, hash, previousHash };
      stream.push(stored);
      this._log.push(stored);
      previousHash = hash;
    }
    this._streams.set(streamId, stream);

    return {
      streamId,
      fromVersion,
      toVersion: stream.length,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }
    const stream = this._streams.get(streamId) ?? [];
    return limit(stream.slice(fromVersion - 1), options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = Math.max(options?.fromPosition ?? 1, 1);
    return limit(this._log.slice(fromPosition - 1), options?.maxCount);
  }

  globalPosition(): number {
    return this._log.length;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
