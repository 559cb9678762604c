/**
 * MultisigService — Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One service holds one wallet: its record store,
 * its notification log, and the handlers its proposals may invoke.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { ActionDescriptor, IdentityKey, RecordRef } from "@cosign/types";
import { InMemoryRecordStore } from "@cosign/record-store";
import { InMemoryEventStore, walletStreamId } from "@cosign/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@cosign/event-store";
import {
  EventStoreNotifier,
  ExecutionDelegate,
  MEMO_HANDLER_ID,
  MultisigEngine,
  createMemoHandler,
} from "@cosign/multisig";
import type { ActionHandler, Proposal, Wallet } from "@cosign/multisig";

// =============================================================================
// Configuration
// =============================================================================

export interface MultisigServiceConfig {
  readonly engineId: string;
  readonly logger?: Logger;
  /** Largest note the memo handler accepts. Default: MAX_MEMO_BYTES */
  readonly maxMemoBytes?: number;
  /** Handlers registered alongside the built-in memo handler */
  readonly handlers?: ReadonlyMap<string, ActionHandler>;
}

// =============================================================================
// Service
// =============================================================================

export class MultisigService {
  readonly engine: MultisigEngine;
  readonly records: InMemoryRecordStore;
  readonly eventStore: InMemoryEventStore;
  readonly delegate: ExecutionDelegate;

  constructor(config: MultisigServiceConfig) {
    const logger = config.logger ?? pino({ level: "silent" });

    this.records = new InMemoryRecordStore();
    this.eventStore = new InMemoryEventStore();
    this.delegate = new ExecutionDelegate();
    this.delegate.register(MEMO_HANDLER_ID, createMemoHandler(config.maxMemoBytes));
    for (const [id, handler] of config.handlers ?? []) {
      this.delegate.register(id, handler);
    }

    this.engine = new MultisigEngine({
      engineId: config.engineId,
      store: this.records,
      delegate: this.delegate,
      notifier: new EventStoreNotifier(this.eventStore),
      logger: logger.child({ component: "multisig" }),
    });
  }

  // ─── Wallet ────────────────────────────────────────────────────────

  initializeWallet(payer: IdentityKey, signers: readonly IdentityKey[], threshold: number): Wallet {
    return this.engine.initializeWallet(payer, signers, threshold);
  }

  getWallet(): Wallet | undefined {
    return this.engine.getWallet();
  }

  // ─── Proposals ─────────────────────────────────────────────────────

  createProposal(proposer: IdentityKey, action: ActionDescriptor): Proposal {
    return this.engine.createProposal(proposer, action);
  }

  approveProposal(approver: IdentityKey, index: number): Proposal {
    return this.engine.approveProposal(approver, index);
  }

  executeProposal(executor: IdentityKey, index: number, records: readonly RecordRef[]): Proposal {
    return this.engine.executeProposal(executor, index, records);
  }

  getProposal(index: number): Proposal | undefined {
    return this.engine.getProposal(index);
  }

  listProposals(): readonly Proposal[] {
    return this.engine.listProposals();
  }

  handlerIds(): readonly string[] {
    return this.delegate.handlerIds();
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readWalletEvents(options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(walletStreamId(this.engine.walletAddress), options);
  }

  verifyEventLog(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}
