/**
 * Multisig Engine — wallet and proposal lifecycle.
 *
 * Manages the Initialize → Propose → Approve → Execute flow for one
 * wallet. Every operation runs inside a single record-store transaction
 * and either commits all of its writes or none of them.
 *
 * Rules:
 * - Signers and threshold are fixed at initialization
 * - Proposal indexes are 1, 2, 3, … with no gaps; the wallet's counter
 *   and the new proposal commit together
 * - Approvals are append-only, distinct, and come from signers only
 * - A proposal executes at most once; a failed execution leaves it
 *   pending and retryable
 * - Notifications go out after commit, never before
 */

import pino from "pino";
import type { Logger } from "pino";
import { isIdentityKey } from "@cosign/types";
import type { ActionDescriptor, Address, IdentityKey, RecordRef } from "@cosign/types";
import {
  createDerivedAddress,
  findDerivedAddress,
  RecordStoreError,
  withAuthority,
} from "@cosign/record-store";
import type { RecordStore, RecordTransaction } from "@cosign/record-store";
import { MULTISIG_EVENTS } from "@cosign/event-store";
import { proposalSeeds, walletSeeds } from "./addresses.js";
import type { ExecutionDelegate } from "./delegate.js";
import {
  ActionDescriptorSchema,
  decodeProposal,
  decodeWallet,
  encodeProposal,
  encodeWallet,
} from "./records.js";
import type { MultisigEvent, Notifier, Proposal, ProposalStatus, Wallet } from "./types.js";

// =============================================================================
// Error
// =============================================================================

export class MultisigError extends Error {
  public readonly code: MultisigErrorCode;
  constructor(code: MultisigErrorCode, message: string) {
    super(message);
    this.name = "MultisigError";
    this.code = code;
  }
}

export type MultisigErrorCode =
  | "THRESHOLD_INVALID"
  | "DUPLICATE_SIGNER"
  | "MALFORMED_SIGNER"
  | "INVALID_SIGNER"
  | "INVALID_ACTION"
  | "ALREADY_EXECUTED"
  | "ALREADY_APPROVED"
  | "NOT_ENOUGH_APPROVALS";

// =============================================================================
// Engine
// =============================================================================

export interface MultisigEngineOptions {
  /** Owner id for every record the engine writes; part of every derivation */
  readonly engineId: string;
  readonly store: RecordStore;
  readonly delegate: ExecutionDelegate;
  readonly notifier?: Notifier;
  readonly logger?: Logger;
}

export function proposalStatus(proposal: Proposal): ProposalStatus {
  return proposal.executed ? "executed" : "pending";
}

export class MultisigEngine {
  readonly engineId: string;
  readonly walletAddress: Address;
  private readonly walletBump: number;
  private readonly store: RecordStore;
  private readonly delegate: ExecutionDelegate;
  private readonly notifier: Notifier | undefined;
  private readonly logger: Logger;

  constructor(options: MultisigEngineOptions) {
    this.engineId = options.engineId;
    this.store = options.store;
    this.delegate = options.delegate;
    this.notifier = options.notifier;
    this.logger = options.logger ?? pino({ level: "silent" });

    const derived = findDerivedAddress(walletSeeds(), this.engineId);
    this.walletAddress = derived.address;
    this.walletBump = derived.bump;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create the wallet. Fails with RECORD_EXISTS if it already exists.
   */
  initializeWallet(
    payer: IdentityKey,
    signers: readonly IdentityKey[],
    threshold: number,
  ): Wallet {
    if (!Number.isSafeInteger(threshold) || threshold < 1 || threshold > signers.length) {
      throw new MultisigError(
        "THRESHOLD_INVALID",
        `Threshold ${threshold} must be between 1 and the number of signers (${signers.length})`,
      );
    }

    const seen = new Set<IdentityKey>();
    for (const signer of signers) {
      if (seen.has(signer)) {
        throw new MultisigError("DUPLICATE_SIGNER", `Signer ${signer} is listed more than once`);
      }
      seen.add(signer);
    }

    const malformed = signers.find((signer) => !isIdentityKey(signer));
    if (malformed !== undefined) {
      throw new MultisigError(
        "MALFORMED_SIGNER",
        `Signer ${JSON.stringify(malformed)} is not 32 bytes of lowercase hex`,
      );
    }

    const wallet: Wallet = {
      address: this.walletAddress,
      signers: [...signers],
      threshold,
      proposalCount: 0,
      bump: this.walletBump,
    };

    this.store.transact((tx) => {
      tx.create(wallet.address, this.engineId, encodeWallet(wallet));
    });

    this.logger.debug({ wallet: wallet.address, threshold }, "Wallet initialized");
    this.publish({
      type: MULTISIG_EVENTS.WALLET_INITIALIZED,
      wallet: wallet.address,
      actor: payer,
      payload: { wallet: wallet.address, signers: wallet.signers, threshold },
    });
    return wallet;
  }

  /**
   * Record a new proposal with the proposer's approval already counted.
   */
  createProposal(proposer: IdentityKey, action: ActionDescriptor): Proposal {
    const proposal = this.store.transact((tx) => {
      const wallet = this.loadWallet(tx);
      this.assertSigner(wallet, proposer);

      const parsed = ActionDescriptorSchema.safeParse(action);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const detail = issue !== undefined ? `${issue.path.join(".")}: ${issue.message}` : "invalid";
        throw new MultisigError("INVALID_ACTION", `Action is malformed (${detail})`);
      }

      const index = wallet.proposalCount + 1;
      const derived = findDerivedAddress(proposalSeeds(wallet.address, index), this.engineId);
      const created: Proposal = {
        address: derived.address,
        wallet: wallet.address,
        proposer,
        index,
        action: parsed.data,
        approvals: [proposer],
        executed: false,
        bump: derived.bump,
      };

      tx.create(created.address, this.engineId, encodeProposal(created));
      tx.update(wallet.address, this.engineId, encodeWallet({ ...wallet, proposalCount: index }));
      return created;
    });

    this.logger.debug(
      { wallet: proposal.wallet, index: proposal.index, handler: proposal.action.handler },
      "Proposal created",
    );
    this.publish({
      type: MULTISIG_EVENTS.PROPOSAL_CREATED,
      wallet: proposal.wallet,
      actor: proposer,
      payload: { proposal: proposal.address, proposer, index: proposal.index },
    });
    return proposal;
  }

  /**
   * Add a signer's approval to a pending proposal.
   */
  approveProposal(approver: IdentityKey, index: number): Proposal {
    const { proposal, threshold } = this.store.transact((tx) => {
      const wallet = this.loadWallet(tx);
      const current = this.loadProposal(tx, wallet, index);

      this.assertSigner(wallet, approver);
      if (current.executed) {
        throw new MultisigError("ALREADY_EXECUTED", `Proposal ${index} has already been executed`);
      }
      if (current.approvals.includes(approver)) {
        throw new MultisigError(
          "ALREADY_APPROVED",
          `Signer ${approver} has already approved proposal ${index}`,
        );
      }

      const approved: Proposal = { ...current, approvals: [...current.approvals, approver] };
      tx.update(approved.address, this.engineId, encodeProposal(approved));
      return { proposal: approved, threshold: wallet.threshold };
    });

    this.logger.debug(
      { wallet: proposal.wallet, index, approvals: proposal.approvals.length, threshold },
      "Proposal approved",
    );
    this.publish({
      type: MULTISIG_EVENTS.PROPOSAL_APPROVED,
      wallet: proposal.wallet,
      actor: approver,
      payload: {
        proposal: proposal.address,
        approver,
        approvalsNeeded: threshold,
        currentApprovals: proposal.approvals.length,
      },
    });
    return proposal;
  }

  /**
   * Run a proposal's action once quorum is reached. Anyone may execute.
   *
   * `records` are the records the executor makes available to the
   * action; every record the action names must be among them.
   */
  executeProposal(executor: IdentityKey, index: number, records: readonly RecordRef[]): Proposal {
    const proposal = this.store.transact((tx) => {
      const wallet = this.loadWallet(tx);
      const current = this.loadProposal(tx, wallet, index);

      if (current.executed) {
        throw new MultisigError("ALREADY_EXECUTED", `Proposal ${index} has already been executed`);
      }
      if (current.approvals.length < wallet.threshold) {
        throw new MultisigError(
          "NOT_ENOUGH_APPROVALS",
          `Proposal ${index} has ${current.approvals.length} of ${wallet.threshold} required approvals`,
        );
      }

      const executed: Proposal = { ...current, executed: true };
      tx.update(executed.address, this.engineId, encodeProposal(executed));

      withAuthority(walletSeeds(), wallet.bump, this.engineId, (authority) => {
        this.delegate.invoke({
          action: executed.action,
          supplied: records,
          authority,
          executor,
          tx,
        });
      });
      return executed;
    });

    this.logger.debug(
      { wallet: proposal.wallet, index, handler: proposal.action.handler },
      "Proposal executed",
    );
    this.publish({
      type: MULTISIG_EVENTS.PROPOSAL_EXECUTED,
      wallet: proposal.wallet,
      actor: executor,
      payload: { proposal: proposal.address, index, handler: proposal.action.handler },
    });
    return proposal;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getWallet(): Wallet | undefined {
    return this.read((tx) =>
      tx.get(this.walletAddress) === undefined ? undefined : this.loadWallet(tx),
    );
  }

  getProposal(index: number): Proposal | undefined {
    return this.read((tx) => {
      const wallet = tx.get(this.walletAddress) === undefined ? undefined : this.loadWallet(tx);
      if (wallet === undefined || !Number.isSafeInteger(index) || index < 1 || index > wallet.proposalCount) {
        return undefined;
      }
      return this.loadProposal(tx, wallet, index);
    });
  }

  /**
   * All proposals in index order. Addresses are re-derived from the
   * wallet's counter; there is no separate index.
   */
  listProposals(): readonly Proposal[] {
    return this.read((tx) => {
      if (tx.get(this.walletAddress) === undefined) {
        return [];
      }
      const wallet = this.loadWallet(tx);
      const proposals: Proposal[] = [];
      for (let index = 1; index <= wallet.proposalCount; index++) {
        proposals.push(this.loadProposal(tx, wallet, index));
      }
      return proposals;
    });
  }

  /**
   * Address proposal `index` lives (or will live) at.
   */
  proposalAddress(index: number): Address {
    return findDerivedAddress(proposalSeeds(this.walletAddress, index), this.engineId).address;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private read<T>(work: (tx: RecordTransaction) => T): T {
    const tx = this.store.begin();
    try {
      return work(tx);
    } finally {
      tx.rollback();
    }
  }

  private loadWallet(tx: RecordTransaction): Wallet {
    const record = tx.require(this.walletAddress);
    if (record.owner !== this.engineId) {
      throw new RecordStoreError(
        "OWNER_MISMATCH",
        `Wallet record ${record.address} is owned by "${record.owner}"`,
        record.address,
      );
    }
    return decodeWallet(record);
  }

  private loadProposal(tx: RecordTransaction, wallet: Wallet, index: number): Proposal {
    const address = findDerivedAddress(proposalSeeds(wallet.address, index), this.engineId).address;
    const record = tx.require(address);
    if (record.owner !== this.engineId) {
      throw new RecordStoreError(
        "OWNER_MISMATCH",
        `Proposal record ${address} is owned by "${record.owner}"`,
        address,
      );
    }

    const proposal = decodeProposal(record);
    if (
      proposal.wallet !== wallet.address ||
      proposal.index !== index ||
      this.rederive(proposal) !== address
    ) {
      throw new RecordStoreError(
        "SEED_MISMATCH",
        `Proposal record ${address} does not belong to wallet ${wallet.address} at index ${index}`,
        address,
      );
    }
    return proposal;
  }

  private rederive(proposal: Proposal): Address | undefined {
    try {
      return createDerivedAddress(proposalSeeds(proposal.wallet, proposal.index), proposal.bump, this.engineId);
    } catch (err) {
      this.logger.debug({ err, proposal: proposal.address }, "Stored bump does not derive an address");
      return undefined;
    }
  }

  private assertSigner(wallet: Wallet, identity: IdentityKey): void {
    if (!wallet.signers.includes(identity)) {
      throw new MultisigError("INVALID_SIGNER", `${identity} is not a signer of this wallet`);
    }
  }

  private publish(event: MultisigEvent): void {
    if (this.notifier === undefined) {
      return;
    }
    try {
      this.notifier.notify(event);
    } catch (err) {
      this.logger.warn({ err, type: event.type, wallet: event.wallet }, "Notifier failed");
    }
  }
}
