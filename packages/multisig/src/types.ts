/**
 * Multisig Types
 *
 * Domain types for the wallet / proposal engine.
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - A wallet's signers and threshold never change after creation
 * - A proposal changes only by appending approvals and by flipping
 *   `executed` from false to true, once
 */

import type { ActionDescriptor, Address, IdentityKey } from "@cosign/types";
import type {
  MULTISIG_EVENTS,
  ProposalApprovedPayload,
  ProposalCreatedPayload,
  ProposalExecutedPayload,
  WalletInitializedPayload,
} from "@cosign/event-store";

// =============================================================================
// Records
// =============================================================================

/**
 * A wallet: a fixed set of signers and the quorum they need.
 */
export interface Wallet {
  /** Derived address of this wallet */
  readonly address: Address;

  /** Signers, in the order given at creation */
  readonly signers: readonly IdentityKey[];

  /** Approvals required to execute a proposal */
  readonly threshold: number;

  /** Number of proposals created so far (= index of the latest) */
  readonly proposalCount: number;

  /** Derivation tag that reproduces `address` */
  readonly bump: number;
}

/**
 * A proposal to run one action on the wallet's behalf.
 */
export interface Proposal {
  /** Derived address of this proposal */
  readonly address: Address;

  /** Owning wallet */
  readonly wallet: Address;

  /** Signer who created the proposal */
  readonly proposer: IdentityKey;

  /** 1-based position in the wallet's proposal sequence */
  readonly index: number;

  /** The action to run once quorum is reached */
  readonly action: ActionDescriptor;

  /** Distinct approving signers, in arrival order */
  readonly approvals: readonly IdentityKey[];

  /** Whether the action has run */
  readonly executed: boolean;

  /** Derivation tag that reproduces `address` */
  readonly bump: number;
}

/** Lifecycle states of a proposal. */
export type ProposalStatus = "pending" | "executed";

// =============================================================================
// Notifications
// =============================================================================

interface EventEnvelope<TType extends string, TPayload> {
  readonly type: TType;
  /** Wallet the event belongs to */
  readonly wallet: Address;
  /** Identity that caused the event */
  readonly actor: IdentityKey;
  readonly payload: TPayload;
}

export type MultisigEvent =
  | EventEnvelope<typeof MULTISIG_EVENTS.WALLET_INITIALIZED, WalletInitializedPayload>
  | EventEnvelope<typeof MULTISIG_EVENTS.PROPOSAL_CREATED, ProposalCreatedPayload>
  | EventEnvelope<typeof MULTISIG_EVENTS.PROPOSAL_APPROVED, ProposalApprovedPayload>
  | EventEnvelope<typeof MULTISIG_EVENTS.PROPOSAL_EXECUTED, ProposalExecutedPayload>;

/**
 * Sink for committed-state notifications. Fire-and-forget.
 */
export interface Notifier {
  notify(event: MultisigEvent): void;
}
