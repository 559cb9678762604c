/**
 * @cosign/event-store — Multisig domain event definitions.
 *
 * Naming convention: `multisig.<entity>.<action>`
 *
 * One payload interface per notification the engine emits after a
 * committed operation.
 */

export const MULTISIG_EVENTS = {
  WALLET_INITIALIZED: "multisig.wallet.initialized",
  PROPOSAL_CREATED: "multisig.proposal.created",
  PROPOSAL_APPROVED: "multisig.proposal.approved",
  PROPOSAL_EXECUTED: "multisig.proposal.executed",
} as const;

export type MultisigEventType =
  (typeof MULTISIG_EVENTS)[keyof typeof MULTISIG_EVENTS];

export interface WalletInitializedPayload {
  readonly wallet: string;
  readonly signers: readonly string[];
  readonly threshold: number;
}

export interface ProposalCreatedPayload {
  readonly proposal: string;
  readonly proposer: string;
  readonly index: number;
}

export interface ProposalApprovedPayload {
  readonly proposal: string;
  readonly approver: string;
  readonly approvalsNeeded: number;
  readonly currentApprovals: number;
}

export interface ProposalExecutedPayload {
  readonly proposal: string;
  readonly index: number;
  /** Id of the handler the action ran against */
  readonly handler: string;
}

/**
 * Stream that holds every notification for one wallet.
 */
export function walletStreamId(wallet: string): string {
  return `wallet:${wallet}`;
}
