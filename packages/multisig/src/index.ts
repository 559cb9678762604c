/**
 * @cosign/multisig — Threshold authorization engine.
 *
 * Provides:
 * - MultisigEngine: initialize, propose, approve, execute
 * - ExecutionDelegate with pluggable action handlers
 * - Built-in memo handler
 * - Record codecs and notifiers
 *
 * @packageDocumentation
 */

// Types
export type {
  Wallet,
  Proposal,
  ProposalStatus,
  MultisigEvent,
  Notifier,
} from "./types.js";

// Engine
export { MultisigEngine, MultisigError, proposalStatus } from "./engine.js";
export type { MultisigEngineOptions, MultisigErrorCode } from "./engine.js";

// Delegate
export { ExecutionDelegate, DelegateError } from "./delegate.js";
export type {
  ActionContext,
  ActionHandler,
  DelegateErrorCode,
  InvokeRequest,
  ResolvedRecord,
} from "./delegate.js";
export {
  createMemoHandler,
  memoHandler,
  MEMO_HANDLER_ID,
  MAX_MEMO_BYTES,
} from "./handlers/memo.js";

// Addresses & records
export { walletSeeds, proposalSeeds, WALLET_DOMAIN, PROPOSAL_DOMAIN } from "./addresses.js";
export {
  ActionDescriptorSchema,
  WalletRecordSchema,
  ProposalRecordSchema,
  encodeWallet,
  encodeProposal,
  decodeWallet,
  decodeProposal,
} from "./records.js";

// Notifiers
export { EventStoreNotifier, RecordingNotifier } from "./notifier.js";
