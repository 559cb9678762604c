/**
 * Record codecs.
 *
 * Wallets and proposals are stored as JSON-shaped record data tagged with
 * `kind`. Every read goes back through a zod schema, so a record of the
 * wrong kind or shape never reaches the engine's logic.
 */

import { z } from "zod";
import { RecordStoreError } from "@cosign/record-store";
import type { RecordData, StoredRecord } from "@cosign/record-store";
import type { Proposal, Wallet } from "./types.js";

// =============================================================================
// Schemas
// =============================================================================

const HexKeySchema = z.string().regex(/^[0-9a-f]{64}$/);

const RecordRefSchema = z.object({
  address: HexKeySchema,
  isSigner: z.boolean(),
  isWritable: z.boolean(),
});

export const ActionDescriptorSchema = z.object({
  handler: z.string().min(1),
  payload: z.string().regex(/^(?:[0-9a-f]{2})*$/),
  records: z.array(RecordRefSchema),
});

const BumpSchema = z.number().int().min(0).max(255);

export const WalletRecordSchema = z.object({
  kind: z.literal("wallet"),
  signers: z.array(HexKeySchema).min(1),
  threshold: z.number().int().min(1),
  proposalCount: z.number().int().min(0),
  bump: BumpSchema,
});

export const ProposalRecordSchema = z.object({
  kind: z.literal("proposal"),
  wallet: HexKeySchema,
  proposer: HexKeySchema,
  index: z.number().int().min(1),
  action: ActionDescriptorSchema,
  approvals: z.array(HexKeySchema),
  executed: z.boolean(),
  bump: BumpSchema,
});

// =============================================================================
// Encode
// =============================================================================

export function encodeWallet(wallet: Wallet): RecordData {
  return {
    kind: "wallet",
    signers: [...wallet.signers],
    threshold: wallet.threshold,
    proposalCount: wallet.proposalCount,
    bump: wallet.bump,
  };
}

export function encodeProposal(proposal: Proposal): RecordData {
  return {
    kind: "proposal",
    wallet: proposal.wallet,
    proposer: proposal.proposer,
    index: proposal.index,
    action: {
      handler: proposal.action.handler,
      payload: proposal.action.payload,
      records: proposal.action.records.map((r) => ({ ...r })),
    },
    approvals: [...proposal.approvals],
    executed: proposal.executed,
    bump: proposal.bump,
  };
}

// =============================================================================
// Decode
// =============================================================================

function decodeFailure(record: StoredRecord, kind: string, error: z.ZodError): RecordStoreError {
  const issue = error.issues[0];
  const detail = issue !== undefined ? `${issue.path.join(".")}: ${issue.message}` : "invalid";
  return new RecordStoreError(
    "RECORD_DECODE_FAILED",
    `Record ${record.address} is not a valid ${kind} (${detail})`,
    record.address,
  );
}

export function decodeWallet(record: StoredRecord): Wallet {
  const result = WalletRecordSchema.safeParse(record.data);
  if (!result.success) {
    throw decodeFailure(record, "wallet", result.error);
  }
  const data = result.data;
  return {
    address: record.address,
    signers: data.signers,
    threshold: data.threshold,
    proposalCount: data.proposalCount,
    bump: data.bump,
  };
}

export function decodeProposal(record: StoredRecord): Proposal {
  const result = ProposalRecordSchema.safeParse(record.data);
  if (!result.success) {
    throw decodeFailure(record, "proposal", result.error);
  }
  const data = result.data;
  return {
    address: record.address,
    wallet: data.wallet,
    proposer: data.proposer,
    index: data.index,
    action: data.action,
    approvals: data.approvals,
    executed: data.executed,
    bump: data.bump,
  };
}
