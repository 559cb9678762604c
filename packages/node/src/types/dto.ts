/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Schemas whose
 * bounds come from configuration are built by a factory.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const IdentityKeySchema = z
  .string()
  .regex(/^[0-9a-f]{64}$/, "expected 32 bytes of lowercase hex");

export const RecordRefSchema = z.object({
  address: IdentityKeySchema,
  isSigner: z.boolean(),
  isWritable: z.boolean(),
});

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const IndexParamSchema = z.coerce.number().int().min(1).max(Number.MAX_SAFE_INTEGER);

export interface RequestLimits {
  readonly maxSigners: number;
  readonly maxPayloadBytes: number;
}

const MAX_ACTION_RECORDS = 32;

// =============================================================================
// Wallet DTOs
// =============================================================================

export function initializeWalletSchema(limits: RequestLimits) {
  return z.object({
    signers: z.array(IdentityKeySchema).min(1).max(limits.maxSigners),
    threshold: z.number().int(),
  });
}

export type InitializeWalletDto = z.infer<ReturnType<typeof initializeWalletSchema>>;

// =============================================================================
// Proposal DTOs
// =============================================================================

export function createProposalSchema(limits: RequestLimits) {
  return z.object({
    handler: z.string().min(1).max(64),
    payload: z
      .string()
      .regex(/^(?:[0-9a-f]{2})*$/, "expected lowercase hex bytes")
      .refine((hex) => hex.length / 2 <= limits.maxPayloadBytes, {
        message: `payload exceeds ${limits.maxPayloadBytes} bytes`,
      }),
    records: z.array(RecordRefSchema).max(MAX_ACTION_RECORDS),
  });
}

export type CreateProposalDto = z.infer<ReturnType<typeof createProposalSchema>>;

export const ExecuteProposalSchema = z.object({
  records: z.array(RecordRefSchema).max(MAX_ACTION_RECORDS * 2),
});

export type ExecuteProposalDto = z.infer<typeof ExecuteProposalSchema>;

export const ListProposalsQuerySchema = PaginationQuerySchema;

export type ListProposalsQuery = z.infer<typeof ListProposalsQuerySchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
