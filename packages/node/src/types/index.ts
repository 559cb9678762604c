/**
 * Type barrel — re-exports all public types from @cosign/node.
 */

// DTOs
export {
  IdentityKeySchema,
  RecordRefSchema,
  PaginationQuerySchema,
  IndexParamSchema,
  initializeWalletSchema,
  createProposalSchema,
  ExecuteProposalSchema,
  ListProposalsQuerySchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  RequestLimits,
  InitializeWalletDto,
  CreateProposalDto,
  ExecuteProposalDto,
  ListProposalsQuery,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
