/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Logger } from "pino";
import type { IdentityKey } from "@cosign/types";
import type { MultisigService } from "../services/multisig-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Request-scoped logger carrying the request id (set by logger middleware) */
    log: Logger;

    /** The wallet service (set once at app creation) */
    service: MultisigService;

    /** Verified caller identity (set by identity middleware on mutating requests) */
    identity: IdentityKey;
  };
}
