/**
 * Action Types
 *
 * A proposal carries an opaque action descriptor: which handler to run,
 * the bytes to hand it, and the records it needs. The engine never
 * interprets the payload; handlers do.
 */

import type { Address } from "./identity.js";

/**
 * A record referenced by an action.
 */
export interface RecordRef {
  /** Address of the referenced record */
  readonly address: Address;

  /** Whether the handler requires signing authority over this record */
  readonly isSigner: boolean;

  /** Whether the handler may write this record */
  readonly isWritable: boolean;
}

/**
 * A self-describing action to run once a proposal reaches quorum.
 */
export interface ActionDescriptor {
  /** Id of the target handler */
  readonly handler: string;

  /** Hex-encoded payload bytes (may be empty) */
  readonly payload: string;

  /** Records the handler needs, in the order it expects them */
  readonly records: readonly RecordRef[];
}
