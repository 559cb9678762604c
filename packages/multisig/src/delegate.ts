/**
 * Execution Delegate — runs an approved action against its handler.
 *
 * The engine hands over the stored action, the records the executor
 * supplied, an authority token for the wallet address, and the open
 * transaction. The delegate:
 *
 * 1. Resolves the handler by id
 * 2. Checks every record the action names was supplied, with at least
 *    the privileges the action asks for
 * 3. Checks every signing record is backed by the token or the executor
 * 4. Runs the handler with a write capability scoped to writable records
 *
 * Derived addresses are off the Ed25519 curve. A handler may only create a
 * record at one if the authority token covers that address, so actions
 * cannot claim addresses the engine derives for its own records.
 *
 * Handler writes go into the caller's transaction, so a failure anywhere
 * in the execution discards them along with the `executed` flag.
 */

import { hexToBytes } from "@noble/hashes/utils";
import type { ActionDescriptor, Address, IdentityKey, RecordRef } from "@cosign/types";
import { isAuthorityFor, isOnCurve, RecordStoreError } from "@cosign/record-store";
import type {
  AuthorityToken,
  RecordData,
  RecordTransaction,
  StoredRecord,
} from "@cosign/record-store";

// =============================================================================
// Error
// =============================================================================

export type DelegateErrorCode =
  | "UNKNOWN_HANDLER"
  | "HANDLER_EXISTS"
  | "MISSING_RECORD"
  | "MISSING_SIGNATURE"
  | "READONLY_RECORD"
  | "HANDLER_REJECTED";

export class DelegateError extends Error {
  public readonly code: DelegateErrorCode;
  constructor(code: DelegateErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DelegateError";
    this.code = code;
  }
}

// =============================================================================
// Handler contract
// =============================================================================

/**
 * A record named by the action, with its current contents.
 */
export interface ResolvedRecord extends RecordRef {
  /** Current contents, undefined if nothing exists at the address yet */
  readonly record: StoredRecord | undefined;
}

export interface ActionContext {
  /** Id the handler was registered under */
  readonly handler: string;

  /** Decoded action payload */
  readonly payload: Uint8Array;

  /** Records in the order the action lists them */
  readonly records: readonly ResolvedRecord[];

  /** Signing authority of the wallet, live for this invocation only */
  readonly authority: AuthorityToken;

  /** Identity that triggered execution */
  readonly executor: IdentityKey;

  /**
   * Create or rewrite a record the action marked writable. The record is
   * owned by the handler id.
   * @throws DelegateError READONLY_RECORD, or MISSING_SIGNATURE when
   *   creating a record at a derived address the token does not cover
   */
  write(address: Address, data: RecordData): StoredRecord;
}

/**
 * Handlers throw to reject an action.
 */
export type ActionHandler = (context: ActionContext) => void;

export interface InvokeRequest {
  readonly action: ActionDescriptor;
  readonly supplied: readonly RecordRef[];
  readonly authority: AuthorityToken;
  readonly executor: IdentityKey;
  readonly tx: RecordTransaction;
}

// =============================================================================
// Delegate
// =============================================================================

export class ExecutionDelegate {
  private readonly handlers: Map<string, ActionHandler> = new Map();

  register(id: string, handler: ActionHandler): void {
    if (this.handlers.has(id)) {
      throw new DelegateError("HANDLER_EXISTS", `Handler "${id}" is already registered`);
    }
    this.handlers.set(id, handler);
  }

  has(id: string): boolean {
    return this.handlers.has(id);
  }

  /** Registered handler ids, in registration order. */
  handlerIds(): readonly string[] {
    return [...this.handlers.keys()];
  }

  invoke(request: InvokeRequest): void {
    const { action, authority, executor, tx } = request;

    const handler = this.handlers.get(action.handler);
    if (handler === undefined) {
      throw new DelegateError(
        "UNKNOWN_HANDLER",
        `No handler registered for "${action.handler}"`,
      );
    }

    const supplied = new Map(request.supplied.map((ref) => [ref.address, ref]));
    for (const ref of action.records) {
      const given = supplied.get(ref.address);
      if (given === undefined) {
        throw new DelegateError("MISSING_RECORD", `Record ${ref.address} was not supplied`);
      }
      if (ref.isWritable && !given.isWritable) {
        throw new DelegateError(
          "READONLY_RECORD",
          `Record ${ref.address} must be supplied as writable`,
        );
      }
      if (ref.isSigner && !isAuthorityFor(authority, ref.address) && ref.address !== executor) {
        throw new DelegateError("MISSING_SIGNATURE", `Record ${ref.address} has no signer`);
      }
    }

    const writable = new Set(
      action.records.filter((ref) => ref.isWritable).map((ref) => ref.address),
    );

    const context: ActionContext = {
      handler: action.handler,
      payload: hexToBytes(action.payload),
      records: action.records.map((ref) => ({ ...ref, record: tx.get(ref.address) })),
      authority,
      executor,
      write: (address, data) => {
        if (!writable.has(address)) {
          throw new DelegateError("READONLY_RECORD", `Record ${address} is not writable`);
        }
        if (tx.get(address) !== undefined) {
          return tx.update(address, action.handler, data);
        }
        if (!isOnCurve(hexToBytes(address)) && !isAuthorityFor(authority, address)) {
          throw new DelegateError(
            "MISSING_SIGNATURE",
            `Record ${address} is a derived address; creating it needs its authority`,
          );
        }
        return tx.create(address, action.handler, data);
      },
    };

    try {
      handler(context);
    } catch (err) {
      if (err instanceof DelegateError || err instanceof RecordStoreError) {
        throw err;
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new DelegateError(
        "HANDLER_REJECTED",
        `Handler "${action.handler}" rejected the action: ${reason}`,
        { cause: err },
      );
    }
  }
}
