/**
 * Shared fixtures for multisig tests.
 */

import type { ActionDescriptor, Address } from "@cosign/types";
import { InMemoryRecordStore } from "@cosign/record-store";
import { MultisigEngine } from "../src/engine.js";
import { ExecutionDelegate } from "../src/delegate.js";
import { memoHandler, MEMO_HANDLER_ID } from "../src/handlers/memo.js";
import { RecordingNotifier } from "../src/notifier.js";
import type { Notifier } from "../src/types.js";

export const ENGINE_ID = "test-multisig";

export const ALICE = "a1".repeat(32);
export const BOB = "b2".repeat(32);
export const CAROL = "c3".repeat(32);
export const MALLORY = "d4".repeat(32);
export const TARGET = "ee".repeat(32);

export function hex(text: string): string {
  return Buffer.from(text, "utf8").toString("hex");
}

export function memoAction(wallet: Address, text: string, target: Address = TARGET): ActionDescriptor {
  return {
    handler: MEMO_HANDLER_ID,
    payload: hex(text),
    records: [
      { address: wallet, isSigner: true, isWritable: false },
      { address: target, isSigner: false, isWritable: true },
    ],
  };
}

export interface Fixture {
  readonly store: InMemoryRecordStore;
  readonly delegate: ExecutionDelegate;
  readonly notifier: RecordingNotifier;
  readonly engine: MultisigEngine;
}

export function createFixture(notifier?: Notifier): Fixture {
  const store = new InMemoryRecordStore();
  const delegate = new ExecutionDelegate();
  delegate.register(MEMO_HANDLER_ID, memoHandler);
  const recording = new RecordingNotifier();
  const engine = new MultisigEngine({
    engineId: ENGINE_ID,
    store,
    delegate,
    notifier: notifier ?? recording,
  });
  return { store, delegate, notifier: recording, engine };
}

/**
 * Run `work` and return the `code` of whatever it throws.
 */
export function errorCode(work: () => unknown): string | undefined {
  try {
    work();
  } catch (err) {
    if (err instanceof Error && "code" in err && typeof err.code === "string") {
      return err.code;
    }
    throw err;
  }
  return undefined;
}
