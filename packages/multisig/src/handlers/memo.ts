/**
 * Memo handler.
 *
 * Records a UTF-8 note on a target record, signed by the wallet.
 *
 * Records: [wallet authority (signer), target (writable)]
 * Payload: the note, UTF-8
 *
 * Target data after execution: { memo, author, count }, where count is
 * the number of memos written to the target so far.
 */

import { isAuthorityFor } from "@cosign/record-store";
import type { ActionHandler } from "../delegate.js";

export const MEMO_HANDLER_ID = "memo";

/** Default note size limit; matches the default action payload limit. */
export const MAX_MEMO_BYTES = 1024;

const decoder = new TextDecoder("utf-8", { fatal: true });

export function createMemoHandler(maxBytes: number = MAX_MEMO_BYTES): ActionHandler {
  return (context) => {
    const [signer, target] = context.records;

    if (signer === undefined || !signer.isSigner || !isAuthorityFor(context.authority, signer.address)) {
      throw new Error("first record must be the signing wallet authority");
    }
    if (target === undefined || !target.isWritable) {
      throw new Error("second record must be a writable target");
    }
    if (context.payload.length === 0) {
      throw new Error("memo is empty");
    }
    if (context.payload.length > maxBytes) {
      throw new Error(`memo exceeds ${maxBytes} bytes`);
    }

    const memo = decoder.decode(context.payload);
    const previous = target.record?.data["count"];

    context.write(target.address, {
      memo,
      author: signer.address,
      count: typeof previous === "number" ? previous + 1 : 1,
    });
  };
}

export const memoHandler: ActionHandler = createMemoHandler();
