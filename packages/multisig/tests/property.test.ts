/**
 * Property-Based Tests for @cosign/multisig
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence of
 * approvals:
 *
 * 1. Approvals are a duplicate-free subset of the signers, in arrival order
 * 2. Execution succeeds exactly when approvals reach the threshold
 * 3. Execution happens at most once
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { InMemoryRecordStore } from "@cosign/record-store";
import { MultisigEngine } from "../src/engine.js";
import { ExecutionDelegate } from "../src/delegate.js";
import { errorCode } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

function key(n: number): string {
  return n.toString(16).padStart(2, "0").repeat(32);
}

/** Signer count, threshold, and a sequence of approval attempts. */
const arbScenario = fc
  .integer({ min: 1, max: 5 })
  .chain((signerCount) =>
    fc.record({
      signerCount: fc.constant(signerCount),
      threshold: fc.integer({ min: 1, max: signerCount }),
      // indexes >= signerCount are outsiders
      attempts: fc.array(fc.integer({ min: 0, max: signerCount + 1 }), { maxLength: 10 }),
    }),
  );

function createEngine(): { engine: MultisigEngine; runs: () => number } {
  let count = 0;
  const delegate = new ExecutionDelegate();
  delegate.register("count", () => {
    count++;
  });
  const engine = new MultisigEngine({
    engineId: "property-multisig",
    store: new InMemoryRecordStore(),
    delegate,
  });
  return { engine, runs: () => count };
}

// =============================================================================
// Properties
// =============================================================================

describe("multisig properties", () => {
  it("approvals stay distinct signers and gate execution", () => {
    fc.assert(
      fc.property(arbScenario, ({ signerCount, threshold, attempts }) => {
        const signers = Array.from({ length: signerCount }, (_, i) => key(i + 1));
        const { engine, runs } = createEngine();
        engine.initializeWallet(key(1), signers, threshold);
        engine.createProposal(key(1), { handler: "count", payload: "", records: [] });

        const expected = [key(1)];
        for (const attempt of attempts) {
          const approver = key(attempt + 1);
          const code = errorCode(() => engine.approveProposal(approver, 1));
          if (attempt >= signerCount) {
            expect(code).toBe("INVALID_SIGNER");
          } else if (expected.includes(approver)) {
            expect(code).toBe("ALREADY_APPROVED");
          } else {
            expect(code).toBeUndefined();
            expected.push(approver);
          }
        }

        const approvals = engine.getProposal(1)?.approvals ?? [];
        expect(approvals).toEqual(expected);
        expect(new Set(approvals).size).toBe(approvals.length);
        expect(approvals.every((a) => signers.includes(a))).toBe(true);

        const executeCode = errorCode(() => engine.executeProposal(key(99), 1, []));
        if (approvals.length >= threshold) {
          expect(executeCode).toBeUndefined();
          expect(errorCode(() => engine.executeProposal(key(99), 1, []))).toBe("ALREADY_EXECUTED");
          expect(runs()).toBe(1);
        } else {
          expect(executeCode).toBe("NOT_ENOUGH_APPROVALS");
          expect(runs()).toBe(0);
        }
      }),
      { numRuns: 50 },
    );
  });

  it("proposal indexes are consecutive from 1", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 8 }), (count) => {
        const { engine } = createEngine();
        engine.initializeWallet(key(1), [key(1)], 1);
        for (let i = 0; i < count; i++) {
          engine.createProposal(key(1), { handler: "count", payload: "", records: [] });
        }

        const proposals = engine.listProposals();
        expect(proposals.map((p) => p.index)).toEqual(Array.from({ length: count }, (_, i) => i + 1));
        expect(new Set(proposals.map((p) => p.address)).size).toBe(count);
        expect(engine.getWallet()?.proposalCount).toBe(count);
      }),
      { numRuns: 20 },
    );
  });
});
