/**
 * Tests for wallet routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  ALICE,
  BOB,
  CAROL,
  MALLORY,
  createTestApp,
  jsonRequest,
  signedRequest,
} from "./setup.js";
import type { ErrorBody } from "./setup.js";
import type { AppInstance } from "../src/app.js";

interface WalletBody {
  data: { address: string; signers: string[]; threshold: number; proposalCount: number };
}

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

// =============================================================================
// POST /api/v1/wallet
// =============================================================================

describe("POST /api/v1/wallet", () => {
  it("initializes the wallet and returns 201", async () => {
    const { app, service } = instance;
    const res = await app.request(
      signedRequest(MALLORY, "/api/v1/wallet", "POST", {
        signers: [ALICE.identity, BOB.identity, CAROL.identity],
        threshold: 2,
      }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as WalletBody;
    expect(body.data.address).toBe(service.engine.walletAddress);
    expect(body.data.signers).toEqual([ALICE.identity, BOB.identity, CAROL.identity]);
    expect(body.data.threshold).toBe(2);
    expect(body.data.proposalCount).toBe(0);
  });

  it("returns 400 THRESHOLD_INVALID for a threshold above the signer count", async () => {
    const res = await instance.app.request(
      signedRequest(ALICE, "/api/v1/wallet", "POST", {
        signers: [ALICE.identity],
        threshold: 2,
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("THRESHOLD_INVALID");
  });

  it("returns 400 DUPLICATE_SIGNER", async () => {
    const res = await instance.app.request(
      signedRequest(ALICE, "/api/v1/wallet", "POST", {
        signers: [ALICE.identity, ALICE.identity],
        threshold: 1,
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("DUPLICATE_SIGNER");
  });

  it("returns 409 RECORD_EXISTS on a second initialization", async () => {
    const { app } = instance;
    const request = { signers: [ALICE.identity], threshold: 1 };
    await app.request(signedRequest(ALICE, "/api/v1/wallet", "POST", request));
    const res = await app.request(signedRequest(BOB, "/api/v1/wallet", "POST", request));

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("RECORD_EXISTS");
  });

  it("returns 400 VALIDATION_ERROR for malformed signer keys", async () => {
    const res = await instance.app.request(
      signedRequest(ALICE, "/api/v1/wallet", "POST", { signers: ["not-a-key"], threshold: 1 }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details).toEqual({
      issues: [{ path: "signers.0", message: "expected 32 bytes of lowercase hex" }],
    });
  });

  it("enforces the configured signer limit", async () => {
    const { app } = createTestApp({ limits: { maxSigners: 2 } });
    const res = await app.request(
      signedRequest(ALICE, "/api/v1/wallet", "POST", {
        signers: [ALICE.identity, BOB.identity, CAROL.identity],
        threshold: 1,
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

// =============================================================================
// GET /api/v1/wallet
// =============================================================================

describe("GET /api/v1/wallet", () => {
  it("returns 404 before initialization", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/wallet"));

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("NOT_FOUND");
  });

  it("returns the wallet without identity headers", async () => {
    const { app } = instance;
    await app.request(
      signedRequest(ALICE, "/api/v1/wallet", "POST", {
        signers: [ALICE.identity, BOB.identity],
        threshold: 2,
      }),
    );

    const res = await app.request(jsonRequest("/api/v1/wallet"));
    expect(res.status).toBe(200);
    const body = (await res.json()) as WalletBody;
    expect(body.data.signers).toEqual([ALICE.identity, BOB.identity]);
  });
});
