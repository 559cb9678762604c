/**
 * Tests for identity middleware.
 */

import { describe, it, expect } from "vitest";
import { ed25519 } from "@noble/curves/ed25519";
import { bytesToHex } from "@noble/hashes/utils";
import {
  ALICE,
  BOB,
  createTestApp,
  jsonRequest,
  nextTimestamp,
  signatureHeaders,
  signedRequest,
} from "../setup.js";
import type { ErrorBody } from "../setup.js";
import { SeenSignatures, signingMessage } from "../../src/middleware/identity.js";

const WALLET_BODY = { signers: [ALICE.identity], threshold: 1 };

function headersFor(identity: string, signature: Uint8Array, timestamp: number): Record<string, string> {
  return {
    "X-Identity": identity,
    "X-Signature": bytesToHex(signature),
    "X-Timestamp": String(timestamp),
  };
}

describe("identity middleware", () => {
  it("returns 401 when identity headers are missing", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/wallet", "POST", WALLET_BODY));

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "UNAUTHORIZED",
      message: "Missing X-Identity, X-Signature or X-Timestamp header",
    });
  });

  it("returns 401 without a timestamp", async () => {
    const { app } = createTestApp();
    const headers = signatureHeaders(ALICE, "POST", "/api/v1/wallet", WALLET_BODY);
    delete headers["X-Timestamp"];
    const res = await app.request(jsonRequest("/api/v1/wallet", "POST", WALLET_BODY, headers));

    expect(res.status).toBe(401);
  });

  it("returns 401 for a malformed identity", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/wallet", "POST", WALLET_BODY, {
        "X-Identity": ALICE.identity.toUpperCase(),
        "X-Signature": "00".repeat(64),
        "X-Timestamp": String(nextTimestamp()),
      }),
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Malformed identity, signature or timestamp");
  });

  it("returns 401 when another key signed the request", async () => {
    const { app, service } = createTestApp();
    const timestamp = nextTimestamp();
    const signature = ed25519.sign(
      signingMessage("POST", "/api/v1/wallet", WALLET_BODY, timestamp),
      BOB.secretKey,
    );
    const res = await app.request(
      jsonRequest(
        "/api/v1/wallet",
        "POST",
        WALLET_BODY,
        headersFor(ALICE.identity, signature, timestamp),
      ),
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Signature does not match request");
    expect(service.getWallet()).toBeUndefined();
  });

  it("returns 401 when the body differs from what was signed", async () => {
    const { app } = createTestApp();
    const timestamp = nextTimestamp();
    const signature = ed25519.sign(
      signingMessage("POST", "/api/v1/wallet", WALLET_BODY, timestamp),
      ALICE.secretKey,
    );
    const res = await app.request(
      jsonRequest(
        "/api/v1/wallet",
        "POST",
        { ...WALLET_BODY, signers: [BOB.identity] },
        headersFor(ALICE.identity, signature, timestamp),
      ),
    );

    expect(res.status).toBe(401);
  });

  it("returns 401 when the signature was made for another path", async () => {
    const { app } = createTestApp();
    const timestamp = nextTimestamp();
    const signature = ed25519.sign(
      signingMessage("POST", "/api/v1/proposals/1/approve", null, timestamp),
      ALICE.secretKey,
    );
    const res = await app.request(
      jsonRequest(
        "/api/v1/proposals/2/approve",
        "POST",
        undefined,
        headersFor(ALICE.identity, signature, timestamp),
      ),
    );

    expect(res.status).toBe(401);
  });

  it("returns 401 when the timestamp header differs from the signed one", async () => {
    const { app } = createTestApp();
    const timestamp = nextTimestamp();
    const signature = ed25519.sign(
      signingMessage("POST", "/api/v1/wallet", WALLET_BODY, timestamp),
      ALICE.secretKey,
    );
    const res = await app.request(
      jsonRequest(
        "/api/v1/wallet",
        "POST",
        WALLET_BODY,
        headersFor(ALICE.identity, signature, timestamp + 1),
      ),
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Signature does not match request");
  });

  it("accepts a signature regardless of key order in the body", async () => {
    const { app } = createTestApp();
    const timestamp = nextTimestamp();
    const signature = ed25519.sign(
      signingMessage("POST", "/api/v1/wallet", { threshold: 1, signers: [ALICE.identity] }, timestamp),
      ALICE.secretKey,
    );
    const res = await app.request(
      jsonRequest(
        "/api/v1/wallet",
        "POST",
        WALLET_BODY,
        headersFor(ALICE.identity, signature, timestamp),
      ),
    );

    expect(res.status).toBe(201);
  });

  it("passes the verified identity to the engine", async () => {
    const { app, service } = createTestApp();
    await app.request(signedRequest(BOB, "/api/v1/wallet", "POST", WALLET_BODY));

    const [event] = service.readAllEvents();
    expect(event?.event.metadata.actor).toBe(BOB.identity);
  });

  it("returns 400 for a body that is not JSON", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      new Request("http://localhost/api/v1/wallet", {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Identity": ALICE.identity,
          "X-Signature": "00".repeat(64),
          "X-Timestamp": String(nextTimestamp()),
        },
        body: "{oops",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });

  it("lets GET requests through without headers", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/proposals"));
    expect(res.status).toBe(200);
  });

  // ─── Replay ─────────────────────────────────────────────────────────

  describe("replay protection", () => {
    const NOW = 1_800_000_000_000;

    it("refuses a timestamp older than the window", async () => {
      const { app, service } = createTestApp({ now: () => NOW, signatureMaxAgeMs: 60_000 });
      const headers = signatureHeaders(ALICE, "POST", "/api/v1/wallet", WALLET_BODY, NOW - 60_001);
      const res = await app.request(jsonRequest("/api/v1/wallet", "POST", WALLET_BODY, headers));

      expect(res.status).toBe(401);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.message).toBe("Request timestamp is outside the accepted window");
      expect(service.getWallet()).toBeUndefined();
    });

    it("refuses a timestamp too far in the future", async () => {
      const { app } = createTestApp({ now: () => NOW, signatureMaxAgeMs: 60_000 });
      const headers = signatureHeaders(ALICE, "POST", "/api/v1/wallet", WALLET_BODY, NOW + 60_001);
      const res = await app.request(jsonRequest("/api/v1/wallet", "POST", WALLET_BODY, headers));

      expect(res.status).toBe(401);
    });

    it("accepts a timestamp at the edge of the window", async () => {
      const { app } = createTestApp({ now: () => NOW, signatureMaxAgeMs: 60_000 });
      const headers = signatureHeaders(ALICE, "POST", "/api/v1/wallet", WALLET_BODY, NOW - 60_000);
      const res = await app.request(jsonRequest("/api/v1/wallet", "POST", WALLET_BODY, headers));

      expect(res.status).toBe(201);
    });

    it("accepts a captured request only once", async () => {
      const { app, service } = createTestApp({ now: () => NOW });
      const wallet = { signers: [ALICE.identity, BOB.identity], threshold: 2 };
      await app.request(
        jsonRequest(
          "/api/v1/wallet",
          "POST",
          wallet,
          signatureHeaders(ALICE, "POST", "/api/v1/wallet", wallet, NOW - 1),
        ),
      );

      const action = {
        handler: "memo",
        payload: "6869",
        records: [{ address: service.engine.walletAddress, isSigner: true, isWritable: false }],
      };
      const headers = signatureHeaders(ALICE, "POST", "/api/v1/proposals", action, NOW);
      const first = await app.request(jsonRequest("/api/v1/proposals", "POST", action, headers));
      const replayed = await app.request(jsonRequest("/api/v1/proposals", "POST", action, headers));

      expect(first.status).toBe(201);
      expect(replayed.status).toBe(401);
      const body = (await replayed.json()) as ErrorBody;
      expect(body.error.message).toBe("Request has already been used");
      expect(service.listProposals()).toHaveLength(1);
    });
  });
});

describe("SeenSignatures", () => {
  it("forgets signatures once they expire", () => {
    const seen = new SeenSignatures();

    expect(seen.claim("sig-a", 100, 0)).toBe(true);
    expect(seen.claim("sig-a", 100, 50)).toBe(false);
    expect(seen.claim("sig-b", 300, 150)).toBe(true);
    expect(seen.size).toBe(1);
    expect(seen.claim("sig-a", 400, 150)).toBe(true);
  });
});
