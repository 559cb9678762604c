/**
 * Tests for health check routes.
 */

import { describe, it, expect } from "vitest";
import { ALICE, createTestApp, jsonRequest, signedRequest } from "./setup.js";

interface ReadyBody {
  status: string;
  wallet: string;
  initialized: boolean;
  handlers: string[];
  eventLog: { valid: boolean; lastVerifiedPosition: number; errors: number };
}

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/health"));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });
});

describe("GET /ready", () => {
  it("reports an uninitialized wallet as ready", async () => {
    const { app, service } = createTestApp();
    const res = await app.request(jsonRequest("/ready"));

    expect(res.status).toBe(200);
    const body = (await res.json()) as ReadyBody;
    expect(body.status).toBe("ready");
    expect(body.wallet).toBe(service.engine.walletAddress);
    expect(body.initialized).toBe(false);
    expect(body.handlers).toEqual(["memo"]);
  });

  it("reports the event log position after initialization", async () => {
    const { app } = createTestApp();
    await app.request(
      signedRequest(ALICE, "/api/v1/wallet", "POST", { signers: [ALICE.identity], threshold: 1 }),
    );

    const res = await app.request(jsonRequest("/ready"));
    const body = (await res.json()) as ReadyBody;
    expect(body.initialized).toBe(true);
    expect(body.eventLog).toEqual({ valid: true, lastVerifiedPosition: 1, errors: 0 });
  });
});
