/**
 * Tests for request ID middleware.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "../setup.js";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("request id middleware", () => {
  it("generates an id when none is sent", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/health"));
    expect(res.headers.get("X-Request-Id")).toMatch(UUID);
  });

  it("propagates a well-formed incoming id", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/health", "GET", undefined, { "X-Request-Id": "trace-42" }));
    expect(res.headers.get("X-Request-Id")).toBe("trace-42");
  });

  it("replaces an id with unexpected characters", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "bad id\u0007" }),
    );
    expect(res.headers.get("X-Request-Id")).toMatch(UUID);
  });
});
