/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import pino from "pino";
import { RecordStoreError } from "@cosign/record-store";
import { DelegateError, MultisigError } from "@cosign/multisig";
import type { AppEnv } from "../../src/types/api-contract.js";
import { handleError } from "../../src/middleware/error-handler.js";
import { loggerMiddleware } from "../../src/middleware/logger.js";
import { requestIdMiddleware } from "../../src/middleware/request-id.js";
import type { ErrorBody } from "../setup.js";

function appThrowing(error: Error): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(pino({ level: "silent" })));
  app.onError(handleError);
  app.get("/fail", () => {
    throw error;
  });
  return app;
}

async function failWith(error: Error): Promise<{ status: number; body: ErrorBody }> {
  const res = await appThrowing(error).request("/fail");
  return { status: res.status, body: (await res.json()) as ErrorBody };
}

describe("error handler", () => {
  it("maps multisig errors", async () => {
    expect((await failWith(new MultisigError("INVALID_SIGNER", "no"))).status).toBe(403);
    expect((await failWith(new MultisigError("ALREADY_EXECUTED", "no"))).status).toBe(409);
    expect((await failWith(new MultisigError("NOT_ENOUGH_APPROVALS", "no"))).status).toBe(422);
    expect((await failWith(new MultisigError("THRESHOLD_INVALID", "no"))).status).toBe(400);
    expect((await failWith(new MultisigError("MALFORMED_SIGNER", "no"))).status).toBe(400);
    expect((await failWith(new MultisigError("INVALID_ACTION", "no"))).status).toBe(400);
  });

  it("maps record store errors", async () => {
    expect((await failWith(new RecordStoreError("RECORD_NOT_FOUND", "no"))).status).toBe(404);
    expect((await failWith(new RecordStoreError("CONCURRENCY_CONFLICT", "no"))).status).toBe(409);
  });

  it("maps delegate errors", async () => {
    expect((await failWith(new DelegateError("MISSING_SIGNATURE", "no"))).status).toBe(403);
    expect((await failWith(new DelegateError("HANDLER_REJECTED", "no"))).status).toBe(422);
  });

  it("returns the domain code and message in the envelope", async () => {
    const { body } = await failWith(new MultisigError("ALREADY_APPROVED", "Signer has already approved"));
    expect(body).toEqual({
      error: { code: "ALREADY_APPROVED", message: "Signer has already approved" },
    });
  });

  it("hides details of unexpected errors", async () => {
    const { status, body } = await failWith(new Error("database password is test-secret"));
    expect(status).toBe(500);
    expect(body).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });

  it("treats unknown codes as internal errors", async () => {
    const { status, body } = await failWith(new RecordStoreError("RECORD_DECODE_FAILED", "bad record"));
    expect(status).toBe(500);
    expect(body.error.code).toBe("INTERNAL_ERROR");
  });

  it("passes HTTP exceptions through", async () => {
    const res = await appThrowing(new HTTPException(401, { message: "nope" })).request("/fail");
    expect(res.status).toBe(401);
    expect(await res.text()).toBe("nope");
  });
});
