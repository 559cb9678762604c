/**
 * Wallet routes.
 *
 * POST /api/v1/wallet — Initialize the wallet (caller pays)
 * GET  /api/v1/wallet — Get the wallet
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { initializeWalletSchema } from "../types/dto.js";
import type { RequestLimits } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createWalletRoutes(limits: RequestLimits): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(initializeWalletSchema(limits)), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const wallet = service.initializeWallet(c.get("identity"), body.signers, body.threshold);
    return c.json({ data: wallet }, 201);
  });

  routes.get("/", (c) => {
    const wallet = c.get("service").getWallet();
    if (wallet === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", "Wallet has not been initialized"), 404);
    }
    return c.json({ data: wallet });
  });

  return routes;
}
