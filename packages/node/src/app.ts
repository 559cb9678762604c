/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import pino from "pino";
import type { Logger } from "pino";
import type { ActionHandler } from "@cosign/multisig";
import type { AppEnv } from "./types/api-contract.js";
import type { RequestLimits } from "./types/dto.js";
import { createErrorEnvelope } from "./types/error.js";
import { MultisigService } from "./services/multisig-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { identityMiddleware } from "./middleware/identity.js";
import { createHealthRoutes } from "./routes/health.js";
import { createWalletRoutes } from "./routes/wallet.js";
import { createProposalRoutes } from "./routes/proposals.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Owner id every wallet and proposal address is derived under */
  readonly engineId: string;
  readonly logger?: Logger;
  readonly limits?: Partial<RequestLimits>;
  /** Largest accepted request body. Default: 256 KiB */
  readonly maxBodyBytes?: number;
  /** Largest accepted X-Timestamp skew. Default: 5 minutes */
  readonly signatureMaxAgeMs?: number;
  /** Clock for request timestamps. Default: Date.now */
  readonly now?: () => number;
  /** Extra action handlers, registered after the built-in memo handler */
  readonly handlers?: ReadonlyMap<string, ActionHandler>;
}

export const DEFAULT_LIMITS: RequestLimits = {
  maxSigners: 32,
  maxPayloadBytes: 1024,
};

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: MultisigService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const limits: RequestLimits = { ...DEFAULT_LIMITS, ...options.limits };
  const service = new MultisigService({
    engineId: options.engineId,
    logger,
    maxMemoBytes: limits.maxPayloadBytes,
    handlers: options.handlers,
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));
  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no identity required) ───────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  app.use(
    "/api/*",
    bodyLimit({
      maxSize: options.maxBodyBytes ?? 256 * 1024,
      onError: (c) =>
        c.json(createErrorEnvelope("PAYLOAD_TOO_LARGE", "Request body too large"), 413),
    }),
  );
  app.use(
    "/api/*",
    identityMiddleware({ maxAgeMs: options.signatureMaxAgeMs, now: options.now }),
  );

  app.route("/api/v1/wallet", createWalletRoutes(limits));
  app.route("/api/v1/proposals", createProposalRoutes(limits));
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
