/**
 * Structured logging middleware.
 *
 * Gives every request a pino child logger bound to its request id, and
 * logs one line per completed request with method, path, status and
 * duration. Server errors log at error, client errors at warn.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();
    const log = logger.child({ requestId: c.get("requestId") });
    c.set("log", log);

    await next();

    const status = c.res.status;
    const entry = {
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Date.now() - start,
    };
    const message = `${entry.method} ${entry.path} ${status}`;

    if (status >= 500) {
      log.error(entry, message);
    } else if (status >= 400) {
      log.warn(entry, message);
    } else {
      log.info(entry, message);
    }
  };
}
