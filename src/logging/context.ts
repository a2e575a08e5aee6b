// ---------------------------------------------------------------------------
// Request-scoped logging middleware for Hono.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type { AppEnv } from "../api/env.js";
import type { Logger } from "./logger.js";

/**
 * Attach a child logger bound to `requestId`, `method` and `path` to every
 * request, and log its start and completion.
 *
 * Runs after `requestIdMiddleware`, whose id it reuses so log lines and the
 * `X-Request-ID` response header agree. Handlers read it via
 * `c.get("logger")`.
 */
export function createRequestLogger(
  baseLogger: Logger,
): (c: Context<AppEnv>, next: Next) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const childLogger = baseLogger.child({
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
    });

    c.set("logger", childLogger);

    const start = Date.now();
    childLogger.info("request started");

    await next();

    const durationMs = Date.now() - start;
    childLogger.info({ durationMs, status: c.res.status }, "request completed");
  };
}
