// ---------------------------------------------------------------------------
// Health check routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../env.js";
import type { BookRepository } from "../../db/book-repository.js";

/** Dependencies required by health routes. */
export interface HealthRouteDeps {
  bookRepository: BookRepository;
}

const startedAt = Date.now();

/**
 * Mounts health-check endpoints:
 *
 * - `GET /health`       -- Basic liveness probe.
 * - `GET /health/ready` -- Readiness: one round-trip to the database.
 */
export function healthRoutes(deps: HealthRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /health
  app.get("/", (c) => {
    const uptimeMs = Date.now() - startedAt;
    return c.json({
      status: "ok",
      uptime: uptimeMs,
      timestamp: new Date().toISOString(),
    });
  });

  // GET /health/ready
  app.get("/ready", async (c) => {
    try {
      await deps.bookRepository.ping();
    } catch (err) {
      c.get("logger").warn(
        { err: err instanceof Error ? { name: err.name, message: err.message } : err },
        "readiness check failed",
      );
      return c.json({ status: "unavailable", database: "down" }, 503);
    }
    return c.json({ status: "ok", database: "up" });
  });

  return app;
}
