// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "./env.js";
import type { Logger } from "../logging/logger.js";
import type { BookRepository } from "../db/book-repository.js";
import type { ErrorResponseBody } from "../core/types.js";
import { ErrorType } from "../core/types.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { createErrorHandler } from "./middleware/error-handler.js";

import { bookRoutes } from "./routes/books.js";
import { healthRoutes } from "./routes/health.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  bookRepository: BookRepository;
  logger: Logger;
  version: string;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Route handlers.
 * 4. Global error handler (maps domain errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  // ── Routes ────────────────────────────────────────────────────────────

  app.get("/", (c) =>
    c.json({
      message: "Book Catalog API is running",
      status: "running",
      version: deps.version,
    }),
  );

  app.route("/books", bookRoutes({ bookRepository: deps.bookRepository }));
  app.route("/health", healthRoutes({ bookRepository: deps.bookRepository }));

  app.notFound((c) => {
    const body: ErrorResponseBody = { error: "Route not found", type: ErrorType.NOT_FOUND };
    return c.json(body, 404);
  });

  // ── Error handler ─────────────────────────────────────────────────────

  app.onError(createErrorHandler(deps.logger));

  return app;
}
