// ---------------------------------------------------------------------------
// Book Catalog -- Application bootstrap.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";
import type pg from "pg";

import type { AppConfig } from "./core/types.js";
import type { AppEnv } from "./api/env.js";
import { loadConfig } from "./config/config.js";
import { createLogger } from "./logging/logger.js";
import type { Logger } from "./logging/logger.js";
import { createPool, initSchema } from "./db/pool.js";
import { PgBookRepository } from "./db/pg-book-repository.js";
import { createApp } from "./api/server.js";

export interface BuiltApp {
  app: Hono<AppEnv>;
  pool: pg.Pool;
  config: AppConfig;
  logger: Logger;
}

// ── Main ───────────────────────────────────────────────────────────────────

export async function buildApp(config: AppConfig = loadConfig()): Promise<BuiltApp> {
  // 1. Create logger
  const logger = createLogger({
    level: config.logLevel,
    version: config.version,
    prettyPrint: config.env === "development",
    redactSecrets: true,
  });

  // 2. Create the connection pool and make sure the table exists
  const pool = createPool(config.database, logger.child({ module: "db" }));

  if (config.database.autoInit) {
    try {
      await initSchema(pool);
    } catch (err) {
      await pool.end();
      throw err;
    }
    logger.info("database schema ready");
  }

  // 3. Create repository and Hono app
  const bookRepository = new PgBookRepository(pool);
  const app = createApp({ bookRepository, logger, version: config.version });

  // 4. Log startup summary
  logger.info(
    {
      port: config.port,
      env: config.env,
      version: config.version,
      poolMax: config.database.poolMax,
      autoInit: config.database.autoInit,
    },
    "book-catalog ready",
  );

  return { app, pool, config, logger };
}
