// ---------------------------------------------------------------------------
// Postgres connection pool and schema bootstrap.
// ---------------------------------------------------------------------------

import pg from "pg";
import { readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import type { DatabaseConfig } from "../core/types.js";
import type { Logger } from "../logging/logger.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export function createPool(config: DatabaseConfig, logger: Logger): pg.Pool {
  const poolOpts: pg.PoolConfig = config.connectionString
    ? { connectionString: config.connectionString, max: config.poolMax }
    : {
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        max: config.poolMax,
      };
  const pool = new pg.Pool(poolOpts);
  // Idle clients that die emit 'error' on the pool; unhandled it would
  // crash the process. The pool replaces them on the next checkout.
  pool.on("error", (err) => {
    logger.error({ err: { name: err.name, message: err.message } }, "postgres pool background error");
  });
  return pool;
}

/** Apply `schema.sql` (idempotent `CREATE ... IF NOT EXISTS`). */
export async function initSchema(pool: pg.Pool): Promise<void> {
  const sql = readFileSync(join(__dirname, "schema.sql"), "utf-8");
  await pool.query(sql);
}
