// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import { z } from "zod";
import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const port = z.coerce.number().int().min(1).max(65_535);

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  APP_VERSION: z.string().min(1).default("1.0.0"),
  PORT: port.default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  DATABASE_URL: z.string().url().optional(),
  PGHOST: z.string().min(1).default("localhost"),
  PGPORT: port.default(5432),
  PGDATABASE: z.string().min(1).default("book_catalog"),
  PGUSER: z.string().min(1).optional(),
  PGPASSWORD: z.string().optional(),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
  DATABASE_AUTO_INIT: booleanFlag.default("true"),
});

/**
 * Load the application configuration from environment variables.
 *
 * Every setting has a default so the service starts against a local
 * Postgres with zero configuration. Invalid values fail fast with a
 * ConfigurationError naming each offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Treat empty strings as unset so `PORT=` falls back to the default.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment configuration: ${problems}`);
  }

  const vars = result.data;

  return {
    env: vars.NODE_ENV,
    version: vars.APP_VERSION,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    database: {
      connectionString: vars.DATABASE_URL,
      host: vars.PGHOST,
      port: vars.PGPORT,
      database: vars.PGDATABASE,
      user: vars.PGUSER,
      password: vars.PGPASSWORD,
      poolMax: vars.DATABASE_POOL_MAX,
      autoInit: vars.DATABASE_AUTO_INIT,
    },
  };
}
