// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

/** Re-export pino's Logger type for convenience. */
export type Logger = pino.Logger;

/** Database credentials, wherever a `DatabaseConfig` lands in a log line. */
const SECRET_PATHS: string[] = ["database.password", "database.connectionString"];

/**
 * Create a configured pino logger instance.
 *
 * - JSON output (pino default)
 * - Secret redaction on sensitive key paths
 * - Base fields: `service` and `version`
 * - Optional pretty-print via `pino-pretty` transport for development
 *
 * `destination` replaces stdout when pretty-printing is off.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "book-catalog",
      version: config.version,
    },
    ...(config.redactSecrets
      ? {
          redact: {
            paths: SECRET_PATHS,
            censor: "[REDACTED]",
          },
        }
      : {}),
  };

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return destination ? pino(baseOptions, destination) : pino(baseOptions);
}
