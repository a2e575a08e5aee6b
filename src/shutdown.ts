// ---------------------------------------------------------------------------
// Graceful shutdown for the Node.js entrypoint.
// ---------------------------------------------------------------------------

import type { Logger } from "./logging/logger.js";

/** The part of a Node HTTP server that shutdown needs. */
export interface ClosableServer {
  close(callback: (err?: Error) => void): unknown;
}

export interface ShutdownDeps {
  server: ClosableServer;
  pool: { end(): Promise<void> };
  logger: Logger;
  exit: (code: number) => void;
}

/**
 * Build the signal handler: stop accepting connections, let in-flight
 * requests finish, then drain the pool. Signals after the first are logged
 * and ignored so the pool is ended exactly once.
 */
export function createShutdown(deps: ShutdownDeps): (signal: NodeJS.Signals) => void {
  const { server, pool, logger, exit } = deps;
  let shuttingDown = false;

  return (signal) => {
    if (shuttingDown) {
      logger.warn({ signal }, "shutdown already in progress");
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "shutting down");

    server.close((closeErr) => {
      if (closeErr) {
        logger.error({ err: { name: closeErr.name, message: closeErr.message } }, "http server close failed");
      }
      pool.end().then(
        () => exit(closeErr ? 1 : 0),
        (endErr: unknown) => {
          logger.error(
            { err: endErr instanceof Error ? { name: endErr.name, message: endErr.message } : endErr },
            "pool shutdown failed",
          );
          exit(1);
        },
      );
    });
  };
}
