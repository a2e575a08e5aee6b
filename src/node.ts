// ---------------------------------------------------------------------------
// Node.js HTTP server entrypoint (for deployment).
// ---------------------------------------------------------------------------

import { serve } from "@hono/node-server";
import { buildApp } from "./app.js";
import { createShutdown } from "./shutdown.js";

const { app, pool, config, logger } = await buildApp();

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port }, "http server listening");
});

const shutdown = createShutdown({
  server,
  pool,
  logger,
  exit: (code) => process.exit(code),
});

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
