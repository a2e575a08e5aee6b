// ---------------------------------------------------------------------------
// Hono environment shared by the app, its middleware and its routes.
// ---------------------------------------------------------------------------

import type { Logger } from "../logging/logger.js";

/** Per-request variables set by middleware and read via `c.get()`. */
export interface AppEnv {
  Variables: {
    requestId: string;
    logger: Logger;
  };
}
