// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { AppEnv } from "../env.js";
import type { Logger } from "../../logging/logger.js";
import type { ErrorResponseBody } from "../../core/types.js";
import { ErrorType } from "../../core/types.js";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
} from "../../core/errors.js";

/**
 * Build the `onError` handler for the app.
 *
 * Mapping:
 * - `ValidationError` -> 422 with the offending field list
 * - `NotFoundError`   -> 404
 * - `ConflictError`   -> 409
 * - `HTTPException`   -> its own status (framework-raised, e.g. body limits)
 * - Everything else   -> 500, logged; the message never reaches the client
 *
 * The request-scoped logger is used when the logging middleware has run,
 * `baseLogger` otherwise.
 */
export function createErrorHandler(
  baseLogger: Logger,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err: Error, c: Context<AppEnv>): Response => {
    const logger = c.get("logger") ?? baseLogger;

    if (err instanceof ValidationError) {
      logger.info({ fieldErrors: err.fieldErrors }, "request rejected by validation");
      const body: ErrorResponseBody = {
        error: "Validation error",
        type: ErrorType.VALIDATION,
        errors: err.fieldErrors,
      };
      return c.json(body, 422);
    }

    if (err instanceof NotFoundError) {
      const body: ErrorResponseBody = {
        error: `${err.resource} not found`,
        type: ErrorType.NOT_FOUND,
      };
      return c.json(body, 404);
    }

    if (err instanceof ConflictError) {
      logger.warn({ field: err.field, value: err.value }, "uniqueness conflict");
      const body: ErrorResponseBody = { error: err.message, type: ErrorType.CONFLICT };
      return c.json(body, 409);
    }

    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    logger.error(
      {
        err: {
          name: err.name,
          message: err.message,
          stack: err.stack,
          cause: err.cause instanceof Error ? err.cause.message : err.cause,
        },
      },
      "unhandled error",
    );

    const body: ErrorResponseBody = {
      error: "Internal server error",
      type: ErrorType.INTERNAL,
    };
    return c.json(body, 500);
  };
}
