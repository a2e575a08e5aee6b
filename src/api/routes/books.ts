// ---------------------------------------------------------------------------
// Book CRUD routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "../env.js";
import type { BookRepository } from "../../db/book-repository.js";
import { ValidationError } from "../../core/errors.js";
import {
  validateBookCreate,
  validateBookId,
  validateBookUpdate,
  validateListQuery,
} from "../../domain/books/book-schemas.js";

/** Dependencies required by book routes. */
export interface BookRouteDeps {
  bookRepository: BookRepository;
}

/**
 * Read the request body as JSON. An empty or malformed body is a
 * validation failure on the `body` field.
 */
async function readJsonBody(c: Context<AppEnv>): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === "") {
    throw ValidationError.forField("body", "request body is required", "missing");
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new ValidationError(
      [{ field: "body", message: "request body is not valid JSON", type: "json_invalid" }],
      { cause: err },
    );
  }
}

/**
 * Mounts book endpoints:
 *
 * - `GET    /books`      -- List books (`skip`, `limit`, `author`, `title`, `published_year`).
 * - `POST   /books`      -- Create a book; 201 with the stored record.
 * - `GET    /books/:id`  -- Single book.
 * - `PUT    /books/:id`  -- Update the supplied fields.
 * - `PATCH  /books/:id`  -- Same as PUT.
 * - `DELETE /books/:id`  -- Remove a book; 204.
 *
 * Every handler validates first and lets domain errors propagate to the
 * app-level error handler, which owns the status-code mapping.
 */
export function bookRoutes(deps: BookRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /books
  app.get("/", async (c) => {
    const query = validateListQuery(c.req.query());
    const books = await deps.bookRepository.list(query);
    return c.json(books);
  });

  // POST /books
  app.post("/", async (c) => {
    const fields = validateBookCreate(await readJsonBody(c));
    const book = await deps.bookRepository.create(fields);
    c.get("logger").info({ bookId: book.id, isbn: book.isbn }, "book created");
    return c.json(book, 201);
  });

  // GET /books/:id
  app.get("/:id", async (c) => {
    const id = validateBookId(c.req.param("id"));
    const book = await deps.bookRepository.get(id);
    return c.json(book);
  });

  // PUT|PATCH /books/:id
  app.on(["PUT", "PATCH"], "/:id", async (c) => {
    const id = validateBookId(c.req.param("id"));
    const fields = validateBookUpdate(await readJsonBody(c));
    const book = await deps.bookRepository.update(id, fields);
    c.get("logger").info({ bookId: id, fields: Object.keys(fields) }, "book updated");
    return c.json(book);
  });

  // DELETE /books/:id
  app.delete("/:id", async (c) => {
    const id = validateBookId(c.req.param("id"));
    await deps.bookRepository.delete(id);
    c.get("logger").info({ bookId: id }, "book deleted");
    return c.body(null, 204);
  });

  return app;
}
