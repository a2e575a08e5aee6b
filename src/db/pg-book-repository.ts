// ---------------------------------------------------------------------------
// Postgres-backed BookRepository.
// ---------------------------------------------------------------------------

import type pg from "pg";
import type {
  Book,
  BookCreateInput,
  BookUpdateInput,
  ListBooksQuery,
} from "../core/types.js";
import {
  BookCatalogError,
  ConflictError,
  NotFoundError,
  StorageError,
} from "../core/errors.js";
import type { BookRepository } from "./book-repository.js";

/** SQLSTATE for `unique_violation`. */
const UNIQUE_VIOLATION = "23505";

const COLUMNS = "id, title, author, isbn, published_year, description";

const UPDATABLE_COLUMNS = [
  "title",
  "author",
  "isbn",
  "published_year",
  "description",
] as const satisfies readonly (keyof BookUpdateInput)[];

/** Shape of a `books` row as returned by the driver. */
type BookRow = {
  id: number;
  title: string;
  author: string;
  isbn: string;
  published_year: number;
  description: string | null;
};

function toBook(row: BookRow): Book {
  return {
    id: row.id,
    title: row.title,
    author: row.author,
    isbn: row.isbn,
    published_year: row.published_year,
    description: row.description,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === UNIQUE_VIOLATION;
}

/** Escape `%`, `_` and `\` so user text matches literally inside ILIKE. */
function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, "\\$&");
}

/**
 * Each operation checks out one pooled client, runs a single statement and
 * releases the client on every exit path. Single statements keep every
 * write atomic for its row; Postgres row locks serialize concurrent writes
 * to the same id.
 */
export class PgBookRepository implements BookRepository {
  constructor(private readonly pool: pg.Pool) {}

  async create(fields: BookCreateInput): Promise<Book> {
    return this.withClient("create", async (client) => {
      try {
        const result = await client.query<BookRow>(
          `INSERT INTO books (title, author, isbn, published_year, description)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING ${COLUMNS}`,
          [
            fields.title,
            fields.author,
            fields.isbn,
            fields.published_year,
            fields.description,
          ],
        );
        return toBook(result.rows[0]);
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw new ConflictError("isbn", fields.isbn, { cause: err });
        }
        throw err;
      }
    });
  }

  async get(id: number): Promise<Book> {
    return this.withClient("get", async (client) => {
      const result = await client.query<BookRow>(
        `SELECT ${COLUMNS} FROM books WHERE id = $1`,
        [id],
      );
      if (result.rows.length === 0) {
        throw new NotFoundError("Book", id);
      }
      return toBook(result.rows[0]);
    });
  }

  async list(query: ListBooksQuery): Promise<Book[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (query.author !== undefined) {
      values.push(`%${escapeLike(query.author)}%`);
      conditions.push(`author ILIKE $${values.length}`);
    }
    if (query.title !== undefined) {
      values.push(`%${escapeLike(query.title)}%`);
      conditions.push(`title ILIKE $${values.length}`);
    }
    if (query.published_year !== undefined) {
      values.push(query.published_year);
      conditions.push(`published_year = $${values.length}`);
    }

    const where = conditions.length > 0 ? ` WHERE ${conditions.join(" AND ")}` : "";
    values.push(query.limit, query.skip);
    const sql =
      `SELECT ${COLUMNS} FROM books${where} ORDER BY id` +
      ` LIMIT $${values.length - 1} OFFSET $${values.length}`;

    return this.withClient("list", async (client) => {
      const result = await client.query<BookRow>(sql, values);
      return result.rows.map(toBook);
    });
  }

  async update(id: number, fields: BookUpdateInput): Promise<Book> {
    const columns = UPDATABLE_COLUMNS.filter((col) => fields[col] !== undefined);
    if (columns.length === 0) {
      return this.get(id);
    }

    const assignments = columns.map((col, i) => `${col} = $${i + 2}`).join(", ");
    const values: unknown[] = [id, ...columns.map((col) => fields[col])];

    return this.withClient("update", async (client) => {
      let result: pg.QueryResult<BookRow>;
      try {
        result = await client.query<BookRow>(
          `UPDATE books SET ${assignments} WHERE id = $1 RETURNING ${COLUMNS}`,
          values,
        );
      } catch (err) {
        if (isUniqueViolation(err) && fields.isbn !== undefined) {
          throw new ConflictError("isbn", fields.isbn, { cause: err });
        }
        throw err;
      }
      if (result.rows.length === 0) {
        throw new NotFoundError("Book", id);
      }
      return toBook(result.rows[0]);
    });
  }

  async delete(id: number): Promise<void> {
    await this.withClient("delete", async (client) => {
      const result = await client.query("DELETE FROM books WHERE id = $1", [id]);
      if ((result.rowCount ?? 0) === 0) {
        throw new NotFoundError("Book", id);
      }
    });
  }

  async ping(): Promise<void> {
    await this.withClient("ping", async (client) => {
      await client.query("SELECT 1");
    });
  }

  // ── Internals ──────────────────────────────────────────────────────────

  /**
   * Run `fn` on a checked-out client. Domain errors pass through; any other
   * failure becomes a StorageError with the driver error as its cause.
   */
  private async withClient<T>(
    operation: string,
    fn: (client: pg.PoolClient) => Promise<T>,
  ): Promise<T> {
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new StorageError(operation, { cause: err });
    }

    try {
      return await fn(client);
    } catch (err) {
      if (err instanceof BookCatalogError) throw err;
      throw new StorageError(operation, { cause: err });
    } finally {
      client.release();
    }
  }
}
