// ---------------------------------------------------------------------------
// Core types for the Book Catalog service.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Branded primitives ──────────────────────────────────────────────────────

/** A validated ISBN-10 string (9 digits + check digit). */
export type ISBN10 = string & { readonly __brand: "ISBN10" };

/** A validated ISBN-13 string (13 digits). */
export type ISBN13 = string & { readonly __brand: "ISBN13" };

/** Either form of a validated ISBN. */
export type ISBN = ISBN10 | ISBN13;

/** Unvalidated ISBN input. */
export type RawISBN = string;

/** Result of parsing a raw ISBN string. */
export type ISBNParseResult =
  | { ok: true; isbn: ISBN; kind: "isbn10" | "isbn13" }
  | { ok: false; raw: RawISBN; reason: string };

// ── Book records ────────────────────────────────────────────────────────────

/**
 * A persisted book. Field names match the wire format and the `books`
 * table columns.
 */
export interface Book {
  id: number;
  title: string;
  author: string;
  isbn: string;
  published_year: number;
  description: string | null;
}

/** Fields accepted when creating a book; `id` is assigned by storage. */
export type BookCreateInput = Omit<Book, "id">;

/** Fields accepted by an update; only supplied keys change. */
export type BookUpdateInput = Partial<BookCreateInput>;

/** Filters and paging window for listing books. */
export interface ListBooksQuery {
  skip: number;
  limit: number;
  author?: string;
  title?: string;
  published_year?: number;
}

// ── Errors on the wire ──────────────────────────────────────────────────────

/** One offending field in a rejected request. */
export interface FieldError {
  /** Dotted path of the field, or `"body"` when the body itself is bad. */
  field: string;
  message: string;
  /** Machine-readable tag, e.g. `too_big` or `invalid_isbn`. */
  type: string;
}

export const ErrorType = {
  VALIDATION: "validation_error",
  NOT_FOUND: "not_found",
  CONFLICT: "conflict",
  INTERNAL: "internal_error",
} as const;
export type ErrorType = (typeof ErrorType)[keyof typeof ErrorType];

/** JSON body of every non-2xx response. */
export interface ErrorResponseBody {
  error: string;
  type: ErrorType;
  errors?: FieldError[];
}

// ── Configuration ───────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "test" | "production";
  /** Reported by `GET /`. */
  version: string;
  port: number;
  logLevel: string;
  database: DatabaseConfig;
}

export interface DatabaseConfig {
  /** Full connection URL; when present it wins over the discrete fields. */
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user?: string;
  password?: string;
  poolMax: number;
  /** Apply `schema.sql` on startup. */
  autoInit: boolean;
}

export interface LoggingConfig {
  level: string;
  /** Stamped on every line as the `version` base field. */
  version: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}
