// ---------------------------------------------------------------------------
// Storage contract for book records.
// ---------------------------------------------------------------------------

import type {
  Book,
  BookCreateInput,
  BookUpdateInput,
  ListBooksQuery,
} from "../core/types.js";

/**
 * Create/read/update/delete over the persisted book set.
 *
 * Failures are reported as domain errors: `NotFoundError` for an unknown id,
 * `ConflictError` when a write would duplicate an `isbn`, and `StorageError`
 * for anything the caller cannot act on.
 */
export interface BookRepository {
  create(fields: BookCreateInput): Promise<Book>;
  get(id: number): Promise<Book>;
  /** Matching books in id order; an empty array when nothing matches. */
  list(query: ListBooksQuery): Promise<Book[]>;
  /** Apply only the supplied fields. An empty update returns the record as is. */
  update(id: number, fields: BookUpdateInput): Promise<Book>;
  delete(id: number): Promise<void>;
  /** One round-trip to storage; rejects when it is unreachable. */
  ping(): Promise<void>;
}
