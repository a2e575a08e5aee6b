// ---------------------------------------------------------------------------
// In-process BookRepository with the same contract as the Postgres one:
// sequential ids, a unique isbn, and domain errors on failure.
// ---------------------------------------------------------------------------

import type {
  Book,
  BookCreateInput,
  BookUpdateInput,
  ListBooksQuery,
} from "../../src/core/types.js";
import {
  ConflictError,
  NotFoundError,
  StorageError,
} from "../../src/core/errors.js";
import type { BookRepository } from "../../src/db/book-repository.js";

export class InMemoryBookRepository implements BookRepository {
  private readonly books = new Map<number, Book>();
  private nextId = 1;

  /** When set, every operation fails as if the database were unreachable. */
  outage: Error | null = null;

  async create(fields: BookCreateInput): Promise<Book> {
    this.checkOutage("create");
    this.assertIsbnFree(fields.isbn, null);
    const book: Book = { id: this.nextId++, ...fields };
    this.books.set(book.id, book);
    return { ...book };
  }

  async get(id: number): Promise<Book> {
    this.checkOutage("get");
    return { ...this.find(id) };
  }

  async list(query: ListBooksQuery): Promise<Book[]> {
    this.checkOutage("list");
    const author = query.author?.toLowerCase();
    const title = query.title?.toLowerCase();
    return [...this.books.values()]
      .filter((b) => author === undefined || b.author.toLowerCase().includes(author))
      .filter((b) => title === undefined || b.title.toLowerCase().includes(title))
      .filter((b) => query.published_year === undefined || b.published_year === query.published_year)
      .sort((a, b) => a.id - b.id)
      .slice(query.skip, query.skip + query.limit)
      .map((b) => ({ ...b }));
  }

  async update(id: number, fields: BookUpdateInput): Promise<Book> {
    this.checkOutage("update");
    const current = this.find(id);
    if (fields.isbn !== undefined) {
      this.assertIsbnFree(fields.isbn, id);
    }
    const updated: Book = { ...current, ...fields, id };
    this.books.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<void> {
    this.checkOutage("delete");
    this.find(id);
    this.books.delete(id);
  }

  async ping(): Promise<void> {
    this.checkOutage("ping");
  }

  private find(id: number): Book {
    const book = this.books.get(id);
    if (!book) throw new NotFoundError("Book", id);
    return book;
  }

  private assertIsbnFree(isbn: string, selfId: number | null): void {
    for (const book of this.books.values()) {
      if (book.isbn === isbn && book.id !== selfId) {
        throw new ConflictError("isbn", isbn);
      }
    }
  }

  private checkOutage(operation: string): void {
    if (this.outage) throw new StorageError(operation, { cause: this.outage });
  }
}
