// ---------------------------------------------------------------------------
// Shared test fixtures.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { BookCreateInput } from "../../src/core/types.js";

/** Create a silent pino logger for testing. */
export function createTestLogger() {
  return pino({ level: "silent" });
}

/** A valid ISBN-13 built from `978` + a zero-padded serial + check digit. */
export function makeISBN13(serial: number): string {
  const body = "978" + String(serial).padStart(9, "0");
  let sum = 0;
  for (let i = 0; i < 12; i++) {
    sum += (i % 2 === 0 ? 1 : 3) * Number(body.charAt(i));
  }
  return body + String((10 - (sum % 10)) % 10);
}

export const DUNE: BookCreateInput = {
  title: "Dune",
  author: "Frank Herbert",
  isbn: "9780441172719",
  published_year: 1965,
  description: null,
};

/** Request body for the n-th generated book (1-based). */
export function bookPayload(n: number): BookCreateInput {
  return {
    title: `Book ${n}`,
    author: `Author ${n}`,
    isbn: makeISBN13(n),
    published_year: 2000 + n,
    description: `Summary ${n}`,
  };
}
