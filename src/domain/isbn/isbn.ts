// ---------------------------------------------------------------------------
// ISBN parsing and check-digit verification
// ---------------------------------------------------------------------------

import type { ISBN10, ISBN13, ISBNParseResult, RawISBN } from "../../core/types.js";

const ISBN10_SHAPE = /^\d{9}[\dX]$/;
const ISBN13_SHAPE = /^97[89]\d{10}$/;

// ── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Reduce a raw ISBN to its compact form: whitespace and hyphens removed,
 * a trailing ISBN-10 `x` upper-cased.
 */
export function compactISBN(raw: RawISBN): string {
  return raw.trim().replace(/[\s-]/g, "").toUpperCase();
}

/** Weighted mod-11 sum over all ten characters; `X` counts as 10. */
function isbn10Checksum(isbn10: string): number {
  let sum = 0;
  for (let i = 0; i < 10; i++) {
    const ch = isbn10.charAt(i);
    sum += (10 - i) * (ch === "X" ? 10 : Number(ch));
  }
  return sum % 11;
}

/** Alternating 1/3 weighted mod-10 sum over all thirteen digits. */
function isbn13Checksum(isbn13: string): number {
  let sum = 0;
  for (let i = 0; i < 13; i++) {
    sum += (i % 2 === 0 ? 1 : 3) * Number(isbn13.charAt(i));
  }
  return sum % 10;
}

// ── Validation ──────────────────────────────────────────────────────────────

/**
 * Validate and return a branded ISBN10.
 * Returns `null` on invalid input.
 */
export function validateISBN10(raw: RawISBN): ISBN10 | null {
  const compact = compactISBN(raw);
  if (!ISBN10_SHAPE.test(compact)) return null;
  if (isbn10Checksum(compact) !== 0) return null;
  return compact as ISBN10;
}

/**
 * Validate and return a branded ISBN13. Only the Bookland prefixes
 * 978 and 979 are accepted.
 */
export function validateISBN13(raw: RawISBN): ISBN13 | null {
  const compact = compactISBN(raw);
  if (!ISBN13_SHAPE.test(compact)) return null;
  if (isbn13Checksum(compact) !== 0) return null;
  return compact as ISBN13;
}

// ── Top-level parse ─────────────────────────────────────────────────────────

/**
 * Parse an arbitrary string into a validated, compact ISBN, or explain why
 * it is not one.
 */
export function parseISBN(raw: RawISBN): ISBNParseResult {
  const compact = compactISBN(raw);

  if (compact.length === 0) {
    return { ok: false, raw, reason: "ISBN is empty" };
  }

  const isbn13 = validateISBN13(compact);
  if (isbn13) return { ok: true, isbn: isbn13, kind: "isbn13" };

  const isbn10 = validateISBN10(compact);
  if (isbn10) return { ok: true, isbn: isbn10, kind: "isbn10" };

  if (compact.length !== 10 && compact.length !== 13) {
    return {
      ok: false,
      raw,
      reason: `expected 10 or 13 characters, got ${compact.length}`,
    };
  }

  if (compact.length === 10 && !ISBN10_SHAPE.test(compact)) {
    return { ok: false, raw, reason: "ISBN-10 must be 9 digits followed by a digit or X" };
  }

  if (compact.length === 13 && !/^\d{13}$/.test(compact)) {
    return { ok: false, raw, reason: "ISBN-13 must contain only digits" };
  }

  if (compact.length === 13 && !ISBN13_SHAPE.test(compact)) {
    return { ok: false, raw, reason: "ISBN-13 must start with 978 or 979" };
  }

  return { ok: false, raw, reason: "invalid check digit" };
}
