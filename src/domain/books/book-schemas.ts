// ---------------------------------------------------------------------------
// Request shapes for the books resource.
// Each shape is a Zod schema; the validate* functions turn a Zod failure into
// a ValidationError carrying one FieldError per offending field.
// ---------------------------------------------------------------------------

import { z } from "zod";
import type {
  BookCreateInput,
  BookUpdateInput,
  FieldError,
  ListBooksQuery,
} from "../../core/types.js";
import { ValidationError } from "../../core/errors.js";
import { parseISBN } from "../isbn/isbn.js";

/** First year of movable-type printing in Europe. */
export const MIN_PUBLISHED_YEAR = 1450;
export const MAX_TEXT_LENGTH = 255;
export const MAX_DESCRIPTION_LENGTH = 2_000;
export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 1_000;
/** Upper bound of a Postgres `integer` column. */
export const MAX_BOOK_ID = 2_147_483_647;

// ── Field schemas ───────────────────────────────────────────────────────────

/** Postgres text columns reject U+0000. */
const hasNoNul = (s: string): boolean => !s.includes("\u0000");

function noNulIssue(field: string) {
  return {
    message: `${field} must not contain NUL characters`,
    params: { type: "invalid_string" },
  };
}

function requiredText(field: string) {
  return z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .trim()
    .min(1, `${field} must not be empty`)
    .max(MAX_TEXT_LENGTH, `${field} must be at most ${MAX_TEXT_LENGTH} characters`)
    .refine(hasNoNul, noNulIssue(field));
}

function filterText(field: string) {
  return z.string().trim().max(MAX_TEXT_LENGTH).refine(hasNoNul, noNulIssue(field));
}

const isbnSchema = z
  .string({
    required_error: "isbn is required",
    invalid_type_error: "isbn must be a string",
  })
  .transform((raw, ctx) => {
    const parsed = parseISBN(raw);
    if (!parsed.ok) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `isbn is not a valid ISBN-10 or ISBN-13: ${parsed.reason}`,
        params: { type: "invalid_isbn" },
      });
      return z.NEVER;
    }
    return parsed.isbn;
  });

function publishedYearSchema(currentYear: number) {
  return z
    .number({
      required_error: "published_year is required",
      invalid_type_error: "published_year must be an integer",
    })
    .int("published_year must be an integer")
    .min(MIN_PUBLISHED_YEAR, `published_year must be ${MIN_PUBLISHED_YEAR} or later`)
    .max(currentYear, `published_year must not be later than ${currentYear}`);
}

const descriptionSchema = z
  .string({ invalid_type_error: "description must be a string or null" })
  .max(
    MAX_DESCRIPTION_LENGTH,
    `description must be at most ${MAX_DESCRIPTION_LENGTH} characters`,
  )
  .refine(hasNoNul, noNulIssue("description"))
  .nullable()
  .optional();

/** A decimal string parsed into an integer within `[min, max]`. */
function integerParam(field: string, min: number, max: number) {
  const message = `${field} must be an integer between ${min} and ${max}`;
  return z
    .string()
    .regex(/^\d{1,10}$/, message)
    .transform(Number)
    .pipe(z.number().int().min(min, message).max(max, message));
}

const bodyObject = {
  required_error: "request body is required",
  invalid_type_error: "request body must be a JSON object",
};

// ── Request shapes ──────────────────────────────────────────────────────────

/** Body of `POST /books`. */
export function bookCreateSchema(currentYear: number) {
  return z.object(
    {
      title: requiredText("title"),
      author: requiredText("author"),
      isbn: isbnSchema,
      published_year: publishedYearSchema(currentYear),
      description: descriptionSchema,
    },
    bodyObject,
  );
}

/** Body of `PUT/PATCH /books/:id`. Required fields may be omitted but not nulled. */
export function bookUpdateSchema(currentYear: number) {
  return z.object(
    {
      title: requiredText("title").optional(),
      author: requiredText("author").optional(),
      isbn: isbnSchema.optional(),
      published_year: publishedYearSchema(currentYear).optional(),
      description: descriptionSchema,
    },
    bodyObject,
  );
}

export const listBooksQuerySchema = z.object({
  skip: integerParam("skip", 0, MAX_BOOK_ID).optional(),
  limit: integerParam("limit", 1, MAX_LIST_LIMIT).optional(),
  author: filterText("author").optional(),
  title: filterText("title").optional(),
  published_year: integerParam("published_year", 0, 9_999).optional(),
});

const bookIdSchema = z.object({ id: integerParam("id", 1, MAX_BOOK_ID) });

// ── Error conversion ────────────────────────────────────────────────────────

/** Flatten Zod issues into the wire-level field error list. */
export function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.map((issue) => {
    const tag: unknown =
      issue.code === z.ZodIssueCode.custom ? issue.params?.["type"] : undefined;
    return {
      field: issue.path.length > 0 ? issue.path.join(".") : "body",
      message: issue.message,
      type: typeof tag === "string" ? tag : issue.code,
    };
  });
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error));
  }
  return result.data;
}

// ── Public API ──────────────────────────────────────────────────────────────

export function validateBookCreate(input: unknown, now: Date = new Date()): BookCreateInput {
  const parsed = parseOrThrow(bookCreateSchema(now.getFullYear()), input);
  return {
    title: parsed.title,
    author: parsed.author,
    isbn: parsed.isbn,
    published_year: parsed.published_year,
    description: parsed.description ?? null,
  };
}

/**
 * Validate an update body. Keys that are absent stay absent in the result
 * so the repository touches only what the caller supplied.
 */
export function validateBookUpdate(input: unknown, now: Date = new Date()): BookUpdateInput {
  const parsed = parseOrThrow(bookUpdateSchema(now.getFullYear()), input);
  const fields: BookUpdateInput = {};
  if (parsed.title !== undefined) fields.title = parsed.title;
  if (parsed.author !== undefined) fields.author = parsed.author;
  if (parsed.isbn !== undefined) fields.isbn = parsed.isbn;
  if (parsed.published_year !== undefined) fields.published_year = parsed.published_year;
  if (parsed.description !== undefined) fields.description = parsed.description;
  return fields;
}

export function validateListQuery(query: Record<string, string | undefined>): ListBooksQuery {
  const parsed = parseOrThrow(listBooksQuerySchema, query);
  const result: ListBooksQuery = {
    skip: parsed.skip ?? 0,
    limit: parsed.limit ?? DEFAULT_LIST_LIMIT,
  };
  if (parsed.author) result.author = parsed.author;
  if (parsed.title) result.title = parsed.title;
  if (parsed.published_year !== undefined) result.published_year = parsed.published_year;
  return result;
}

export function validateBookId(raw: string): number {
  return parseOrThrow(bookIdSchema, { id: raw }).id;
}
