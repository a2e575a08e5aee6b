// ---------------------------------------------------------------------------
// Error hierarchy for the Book Catalog service.
// ---------------------------------------------------------------------------

import type { FieldError } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all Book Catalog domain errors.
 */
export class BookCatalogError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BookCatalogError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Request errors ──────────────────────────────────────────────────────────

/** The request input broke one or more field rules. */
export class ValidationError extends BookCatalogError {
  public readonly fieldErrors: FieldError[];

  constructor(fieldErrors: FieldError[], options?: ErrorOptions) {
    const fields = fieldErrors.map((e) => e.field).join(", ");
    super(`Validation failed for: ${fields}`, options);
    this.name = "ValidationError";
    this.fieldErrors = fieldErrors;
  }

  /** Shorthand for a failure on a single field. */
  static forField(field: string, message: string, type: string): ValidationError {
    return new ValidationError([{ field, message, type }]);
  }
}

/** No record with the requested id exists. */
export class NotFoundError extends BookCatalogError {
  public readonly resource: string;
  public readonly id: number;

  constructor(resource: string, id: number, options?: ErrorOptions) {
    super(`${resource} ${id} not found`, options);
    this.name = "NotFoundError";
    this.resource = resource;
    this.id = id;
  }
}

/** The write would break a uniqueness constraint. */
export class ConflictError extends BookCatalogError {
  public readonly field: string;
  public readonly value: string;

  constructor(field: string, value: string, options?: ErrorOptions) {
    super(`A book with ${field} "${value}" already exists`, options);
    this.name = "ConflictError";
    this.field = field;
    this.value = value;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** The database failed in a way the caller cannot act on. */
export class StorageError extends BookCatalogError {
  public readonly operation: string;

  constructor(operation: string, options?: ErrorOptions) {
    super(`Storage failure during ${operation}`, options);
    this.name = "StorageError";
    this.operation = operation;
  }
}

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends BookCatalogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
