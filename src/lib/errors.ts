/**
 * WHAT: Discriminated union error types for precise error handling
 * WHY: Lets the CLI pick an exit message, a log shape and a Sentry decision per failure kind
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isRecoverable(err) → boolean (worth retrying)
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyError, isRecoverable } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "db_error" && classified.code === "SQLITE_BUSY") { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { isRecord, stringProp } from "./typeGuards.js";

// ===== Error Type Definitions =====

/**
 * Base error interface for the discriminated union pattern.
 *
 * The `kind` field is the discriminator - TypeScript uses it to narrow types
 * in switch statements. Works across module boundaries, unlike instanceof.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Database errors (SQLite).
 *
 * The `code` field maps to SQLite error codes. The important ones:
 * - SQLITE_BUSY/SQLITE_LOCKED: Transient, can retry
 * - SQLITE_CONSTRAINT_*: Logic error, don't retry
 * - SQLITE_CORRUPT/SQLITE_NOTADB: Fatal
 */
export interface DbError extends AppError {
  kind: "db_error";
  code: string;
  sql?: string;
  table?: string;
}

/** Validation errors (thresholds, CLI values, imported datasets) */
export interface ValidationFailure extends AppError {
  kind: "validation";
  field: string;
}

/**
 * Filesystem errors. Node system errors raised while reading a dataset file
 * or creating the database directory.
 */
export interface IoError extends AppError {
  kind: "io";
  code: string; // ENOENT, EACCES, EISDIR, EPERM
  path?: string;
}

/** Unknown/unclassified errors */
export interface UnknownError extends AppError {
  kind: "unknown";
}

/** Discriminated union of all error types */
export type ClassifiedError = DbError | ValidationFailure | IoError | UnknownError;

const IO_CODES = ["ENOENT", "EACCES", "EISDIR", "ENOTDIR", "EPERM"];

// ===== Error Classification =====

/**
 * Classify any caught error into a discriminated union.
 *
 * Catch blocks should call this immediately. Ordered from most specific to
 * least: SQLite errors first (distinctive name/code), then our own
 * ValidationError, then filesystem errors, then fallback to unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const message = stringProp(err, "message") ?? String(err);
  const name = stringProp(err, "name");
  const code = isRecord(err) ? err.code : undefined;
  const cause = err instanceof Error ? err : undefined;

  // SQLite errors
  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    const sql = stringProp(err, "sql");
    return {
      kind: "db_error",
      code: typeof code === "string" ? code : "UNKNOWN",
      message,
      sql,
      table: extractTableFromSql(sql),
      cause,
    };
  }

  if (name === "ValidationError") {
    return {
      kind: "validation",
      field: stringProp(err, "field") ?? "input",
      message,
      cause,
    };
  }

  if (typeof code === "string" && IO_CODES.includes(code)) {
    return {
      kind: "io",
      code,
      path: stringProp(err, "path"),
      message,
      cause,
    };
  }

  // Fallback: unknown error
  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Check if error is recoverable (worth retrying).
 *
 * Only a locked database qualifies. The computation itself is pure and will
 * fail the same way twice.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "db_error":
      return err.code === "SQLITE_BUSY" || err.code === "SQLITE_LOCKED";

    default:
      return false;
  }
}

/**
 * Check if error should be reported to Sentry.
 *
 * Sentry alerts should mean "something is actually broken", not "the
 * operator typed a bad path".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "validation":
    case "io":
      return false;

    default:
      return true;
  }
}

/**
 * Check if error is a database constraint violation.
 *
 * During import this usually means a dataset repeats a reading the
 * table already holds under a unique index added by hand.
 */
export function isConstraintViolation(err: ClassifiedError): boolean {
  return (
    err.kind === "db_error" &&
    (err.code === "SQLITE_CONSTRAINT" ||
      err.code === "SQLITE_CONSTRAINT_PRIMARYKEY" ||
      err.code === "SQLITE_CONSTRAINT_UNIQUE" ||
      err.code === "SQLITE_CONSTRAINT_NOTNULL")
  );
}

/**
 * Check if error is a database corruption (fatal)
 */
export function isDatabaseCorrupt(err: ClassifiedError): boolean {
  return err.kind === "db_error" && (err.code === "SQLITE_CORRUPT" || err.code === "SQLITE_NOTADB");
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "db_error":
      return {
        ...base,
        sqlCode: err.code,
        sql: err.sql?.slice(0, 100),
        table: err.table,
      };

    case "validation":
      return { ...base, field: err.field };

    case "io":
      return { ...base, ioCode: err.code, path: err.path };

    default:
      return base;
  }
}

/**
 * Get a user-friendly error message for display
 */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "db_error":
      if (isRecoverable(err)) {
        return "Database is temporarily busy. Please try again.";
      }
      if (isDatabaseCorrupt(err)) {
        return "The database file is corrupt or not a SQLite database.";
      }
      if (isConstraintViolation(err)) {
        return "The import conflicts with existing data.";
      }
      return "A database error occurred.";

    case "validation":
      return `Invalid ${err.field}: ${err.message}`;

    case "io":
      if (err.code === "ENOENT") {
        return `File not found: ${err.path ?? "(unknown path)"}`;
      }
      return `Cannot access ${err.path ?? "file"} (${err.code}).`;

    default:
      return "An unexpected error occurred.";
  }
}

// ===== Internal Helpers =====

/**
 * Extract table name from SQL query (best effort).
 *
 * Purely for diagnostics; won't handle subqueries or quoted identifiers.
 */
function extractTableFromSql(sql: string | undefined): string | undefined {
  if (!sql) return undefined;

  // Match common patterns: FROM table, INTO table, UPDATE table
  const match = sql.match(/(?:FROM|INTO|UPDATE|JOIN)\s+(\w+)/i);
  return match?.[1];
}
