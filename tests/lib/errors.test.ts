/**
 * tests/lib/errors.test.ts
 * WHAT: Tests for the error classification system.
 * WHY: The CLI picks its exit message, log level and Sentry decision from the
 *      classified kind, so each kind must be recognised reliably.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  classifyError,
  errorContext,
  isConstraintViolation,
  isDatabaseCorrupt,
  isRecoverable,
  shouldReportToSentry,
  userFriendlyMessage,
  type ClassifiedError,
} from "../../src/lib/errors.js";
import { ValidationError } from "../../src/lib/validation.js";

function sqliteError(code: string, message: string, sql?: string): Error {
  const err = Object.assign(new Error(message), { code, sql });
  err.name = "SqliteError";
  return err;
}

function ioError(code: string, path: string): Error {
  return Object.assign(new Error(`${code}: cannot open '${path}'`), { code, path });
}

// ===== classifyError Tests =====

describe("classifyError", () => {
  describe("null/undefined handling", () => {
    it("classifies null as unknown", () => {
      const result = classifyError(null);
      expect(result.kind).toBe("unknown");
      expect(result.message).toBe("Unknown error (null/undefined)");
    });

    it("classifies undefined as unknown", () => {
      expect(classifyError(undefined).message).toBe("Unknown error (null/undefined)");
    });
  });

  describe("SQLite error classification", () => {
    it("classifies SqliteError by name", () => {
      const result = classifyError(sqliteError("SQLITE_CONSTRAINT", "UNIQUE constraint failed"));

      expect(result).toMatchObject({
        kind: "db_error",
        code: "SQLITE_CONSTRAINT",
        message: "UNIQUE constraint failed",
      });
    });

    it("classifies error by SQLITE_ code prefix", () => {
      const err = Object.assign(new Error("database is locked"), { code: "SQLITE_BUSY" });
      expect(classifyError(err)).toMatchObject({ kind: "db_error", code: "SQLITE_BUSY" });
    });

    it("extracts the table from the failing SQL", () => {
      const result = classifyError(
        sqliteError("SQLITE_ERROR", "no such column: x", "SELECT x FROM weather_readings")
      );

      expect(result).toMatchObject({ kind: "db_error", table: "weather_readings" });
    });

    it("keeps the original error as cause", () => {
      const err = sqliteError("SQLITE_ERROR", "boom");
      expect(classifyError(err).cause).toBe(err);
    });
  });

  describe("validation and io", () => {
    it("classifies ValidationError with its field", () => {
      const result = classifyError(new ValidationError("threshold must be >= 0, got: -1", "threshold"));
      expect(result).toMatchObject({ kind: "validation", field: "threshold" });
    });

    it("defaults the field to input", () => {
      expect(classifyError(new ValidationError("bad"))).toMatchObject({ kind: "validation", field: "input" });
    });

    it("classifies filesystem errors by code", () => {
      const result = classifyError(ioError("ENOENT", "/tmp/missing.json"));
      expect(result).toMatchObject({ kind: "io", code: "ENOENT", path: "/tmp/missing.json" });
    });
  });

  it("falls back to unknown for anything else", () => {
    expect(classifyError(new TypeError("nope"))).toMatchObject({ kind: "unknown", message: "nope" });
    expect(classifyError("plain string")).toMatchObject({ kind: "unknown", message: "plain string" });
  });
});

// ===== Predicates =====

describe("predicates", () => {
  it("isRecoverable only for busy or locked databases", () => {
    expect(isRecoverable(classifyError(sqliteError("SQLITE_BUSY", "busy")))).toBe(true);
    expect(isRecoverable(classifyError(sqliteError("SQLITE_LOCKED", "locked")))).toBe(true);
    expect(isRecoverable(classifyError(sqliteError("SQLITE_CORRUPT", "corrupt")))).toBe(false);
    expect(isRecoverable(classifyError(new ValidationError("bad")))).toBe(false);
  });

  it("shouldReportToSentry skips operator mistakes", () => {
    expect(shouldReportToSentry(classifyError(new ValidationError("bad")))).toBe(false);
    expect(shouldReportToSentry(classifyError(ioError("EACCES", "/root/x")))).toBe(false);
    expect(shouldReportToSentry(classifyError(sqliteError("SQLITE_ERROR", "x")))).toBe(true);
    expect(shouldReportToSentry(classifyError(new Error("x")))).toBe(true);
  });

  it("isConstraintViolation matches constraint codes", () => {
    expect(isConstraintViolation(classifyError(sqliteError("SQLITE_CONSTRAINT_UNIQUE", "dup")))).toBe(true);
    expect(isConstraintViolation(classifyError(sqliteError("SQLITE_BUSY", "busy")))).toBe(false);
  });

  it("isDatabaseCorrupt matches corrupt and not-a-database", () => {
    expect(isDatabaseCorrupt(classifyError(sqliteError("SQLITE_NOTADB", "file is not a database")))).toBe(true);
    expect(isDatabaseCorrupt(classifyError(sqliteError("SQLITE_CORRUPT", "malformed")))).toBe(true);
  });
});

// ===== Context and messages =====

describe("errorContext", () => {
  it("adds kind-specific fields and extras", () => {
    const classified = classifyError(ioError("ENOENT", "/tmp/missing.json"));

    expect(errorContext(classified, { dbPath: ":memory:" })).toEqual({
      errorKind: "io",
      errorMessage: "ENOENT: cannot open '/tmp/missing.json'",
      dbPath: ":memory:",
      ioCode: "ENOENT",
      path: "/tmp/missing.json",
    });
  });

  it("truncates SQL to 100 characters", () => {
    const sql = `SELECT * FROM locations WHERE city = '${"x".repeat(200)}'`;
    const context = errorContext(classifyError(sqliteError("SQLITE_ERROR", "x", sql)));

    expect(context.sql).toBe(sql.slice(0, 100));
    expect(context.table).toBe("locations");
  });
});

describe("userFriendlyMessage", () => {
  const cases: Array<[string, ClassifiedError, string]> = [
    ["busy", { kind: "db_error", code: "SQLITE_BUSY", message: "x" }, "Database is temporarily busy. Please try again."],
    ["corrupt", { kind: "db_error", code: "SQLITE_NOTADB", message: "x" }, "The database file is corrupt or not a SQLite database."],
    ["constraint", { kind: "db_error", code: "SQLITE_CONSTRAINT", message: "x" }, "The import conflicts with existing data."],
    ["other db", { kind: "db_error", code: "SQLITE_ERROR", message: "x" }, "A database error occurred."],
    ["validation", { kind: "validation", field: "threshold", message: "must be >= 0" }, "Invalid threshold: must be >= 0"],
    ["missing file", { kind: "io", code: "ENOENT", path: "a.json", message: "x" }, "File not found: a.json"],
    ["no access", { kind: "io", code: "EACCES", path: "a.json", message: "x" }, "Cannot access a.json (EACCES)."],
    ["unknown", { kind: "unknown", message: "x" }, "An unexpected error occurred."],
  ];

  it.each(cases)("%s", (_label, classified, expected) => {
    expect(userFriendlyMessage(classified)).toBe(expected);
  });
});
