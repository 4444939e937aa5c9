/**
 * WHAT: SQLite connection bootstrap for the weather dataset.
 * WHY: Centralizes better‑sqlite3 setup and PRAGMAs so consumers just call openDatabase().
 * FLOWS:
 *  - Open DB → set PRAGMAs → optional statement tracing → caller runs ensureWeatherSchema
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better‑sqlite3 is synchronous by design; the whole pipeline is one batch.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { logger } from "../lib/logger.js";

export type Db = Database.Database;

const DB_BUSY_TIMEOUT_MS = 5000;
export const MEMORY_DB_PATH = ":memory:";

/**
 * openDatabase
 * WHAT: Open (or create) a SQLite file, or an in-memory database for ":memory:".
 *
 * DB_TRACE=1 logs every statement at debug level through better-sqlite3's
 * verbose hook.
 */
export function openDatabase(dbPath: string): Db {
  const inMemory = dbPath === MEMORY_DB_PATH;
  if (!inMemory) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const dbTraceEnabled = process.env.DB_TRACE === "1";
  const db = new Database(dbPath, {
    fileMustExist: false,
    verbose: dbTraceEnabled
      ? (message?: unknown) => logger.debug({ evt: "db_call", sql: String(message) }, "db call")
      : undefined,
  });

  // WAL journaling lets a reader run while an import writes (no-op for :memory:)
  if (!inMemory) {
    db.pragma("journal_mode = WAL");
  }
  // Reduce fsync frequency vs FULL
  db.pragma("synchronous = NORMAL");
  // Busy timeout to wait out brief contention rather than throwing immediately
  db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);

  logger.info({ dbPath, dbTraceEnabled }, "SQLite opened");
  return db;
}
