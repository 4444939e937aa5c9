/**
 * WHAT: Idempotent schema bootstrap for the three input relations.
 * WHY: A fresh database file must be importable and queryable without a migration step.
 * FLOWS:
 *  - CREATE TABLE IF NOT EXISTS locations / weather_stations / weather_readings → join indexes
 * DOCS:
 *  - SQLite CREATE TABLE: https://sqlite.org/lang_createtable.html
 *  - SQLite CREATE INDEX: https://sqlite.org/lang_createindex.html
 *
 * SAFETY:
 *  - Idempotent: safe to run on every start (IF NOT EXISTS)
 *  - No foreign keys: a reading may reference a station that isn't loaded
 *    yet (or ever); the join drops it instead of the insert failing
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { Db } from "./db.js";
import { logger } from "../lib/logger.js";

export const WEATHER_TABLES = ["locations", "weather_stations", "weather_readings"] as const;

export function tableExists(db: Db, tableName: string): boolean {
  const result = db
    .prepare(`SELECT name FROM sqlite_master WHERE type='table' AND name=?`)
    .get(tableName);
  return result !== undefined;
}

export function indexExists(db: Db, indexName: string): boolean {
  const result = db
    .prepare(`SELECT name FROM sqlite_master WHERE type='index' AND name=?`)
    .get(indexName);
  return result !== undefined;
}

/**
 * ensureWeatherSchema
 * WHAT: Create the input tables and join indexes if absent.
 *
 * Keys are declared without a type affinity beyond what the data brings:
 * station_id/location_id hold integers or text, matching JSON datasets that
 * use either. reading_id gives readings a stable order for tie-breaks.
 */
export function ensureWeatherSchema(db: Db): void {
  const missing = WEATHER_TABLES.filter((t) => !tableExists(db, t));

  db.exec(`
    CREATE TABLE IF NOT EXISTS locations (
      location_id  PRIMARY KEY NOT NULL,
      city         TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS weather_stations (
      station_id   PRIMARY KEY NOT NULL,
      location_id  NOT NULL
    );

    CREATE TABLE IF NOT EXISTS weather_readings (
      reading_id    INTEGER PRIMARY KEY AUTOINCREMENT,
      station_id    NOT NULL,
      reading_date  TEXT NOT NULL,
      temperature   REAL NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_weather_readings_station
      ON weather_readings(station_id);

    CREATE INDEX IF NOT EXISTS idx_weather_stations_location
      ON weather_stations(location_id);

    CREATE INDEX IF NOT EXISTS idx_locations_city
      ON locations(city);
  `);

  if (missing.length > 0) {
    logger.info({ created: missing }, "[ensure] weather tables created");
  }
}
