/**
 * WHAT: Validate and import weather datasets (JSON) into SQLite.
 * WHY: The detector reads from the database; something has to put rows there.
 * FLOWS:
 *  - readDatasetFile(path) → JSON.parse → parseWeatherDataset → WeatherDataset
 *  - importWeatherDataset(db, dataset) → one transaction, upsert keys, append readings
 *  - clearWeatherDataset(db) → empty all three tables
 * DOCS:
 *  - better-sqlite3 transactions: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md#transactionfunction---function
 *  - SQLite UPSERT: https://sqlite.org/lang_UPSERT.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Db } from "../../db/db.js";
import { logger, redact } from "../../lib/logger.js";
import { ValidationError, formatIssues } from "../../lib/validation.js";
import type { WeatherDataset } from "./types.js";

/** Bundled demo dataset (data/sample-weather.json at the project root). */
export const SAMPLE_DATASET_PATH = fileURLToPath(new URL("../../../data/sample-weather.json", import.meta.url));

const rowKey = z.union([z.number().int(), z.string().min(1)]);

export const weatherDatasetSchema = z.object({
  locations: z
    .array(
      z.object({
        location_id: rowKey,
        city: z.string().min(1, "city cannot be empty"),
      })
    )
    .default([]),
  stations: z
    .array(
      z.object({
        station_id: rowKey,
        location_id: rowKey,
      })
    )
    .default([]),
  readings: z
    .array(
      z.object({
        reading_date: z.string().min(1, "reading_date cannot be empty"),
        station_id: rowKey,
        temperature: z.number().finite(),
      })
    )
    .default([]),
});

export type ImportCounts = {
  locations: number;
  stations: number;
  readings: number;
};

/**
 * parseWeatherDataset
 * WHAT: Validate an unknown value as a dataset.
 * @throws ValidationError (field "dataset") listing every issue
 */
export function parseWeatherDataset(value: unknown): WeatherDataset {
  const parsed = weatherDatasetSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`dataset is malformed:\n${formatIssues(parsed.error.issues)}`, "dataset");
  }
  return parsed.data;
}

/**
 * readDatasetFile
 * WHAT: Read, parse and validate a JSON dataset file.
 * Filesystem errors (ENOENT, EACCES) propagate unchanged for classifyError.
 */
export function readDatasetFile(filePath: string): WeatherDataset {
  const text = fs.readFileSync(filePath, "utf-8");

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`${filePath} is not valid JSON: ${redact(reason)}`, "dataset");
  }

  return parseWeatherDataset(value);
}

/**
 * importWeatherDataset
 * WHAT: Write a dataset in one transaction.
 * HOW: Locations and stations are upserted by key (re-importing a file
 *      updates them in place); readings are appended.
 */
export function importWeatherDataset(db: Db, dataset: WeatherDataset): ImportCounts {
  const upsertLocation = db.prepare(`
    INSERT INTO locations (location_id, city) VALUES (?, ?)
    ON CONFLICT(location_id) DO UPDATE SET city = excluded.city
  `);
  const upsertStation = db.prepare(`
    INSERT INTO weather_stations (station_id, location_id) VALUES (?, ?)
    ON CONFLICT(station_id) DO UPDATE SET location_id = excluded.location_id
  `);
  const insertReading = db.prepare(`
    INSERT INTO weather_readings (station_id, reading_date, temperature) VALUES (?, ?, ?)
  `);

  const run = db.transaction((data: WeatherDataset): ImportCounts => {
    for (const l of data.locations) upsertLocation.run(l.location_id, l.city);
    for (const s of data.stations) upsertStation.run(s.station_id, s.location_id);
    for (const r of data.readings) insertReading.run(r.station_id, r.reading_date, r.temperature);
    return {
      locations: data.locations.length,
      stations: data.stations.length,
      readings: data.readings.length,
    };
  });

  const counts = run(dataset);
  logger.info(counts, "[dataset] import completed");
  return counts;
}

/**
 * clearWeatherDataset
 * WHAT: Delete every input row (readings first, then the lookup tables).
 */
export function clearWeatherDataset(db: Db): void {
  db.transaction(() => {
    db.prepare(`DELETE FROM weather_readings`).run();
    db.prepare(`DELETE FROM weather_stations`).run();
    db.prepare(`DELETE FROM locations`).run();
  })();
  logger.info("[dataset] input tables cleared");
}
