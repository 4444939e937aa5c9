/**
 * WHAT: Shared fixtures for anomaly tests.
 * WHY: Most tests need a small dataset or an in-memory database with the schema applied.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { openDatabase, MEMORY_DB_PATH, type Db } from "../src/db/db.js";
import { ensureWeatherSchema } from "../src/db/ensure.js";
import type { CityReading, WeatherDataset } from "../src/features/anomalies/types.js";

/**
 * Build joined rows for one city. Dates are 2024-01-01, 2024-01-02, ...
 */
export function cityRows(city: string, temperatures: readonly number[], stationId: number = 1): CityReading[] {
  return temperatures.map((temperature, i) => ({
    reading_date: `2024-01-${String(i + 1).padStart(2, "0")}`,
    station_id: stationId,
    city,
    temperature,
  }));
}

/**
 * Denver [10, 12, 14, 50] across two stations, plus a reading from an
 * unknown station and a station pointing at an unknown location.
 */
export function denverDataset(): WeatherDataset {
  return {
    locations: [{ location_id: 1, city: "Denver" }],
    stations: [
      { station_id: 10, location_id: 1 },
      { station_id: 11, location_id: 1 },
      { station_id: 12, location_id: 999 },
    ],
    readings: [
      { reading_date: "2024-01-01", station_id: 10, temperature: 10 },
      { reading_date: "2024-01-02", station_id: 10, temperature: 12 },
      { reading_date: "2024-01-03", station_id: 11, temperature: 14 },
      { reading_date: "2024-01-04", station_id: 11, temperature: 50 },
      { reading_date: "2024-01-05", station_id: 77, temperature: -40 },
      { reading_date: "2024-01-06", station_id: 12, temperature: 99 },
    ],
  };
}

export function createTestDb(): Db {
  const db = openDatabase(MEMORY_DB_PATH);
  ensureWeatherSchema(db);
  return db;
}
