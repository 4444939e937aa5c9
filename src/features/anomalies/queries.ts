/**
 * WHAT: SQLite reads for anomaly detection.
 * WHY: The pipeline is pure; this is where the input relations come from.
 * FLOWS:
 *  - loadWeatherDataset → the three raw relations, in insertion order
 *  - loadCityReadings → the shared reading → station → location join, done by SQLite
 *  - findAnomaliesInDb → loadCityReadings + runAnomalyPipeline, logged
 * DOCS:
 *  - better-sqlite3: https://github.com/WiseLibs/better-sqlite3
 *  - SQLite SELECT / JOIN: https://sqlite.org/lang_select.html
 *
 * NOTE: All queries use prepared statements. Nothing here writes.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Db } from "../../db/db.js";
import { logger } from "../../lib/logger.js";
import { runAnomalyPipeline } from "./pipeline.js";
import type {
  AnomalyPipelineResult,
  CityReading,
  DetectOptions,
  Location,
  Reading,
  Station,
  WeatherDataset,
} from "./types.js";

/**
 * loadWeatherDataset
 * WHAT: Raw relations, for the in-memory join or for export.
 */
export function loadWeatherDataset(db: Db): WeatherDataset {
  const readings = db
    .prepare<[], Reading>(
      `SELECT reading_date, station_id, temperature FROM weather_readings ORDER BY reading_id`
    )
    .all();
  const stations = db
    .prepare<[], Station>(`SELECT station_id, location_id FROM weather_stations ORDER BY rowid`)
    .all();
  const locations = db
    .prepare<[], Location>(`SELECT location_id, city FROM locations ORDER BY rowid`)
    .all();

  return { readings, stations, locations };
}

/**
 * loadCityReadings
 * WHAT: The flat (reading, city) relation every stage consumes.
 * HOW: Two inner joins; readings without a station, or stations without a
 *      location, fall out of the result. Ordered by reading_id so ties in the
 *      report are broken by insertion order.
 *
 * Returns the same rows as joinReadingsToCities(loadWeatherDataset(db)).
 */
export function loadCityReadings(db: Db): CityReading[] {
  const start = Date.now();

  try {
    const rows = db
      .prepare<[], CityReading>(
        `
        SELECT
          wr.reading_date,
          wr.station_id,
          l.city,
          wr.temperature
        FROM weather_readings wr
        JOIN weather_stations ws ON wr.station_id = ws.station_id
        JOIN locations l ON ws.location_id = l.location_id
        ORDER BY wr.reading_id
      `
      )
      .all();

    logger.debug({ rows: rows.length, ms: Date.now() - start }, "[anomalies] city readings loaded");
    return rows;
  } catch (err) {
    logger.error({ err }, "[anomalies] failed to load city readings");
    throw err;
  }
}

/**
 * findAnomaliesInDb
 * WHAT: Full batch over the database contents.
 */
export function findAnomaliesInDb(db: Db, options: DetectOptions = {}): AnomalyPipelineResult {
  const start = Date.now();
  const rows = loadCityReadings(db);
  const result = runAnomalyPipeline(rows, options);

  logger.info(
    {
      readings: rows.length,
      cities: result.stats.size,
      anomalies: result.anomalies.length,
      threshold: options.threshold,
      ms: Date.now() - start,
    },
    "[anomalies] detection completed"
  );

  return result;
}
