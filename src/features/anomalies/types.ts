/**
 * WHAT: Row and result shapes for city temperature anomaly detection.
 * WHY: Shared by the join, the three statistics stages, the SQLite loaders and the reports.
 *
 * Field names follow the SQLite columns (snake_case) so rows read from the
 * database need no renaming.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * Station and location identifiers. SQLite hands back integers; JSON
 * datasets may use strings. Equality is strict: 1 and "1" never join.
 */
export type RowKey = string | number;

export type Reading = {
  reading_date: string;
  station_id: RowKey;
  temperature: number;
};

export type Station = {
  station_id: RowKey;
  location_id: RowKey;
};

export type Location = {
  location_id: RowKey;
  city: string;
};

/**
 * The three input relations, as loaded from SQLite or a JSON dataset.
 */
export type WeatherDataset = {
  readings: readonly Reading[];
  stations: readonly Station[];
  locations: readonly Location[];
};

/**
 * One reading resolved through station → location to its city.
 * Produced once and shared by every stage.
 */
export type CityReading = {
  readonly reading_date: string;
  readonly station_id: RowKey;
  readonly city: string;
  readonly temperature: number;
};

export type CityBaseline = {
  readonly city: string;
  readonly avg_temp: number;
  readonly reading_count: number;
};

export type CityStats = {
  readonly city: string;
  readonly avg_temp: number;
  /** Population standard deviation (divisor N). */
  readonly std_dev: number;
  readonly reading_count: number;
};

export type AnomalyRecord = {
  readonly reading_date: string;
  readonly city: string;
  readonly temperature: number;
  readonly avg_temp: number;
  readonly std_dev: number;
  /** Rounded to 2 decimals. Filtering and ordering use the unrounded score. */
  readonly z_score: number;
};

export type DetectOptions = {
  /** |z| must be strictly greater than this. Default 1.0. */
  threshold?: number;
};

export type AnomalyPipelineResult = {
  baselines: ReadonlyMap<string, CityBaseline>;
  stats: ReadonlyMap<string, CityStats>;
  anomalies: readonly AnomalyRecord[];
};

export const DEFAULT_THRESHOLD = 1.0;
