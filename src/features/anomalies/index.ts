/**
 * WHAT: Public surface of the anomaly detection feature.
 * USAGE:
 *  import { findAnomalies } from "weather-anomalies";
 *  const { anomalies } = findAnomalies({ readings, stations, locations }, { threshold: 2 });
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export * from "./types.js";
export { joinReadingsToCities } from "./join.js";
export { computeCityBaselines } from "./baseline.js";
export { computeCityStats } from "./variability.js";
export { detectAnomalies } from "./detector.js";
export { runAnomalyPipeline, findAnomalies } from "./pipeline.js";
export { loadWeatherDataset, loadCityReadings, findAnomaliesInDb } from "./queries.js";
export {
  SAMPLE_DATASET_PATH,
  weatherDatasetSchema,
  parseWeatherDataset,
  readDatasetFile,
  importWeatherDataset,
  clearWeatherDataset,
  type ImportCounts,
} from "./dataset.js";
export {
  formatAnomalyTable,
  formatCityStatsTable,
  anomaliesToCsv,
  cityStatsToCsv,
  anomaliesToJson,
  describeDeviation,
  renderReport,
  type RenderOptions,
} from "./report.js";
