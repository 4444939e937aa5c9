/**
 * WHAT: The three-stage pipeline: baselines → variability → anomalies.
 * WHY: Each stage needs the previous one's complete output; this is the only place that orders them.
 * FLOWS:
 *  - runAnomalyPipeline(rows) → { baselines, stats, anomalies }
 *  - findAnomalies(dataset) → join once, then runAnomalyPipeline
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { validateThreshold } from "../../lib/validation.js";
import { computeCityBaselines } from "./baseline.js";
import { detectAnomalies } from "./detector.js";
import { joinReadingsToCities } from "./join.js";
import { DEFAULT_THRESHOLD } from "./types.js";
import type { AnomalyPipelineResult, CityReading, DetectOptions, WeatherDataset } from "./types.js";
import { computeCityStats } from "./variability.js";

/**
 * runAnomalyPipeline
 * WHAT: Compute every derived table from one joined relation.
 *
 * Pure and synchronous: same rows in, same result out. The threshold is
 * checked here, before any statistics run; detectAnomalies checks it again
 * because it is also exported and called on its own.
 * Empty input is not an error; all three outputs are empty.
 */
export function runAnomalyPipeline(
  rows: readonly CityReading[],
  options: DetectOptions = {}
): AnomalyPipelineResult {
  validateThreshold(options.threshold ?? DEFAULT_THRESHOLD);

  const baselines = computeCityBaselines(rows);
  const stats = computeCityStats(rows, baselines);
  const anomalies = detectAnomalies(rows, stats, options);

  return { baselines, stats, anomalies };
}

/**
 * findAnomalies
 * WHAT: Join raw relations to cities, then run the pipeline.
 */
export function findAnomalies(dataset: WeatherDataset, options: DetectOptions = {}): AnomalyPipelineResult {
  return runAnomalyPipeline(joinReadingsToCities(dataset), options);
}
