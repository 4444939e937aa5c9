/**
 * WHAT: Score every reading against its city's statistics and keep the outliers.
 * WHY: Third stage; the report is this list.
 * FLOWS: validate threshold → z per reading → |z| > threshold → sort by |z| desc → round
 * DOCS: https://en.wikipedia.org/wiki/Standard_score
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { roundHalfUp } from "../../lib/numeric.js";
import { validateThreshold } from "../../lib/validation.js";
import { DEFAULT_THRESHOLD } from "./types.js";
import type { AnomalyRecord, CityReading, CityStats, DetectOptions } from "./types.js";

type Scored = {
  record: AnomalyRecord;
  magnitude: number;
};

/**
 * detectAnomalies
 * WHAT: Readings whose |z| exceeds the threshold, most extreme first.
 *
 * Zero variance: a city whose readings are all identical has std_dev 0 and
 * nothing to deviate from. Its readings are skipped entirely: no division,
 * no NaN or Infinity, no rows, at any threshold.
 *
 * The threshold test and the sort use the full-precision score. Only the
 * reported z_score is rounded, so 1.004 is kept at threshold 1.0 even though
 * it prints as 1.00.
 *
 * Ties keep input order (Array.prototype.sort is stable).
 *
 * @throws ValidationError when threshold is not a finite number >= 0
 */
export function detectAnomalies(
  rows: readonly CityReading[],
  stats: ReadonlyMap<string, CityStats>,
  options: DetectOptions = {}
): AnomalyRecord[] {
  const threshold = options.threshold ?? DEFAULT_THRESHOLD;
  validateThreshold(threshold);

  const flagged: Scored[] = [];
  const zeroVarianceCities = new Set<string>();

  for (const row of rows) {
    const cityStats = stats.get(row.city);
    if (!cityStats) continue;

    if (cityStats.std_dev === 0) {
      zeroVarianceCities.add(row.city);
      continue;
    }

    let z = (row.temperature - cityStats.avg_temp) / cityStats.std_dev;
    // 1.5e308 - (-1e308) overflows; dividing first keeps both terms finite.
    if (!Number.isFinite(z)) {
      z = row.temperature / cityStats.std_dev - cityStats.avg_temp / cityStats.std_dev;
    }
    const magnitude = Math.abs(z);
    if (!(magnitude > threshold)) continue;

    flagged.push({
      magnitude,
      record: {
        reading_date: row.reading_date,
        city: row.city,
        temperature: row.temperature,
        avg_temp: cityStats.avg_temp,
        std_dev: cityStats.std_dev,
        z_score: roundHalfUp(z, 2),
      },
    });
  }

  if (zeroVarianceCities.size > 0) {
    logger.debug(
      { cities: [...zeroVarianceCities] },
      "[anomalies] skipped cities with zero variance"
    );
  }

  flagged.sort((a, b) => b.magnitude - a.magnitude);
  return flagged.map((s) => s.record);
}
