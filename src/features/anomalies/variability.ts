/**
 * WHAT: Per-city population standard deviation of temperature.
 * WHY: Second stage; the z-score divisor.
 * DOCS: https://en.wikipedia.org/wiki/Standard_deviation#Population_standard_deviation
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { scaleFor } from "../../lib/numeric.js";
import type { CityBaseline, CityReading, CityStats } from "./types.js";

type Accumulator = {
  maxAbs: number;
  scale: number;
  scaledSumSq: number;
};

/**
 * computeCityStats
 * WHAT: sqrt(mean((t - avg)^2)) per city, re-joining each row to its baseline.
 *
 * Divisor is N, not N-1: the readings on hand are the whole population for
 * the city, not a sample of it. A single-reading city therefore gets 0.
 * Rows whose city has no baseline are ignored.
 *
 * Deviations are squared after dividing by a power of two near the city's
 * largest |temperature| and the root is scaled back. Squaring raw deviations
 * would turn 1e-200 into 0 (readings that differ, std_dev 0) and 1e200 into
 * Infinity.
 */
export function computeCityStats(
  rows: readonly CityReading[],
  baselines: ReadonlyMap<string, CityBaseline>
): ReadonlyMap<string, CityStats> {
  const acc = new Map<string, Accumulator>();

  for (const row of rows) {
    if (!baselines.has(row.city)) continue;
    const entry = acc.get(row.city);
    const magnitude = Math.abs(row.temperature);
    if (!entry) {
      acc.set(row.city, { maxAbs: magnitude, scale: 1, scaledSumSq: 0 });
    } else if (magnitude > entry.maxAbs) {
      entry.maxAbs = magnitude;
    }
  }

  for (const entry of acc.values()) {
    entry.scale = scaleFor(entry.maxAbs);
  }

  for (const row of rows) {
    const baseline = baselines.get(row.city);
    const entry = acc.get(row.city);
    if (!baseline || !entry) continue;

    const deviation = row.temperature / entry.scale - baseline.avg_temp / entry.scale;
    entry.scaledSumSq += deviation * deviation;
  }

  const stats = new Map<string, CityStats>();
  for (const baseline of baselines.values()) {
    const entry = acc.get(baseline.city);
    const stdDev = entry ? Math.sqrt(entry.scaledSumSq / baseline.reading_count) * entry.scale : 0;
    stats.set(baseline.city, {
      city: baseline.city,
      avg_temp: baseline.avg_temp,
      std_dev: stdDev,
      reading_count: baseline.reading_count,
    });
  }

  return stats;
}
