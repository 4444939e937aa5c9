/**
 * WHAT: Per-city mean temperature (the "normal" each reading is compared against).
 * WHY: First stage of the pipeline; variability and z-scores both need it.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { scaleFor } from "../../lib/numeric.js";
import type { CityBaseline, CityReading } from "./types.js";

type Accumulator = {
  count: number;
  min: number;
  max: number;
  scale: number;
  scaledSum: number;
};

/**
 * computeCityBaselines
 * WHAT: Group joined readings by city (exact, case-sensitive) and average temperature.
 * HOW: One pass for count and range, a second summing temperature / scale,
 *      where scale is a power of two near the city's largest |temperature|.
 *      Three readings of 1.7e308 would otherwise sum to Infinity.
 *
 * Cities with no readings never appear. When every reading of a city is the
 * same value, the mean is that value exactly: summing 0.1 three times and
 * dividing by 3 gives 0.10000000000000002, which would leave a tiny non-zero
 * spread for a city that has none.
 */
export function computeCityBaselines(rows: readonly CityReading[]): ReadonlyMap<string, CityBaseline> {
  const acc = new Map<string, Accumulator>();

  for (const row of rows) {
    const entry = acc.get(row.city);
    if (!entry) {
      acc.set(row.city, { count: 1, min: row.temperature, max: row.temperature, scale: 1, scaledSum: 0 });
      continue;
    }
    entry.count += 1;
    if (row.temperature < entry.min) entry.min = row.temperature;
    if (row.temperature > entry.max) entry.max = row.temperature;
  }

  for (const entry of acc.values()) {
    entry.scale = scaleFor(Math.max(Math.abs(entry.min), Math.abs(entry.max)));
  }

  for (const row of rows) {
    const entry = acc.get(row.city);
    if (entry) entry.scaledSum += row.temperature / entry.scale;
  }

  const baselines = new Map<string, CityBaseline>();
  for (const [city, entry] of acc) {
    baselines.set(city, {
      city,
      avg_temp: entry.min === entry.max ? entry.min : (entry.scaledSum / entry.count) * entry.scale,
      reading_count: entry.count,
    });
  }

  return baselines;
}
