/**
 * tests/features/anomalies/variability.test.ts
 * WHAT: Unit tests for per-city population standard deviation.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { computeCityBaselines } from "../../../src/features/anomalies/baseline.js";
import { computeCityStats } from "../../../src/features/anomalies/variability.js";
import type { CityReading } from "../../../src/features/anomalies/types.js";
import { cityRows } from "../../helpers.js";

function statsFor(rows: CityReading[]) {
  return computeCityStats(rows, computeCityBaselines(rows));
}

describe("computeCityStats", () => {
  it("uses divisor N (population, not sample)", () => {
    const stats = statsFor(cityRows("Denver", [10, 12, 14, 50])).get("Denver");

    expect(stats?.avg_temp).toBe(21.5);
    expect(stats?.reading_count).toBe(4);
    expect(stats?.std_dev).toBeCloseTo(Math.sqrt(272.75), 12);
    expect(stats?.std_dev).toBeCloseTo(16.52, 2);
  });

  it("gives 2 for the textbook population [2, 4, 4, 4, 5, 5, 7, 9]", () => {
    expect(statsFor(cityRows("X", [2, 4, 4, 4, 5, 5, 7, 9])).get("X")?.std_dev).toBe(2);
  });

  it("is zero for a single reading", () => {
    expect(statsFor(cityRows("Boise", [72.0])).get("Boise")?.std_dev).toBe(0);
  });

  it("is exactly zero when every reading is identical", () => {
    expect(statsFor(cityRows("Fog", [0.1, 0.1, 0.1])).get("Fog")?.std_dev).toBe(0);
    expect(statsFor(cityRows("Anchorage", [12, 12, 12])).get("Anchorage")?.std_dev).toBe(0);
  });

  it("is positive whenever readings differ", () => {
    const stats = statsFor([...cityRows("A", [1, 1, 1.0000001]), ...cityRows("B", [-5, 5])]);

    expect(stats.get("A")?.std_dev).toBeGreaterThan(0);
    expect(stats.get("B")?.std_dev).toBe(5);
  });

  it("is positive for tiny but different temperatures", () => {
    // 1e-200 squared underflows to 0 without rescaling
    const std = statsFor(cityRows("T", [0, 0, 0, 1e-200])).get("T")?.std_dev ?? 0;

    expect(std).toBeGreaterThan(0);
    expect(std / 1e-200).toBeCloseTo(Math.sqrt(3) / 4, 10);
  });

  it("stays finite and non-negative for temperatures near the double limit", () => {
    const stats = statsFor(cityRows("Hot", [1.7e308, 1.7e308, 1])).get("Hot");
    const std = stats?.std_dev ?? Number.NaN;

    expect(Number.isFinite(stats?.avg_temp)).toBe(true);
    expect(Number.isFinite(std)).toBe(true);
    expect(std / 1e308).toBeCloseTo((1.7 * Math.SQRT2) / 3, 10);
  });

  it("ignores rows whose city has no baseline", () => {
    const rows = cityRows("Denver", [10, 20]);
    const baselines = computeCityBaselines(rows);
    const stats = computeCityStats([...rows, ...cityRows("Ghost", [1000])], baselines);

    expect([...stats.keys()]).toEqual(["Denver"]);
    expect(stats.get("Denver")?.std_dev).toBe(5);
  });

  it("returns an empty map for no readings", () => {
    expect(statsFor([]).size).toBe(0);
  });
});
