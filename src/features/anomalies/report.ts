/**
 * WHAT: Render anomaly records and city statistics for humans and tools.
 * WHY: The CLI prints one of three formats; tests assert on exact strings.
 * FLOWS:
 *  - renderReport(format, result, opts) → table | csv | json
 *  - formatAnomalyTable / formatCityStatsTable → fixed-width columns
 *  - anomaliesToCsv / cityStatsToCsv → RFC 4180
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { toCsv } from "../../lib/csv.js";
import type { ReportFormat } from "../../lib/env.js";
import { formatFixed } from "../../lib/numeric.js";
import type { AnomalyPipelineResult, AnomalyRecord, CityStats } from "./types.js";

type Align = "left" | "right";

type Column<Row> = {
  header: string;
  width: number;
  align: Align;
  value: (row: Row) => string;
};

const SEPARATOR = "  ";

const ANOMALY_COLUMNS: Column<AnomalyRecord>[] = [
  { header: "reading_date", width: 15, align: "left", value: (r) => r.reading_date },
  { header: "city", width: 15, align: "left", value: (r) => r.city },
  { header: "temperature", width: 10, align: "right", value: (r) => String(r.temperature) },
  { header: "avg_temp", width: 10, align: "right", value: (r) => formatFixed(r.avg_temp) },
  { header: "std_dev", width: 10, align: "right", value: (r) => formatFixed(r.std_dev) },
  { header: "z_score", width: 10, align: "right", value: (r) => formatFixed(r.z_score) },
];

const CITY_COLUMNS: Column<CityStats>[] = [
  { header: "city", width: 15, align: "left", value: (s) => s.city },
  { header: "readings", width: 10, align: "right", value: (s) => String(s.reading_count) },
  { header: "avg_temp", width: 10, align: "right", value: (s) => formatFixed(s.avg_temp) },
  { header: "std_dev", width: 10, align: "right", value: (s) => formatFixed(s.std_dev) },
];

function fitCell(text: string, width: number, align: Align): string {
  const clipped = text.length > width ? text.slice(0, width) : text;
  return align === "left" ? clipped.padEnd(width) : clipped.padStart(width);
}

/**
 * Header, dashed rule, one line per row. Trailing spaces are trimmed.
 */
function renderColumns<Row>(columns: readonly Column<Row>[], rows: readonly Row[]): string {
  const header = columns.map((c) => fitCell(c.header, c.width, c.align)).join(SEPARATOR);
  const rule = columns.map((c) => "-".repeat(c.width)).join(SEPARATOR);
  const body = rows.map((row) => columns.map((c) => fitCell(c.value(row), c.width, c.align)).join(SEPARATOR));
  return [header, rule, ...body].map((line) => line.trimEnd()).join("\n");
}

function sortedByCity(stats: ReadonlyMap<string, CityStats>): CityStats[] {
  return [...stats.values()].sort((a, b) => (a.city < b.city ? -1 : a.city > b.city ? 1 : 0));
}

export function formatAnomalyTable(records: readonly AnomalyRecord[]): string {
  return renderColumns(ANOMALY_COLUMNS, records);
}

export function formatCityStatsTable(stats: ReadonlyMap<string, CityStats>): string {
  return renderColumns(CITY_COLUMNS, sortedByCity(stats));
}

export function anomaliesToCsv(records: readonly AnomalyRecord[]): string {
  return toCsv(
    ["reading_date", "city", "temperature", "avg_temp", "std_dev", "z_score"],
    records.map((r) => [r.reading_date, r.city, r.temperature, r.avg_temp, r.std_dev, r.z_score])
  );
}

export function cityStatsToCsv(stats: ReadonlyMap<string, CityStats>): string {
  return toCsv(
    ["city", "reading_count", "avg_temp", "std_dev"],
    sortedByCity(stats).map((s) => [s.city, s.reading_count, s.avg_temp, s.std_dev])
  );
}

export function anomaliesToJson(records: readonly AnomalyRecord[]): string {
  return JSON.stringify(records, null, 2);
}

/**
 * describeDeviation
 * WHAT: "1.73σ above average" / "0.58σ below average"
 * A score that rounds to zero reads "at average".
 */
export function describeDeviation(z: number): string {
  const magnitude = formatFixed(Math.abs(z));
  if (magnitude === "0.00") return "at average";
  return `${magnitude}σ ${z > 0 ? "above" : "below"} average`;
}

export type RenderOptions = {
  threshold: number;
  includeStats?: boolean;
};

function tableSummary(anomalies: readonly AnomalyRecord[], threshold: number): string {
  const noun = anomalies.length === 1 ? "anomaly" : "anomalies";
  const lines = [`${anomalies.length} ${noun} with |z| > ${formatFixed(threshold)}`];
  const top = anomalies[0];
  if (top) {
    lines.push(`most extreme: ${top.city} on ${top.reading_date}, ${describeDeviation(top.z_score)}`);
  }
  return lines.join("\n");
}

/**
 * renderReport
 * WHAT: Full CLI output for one run, in the requested format.
 *
 * json with includeStats wraps both lists in an object; without it, the
 * anomaly array is the whole document.
 */
export function renderReport(format: ReportFormat, result: AnomalyPipelineResult, opts: RenderOptions): string {
  switch (format) {
    case "table": {
      const sections = [formatAnomalyTable(result.anomalies), tableSummary(result.anomalies, opts.threshold)];
      if (opts.includeStats) sections.unshift(formatCityStatsTable(result.stats));
      return sections.join("\n\n");
    }

    case "csv": {
      const sections = [anomaliesToCsv(result.anomalies)];
      if (opts.includeStats) sections.unshift(cityStatsToCsv(result.stats));
      return sections.join("\n\n");
    }

    case "json":
      if (opts.includeStats) {
        return JSON.stringify(
          { threshold: opts.threshold, cities: sortedByCity(result.stats), anomalies: result.anomalies },
          null,
          2
        );
      }
      return anomaliesToJson(result.anomalies);
  }
}
