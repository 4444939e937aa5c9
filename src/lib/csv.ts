/**
 * WHAT: CSV helpers for report export.
 * WHY: Reports are piped into spreadsheets; fields must survive commas and quotes in city names.
 * DOCS:
 *  - RFC 4180 CSV: https://datatracker.ietf.org/doc/html/rfc4180
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export type CsvValue = string | number | null | undefined;

/**
 * escapeCsvField
 * WHAT: Escapes a field for CSV output per RFC 4180.
 * HOW: Wraps in quotes if contains comma/newline/quote; doubles internal quotes.
 *
 * @param value - Field value (may be null/undefined)
 * @returns Escaped CSV field
 */
export function escapeCsvField(value: CsvValue): string {
  if (value === null || value === undefined) {
    return "";
  }

  const str = String(value);

  if (str.includes(",") || str.includes("\n") || str.includes("\r") || str.includes('"')) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

/**
 * toCsv
 * WHAT: Header line plus one line per row.
 * Lines are joined with "\n"; no trailing newline.
 */
export function toCsv(header: readonly string[], rows: readonly (readonly CsvValue[])[]): string {
  const lines = rows.map((row) => row.map(escapeCsvField).join(","));
  return [header.map(escapeCsvField).join(","), ...lines].join("\n");
}
