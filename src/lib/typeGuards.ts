/**
 * WHAT: Type guards for values coming from outside the type system.
 * WHY: Caught errors, parsed JSON and SQLite rows arrive as `unknown`; these
 *      guards narrow them without `as any` casts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * Plain object check. Arrays count as records here, which is fine for the
 * property probing we do with it.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Read a string property from an unknown value, or undefined.
 */
export function stringProp(value: unknown, key: string): string | undefined {
  if (!isRecord(value)) return undefined;
  const prop = value[key];
  return typeof prop === "string" ? prop : undefined;
}

/**
 * Type guard for a finite JS number (rejects NaN and ±Infinity).
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}
