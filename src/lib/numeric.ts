/**
 * WHAT: Rounding and number formatting for reported statistics
 * WHY: Reported z-scores are rounded to 2 decimals; comparisons never are
 * DOCS: https://en.wikipedia.org/wiki/Rounding#Rounding_half_away_from_zero
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * Round half away from zero to `decimals` places (SQLite ROUND semantics).
 *
 * Binary floats store 1.005 as 1.00499999999999989..., so a plain
 * Math.round(x * 100) gives 1.00. Scaling by (1 + EPSILON) nudges values that
 * are a representation error away from the half back onto it. The result
 * never differs from the input by more than half a unit in the last place.
 *
 * @example
 * roundHalfUp(1.005) // 1.01
 * roundHalfUp(-1.725) // -1.73
 */
export function roundHalfUp(value: number, decimals = 2): number {
  if (!Number.isFinite(value)) return value;

  const factor = 10 ** decimals;
  const magnitude = Math.round(Math.abs(value) * factor * (1 + Number.EPSILON)) / factor;

  // Avoid -0 for tiny negatives; -0 and 0 print the same but compare differently in tests.
  return value < 0 && magnitude !== 0 ? -magnitude : magnitude;
}

/**
 * Fixed-point string for report columns. Non-finite values print as-is.
 */
export function formatFixed(value: number, decimals = 2): string {
  if (!Number.isFinite(value)) return String(value);
  return roundHalfUp(value, decimals).toFixed(decimals);
}

/**
 * Power of two close to `magnitude`. Dividing a group of values by it brings
 * them into roughly [-2, 2] before summing or squaring, so sums of values near
 * Number.MAX_VALUE stay finite and squares of values near the subnormal range
 * stay non-zero.
 *
 * Scaling by a power of two is exact outside the subnormal range, so sums and
 * square roots of ordinary values come out bit-for-bit the same as unscaled.
 * Returns 1 for 0 and non-finite input.
 */
export function scaleFor(magnitude: number): number {
  if (!(magnitude > 0) || !Number.isFinite(magnitude)) return 1;

  // log2(MAX_VALUE) rounds to 1024, and 2 ** 1024 is Infinity
  const exponent = Math.min(1023, Math.max(-1074, Math.floor(Math.log2(magnitude))));
  return 2 ** exponent;
}
