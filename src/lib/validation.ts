/**
 * WHAT: Input validation helpers for detection options and imported data.
 * WHY: Centralize validation so bad input is rejected before any statistics run.
 * FLOWS:
 *  - validateThreshold(value) → throws if not a finite number >= 0
 *  - formatIssues(issues) → one "path: message" line per zod issue
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ZodIssue } from "zod";
import { isFiniteNumber } from "./typeGuards.js";

/**
 * ValidationError
 * WHAT: Custom error class for validation failures.
 * WHY: Allows callers to distinguish validation errors from other errors.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * validateThreshold
 * WHAT: Validates a z-score cutoff.
 * WHY: NaN compares false against everything (silently empty report) and a
 *      negative cutoff flags every reading, so both are rejected up front.
 *
 * @throws ValidationError if the value is not a finite number >= 0
 *
 * @example
 * validateThreshold(1.5); // OK
 * validateThreshold(-1); // throws ValidationError
 */
export function validateThreshold(value: number, fieldName = "threshold"): void {
  if (!isFiniteNumber(value)) {
    throw new ValidationError(`${fieldName} must be a finite number, got: ${String(value)}`, fieldName);
  }

  if (value < 0) {
    throw new ValidationError(`${fieldName} must be >= 0, got: ${value}`, fieldName);
  }
}

/**
 * Flatten zod issues into readable lines, e.g. `readings.3.temperature: Expected number, received string`.
 */
export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("\n");
}
