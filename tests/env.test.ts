/**
 * WHAT: Proves the zod environment schema applies defaults and rejects bad values.
 * HOW: Calls parseEnv with hand-built environments; process.env is never touched.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { parseEnv } from "../src/lib/env.js";

describe("Environment Validation", () => {
  /** Nothing is required: a bare environment yields every default. */
  it("applies defaults to an empty environment", () => {
    const result = parseEnv({});

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toMatchObject({
        NODE_ENV: "development",
        DB_PATH: "data/weather.db",
        ANOMALY_THRESHOLD: 1,
        REPORT_FORMAT: "table",
        SENTRY_TRACES_SAMPLE_RATE: 0.1,
      });
      expect(result.data.SENTRY_DSN).toBeUndefined();
    }
  });

  it("coerces numeric strings", () => {
    const result = parseEnv({ ANOMALY_THRESHOLD: "2.5", SENTRY_TRACES_SAMPLE_RATE: "1" });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.ANOMALY_THRESHOLD).toBe(2.5);
      expect(result.data.SENTRY_TRACES_SAMPLE_RATE).toBe(1);
    }
  });

  /** `FOO=` lines in .env should behave like unset variables. */
  it("treats blank values as unset", () => {
    const result = parseEnv({ DB_PATH: "   ", ANOMALY_THRESHOLD: "" });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.DB_PATH).toBe("data/weather.db");
      expect(result.data.ANOMALY_THRESHOLD).toBe(1);
    }
  });

  it("trims surrounding whitespace", () => {
    const result = parseEnv({ REPORT_FORMAT: " csv " });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.REPORT_FORMAT).toBe("csv");
    }
  });

  it("rejects a negative threshold", () => {
    const result = parseEnv({ ANOMALY_THRESHOLD: "-1" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("ANOMALY_THRESHOLD must be >= 0");
    }
  });

  it("rejects a non-numeric threshold", () => {
    expect(parseEnv({ ANOMALY_THRESHOLD: "high" }).success).toBe(false);
  });

  it("rejects an unknown report format", () => {
    const result = parseEnv({ REPORT_FORMAT: "xml" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["REPORT_FORMAT"]);
    }
  });

  it("rejects a sample rate above 1", () => {
    expect(parseEnv({ SENTRY_TRACES_SAMPLE_RATE: "1.5" }).success).toBe(false);
  });

  it("rejects an unknown NODE_ENV", () => {
    expect(parseEnv({ NODE_ENV: "staging" }).success).toBe(false);
  });
});
