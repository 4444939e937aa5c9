/**
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on bad configuration; keep process.env access centralized.
 * FLOWS: load .env → trim → parse/validate → export typed env object
 * DOCS:
 *  - dotenv: https://github.com/motdotla/dotenv
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// Load .env from the working directory.
// override: true outside tests so .env wins over a stale shell environment;
// override: false in tests so values set before import are kept.
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

export const REPORT_FORMATS = ["table", "csv", "json"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

/**
 * Schema defines what's optional and what each default is. Nothing here is
 * required: a bare checkout runs against data/weather.db with a 1.0 cutoff.
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z.string().min(1).default("data/weather.db"),

  // z-score magnitude cutoff. Negative values would flag every reading.
  ANOMALY_THRESHOLD: z.coerce
    .number()
    .finite("ANOMALY_THRESHOLD must be a finite number")
    .min(0, "ANOMALY_THRESHOLD must be >= 0")
    .default(1),
  REPORT_FORMAT: z.enum(REPORT_FORMATS).default("table"),

  LOG_LEVEL: z.string().optional(),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Raw extraction with every value trimmed; empty strings count as unset so
 * defaults apply to `FOO=` lines in .env.
 */
function pickRaw(source: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const keys = Object.keys(envSchema.shape);
  const raw: Record<string, string | undefined> = {};
  for (const key of keys) {
    const value = source[key]?.trim();
    raw[key] = value ? value : undefined;
  }
  return raw;
}

/**
 * Validate an environment-shaped object. safeParse collects every issue at
 * once instead of stopping at the first.
 */
export function parseEnv(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(pickRaw(source));
}

const parsed = parseEnv(process.env);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env: Env = parsed.data;
