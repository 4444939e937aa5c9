/**
 * WHAT: Sentry bootstrap and small helpers for capture.
 * WHY: Centralizes error tracking with safe shutdown and guardrails when DSN is invalid.
 * FLOWS: initializeSentry() → isSentryEnabled → captureException → flushSentry before exit
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import fs from "node:fs";
import path from "node:path";
import { env } from "./env.js";
import { logger } from "./logger.js";
import { isRecord, stringProp } from "./typeGuards.js";

let sentryEnabled = false;

export function hasValidDsn(dsn: string | undefined): dsn is string {
  // Sentry DSN format: https://{key}@{org}.ingest.sentry.io/{project}
  // Structure only; no network round trip.
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 && // This is the Sentry key
      parsed.pathname.length > 1 // Project ID in path
    );
  } catch {
    return false;
  }
}

// Version from package.json for release tracking
function getVersion(): string {
  try {
    const packagePath = path.join(process.cwd(), "package.json");
    const packageJson: unknown = JSON.parse(fs.readFileSync(packagePath, "utf-8"));
    return stringProp(packageJson, "version") ?? "unknown";
  } catch {
    return "unknown";
  }
}

/**
 * Initialize Sentry error tracking.
 * Only activates if SENTRY_DSN is provided and not running under Vitest.
 */
export function initializeSentry(): void {
  if (process.env.VITEST_WORKER_ID) {
    return;
  }

  if (!hasValidDsn(env.SENTRY_DSN)) {
    logger.debug("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: env.SENTRY_DSN,
      environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV,
      release: `weather-anomalies@${getVersion()}`,
      tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,

      // Scrub the DSN if it ever ends up in a captured environment
      beforeSend(event) {
        const runtime: unknown = event.contexts?.["runtime"];
        const runtimeEnv = isRecord(runtime) ? runtime.env : undefined;
        if (isRecord(runtimeEnv) && runtimeEnv.SENTRY_DSN) {
          runtimeEnv.SENTRY_DSN = "[REDACTED]";
        }
        return event;
      },

      debug: env.NODE_ENV === "development",
    });

    sentryEnabled = true;
    logger.info({ environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV }, "Sentry initialized");
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

/**
 * Capture an exception in Sentry. Returns the event id, or null when disabled.
 */
export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

/**
 * Flush any pending events (use before exit)
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;

  try {
    return await Sentry.close(timeout);
  } catch (err) {
    logger.error({ err }, "Failed to flush Sentry events");
    return false;
  }
}
