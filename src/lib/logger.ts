/**
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * WHY: Centralizes structured logging to keep other modules clean.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - pino: https://getpino.io
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

/**
 * DSN pattern: Sentry DSNs embed auth tokens in URLs. We keep the host, redact the secret.
 */
const dsnRe = /(https?:\/\/)([^:@/]+):[^@]+@/gi;

// Sentry import warning flag - only warn once per process
let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on file contents, CLI input and
 * anything else that came from outside the process.
 * Truncates at 300 chars to prevent log flooding.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

function serializeError(e: unknown): Record<string, unknown> {
  if (e instanceof Error) {
    const code = "code" in e ? e.code : undefined;
    return { name: e.name, code, message: e.message, stack: e.stack };
  }
  return { message: String(e) };
}

/**
 * Log level defaults to "info" but can be overridden via LOG_LEVEL.
 * Pretty printing only on a TTY with LOG_PRETTY=true; everything else gets
 * newline-delimited JSON (or a file when LOG_FILE is set).
 *
 * Logs go to stderr (fd 2): stdout carries the report, which may be CSV or
 * JSON piped into another tool.
 */
const logLevel = process.env.LOG_LEVEL ?? "info";
const wantPretty = process.env.LOG_PRETTY === "true" && process.stderr.isTTY;

const transport: pino.TransportSingleOptions | undefined = wantPretty
  ? {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
        singleLine: false,
        destination: 2,
      },
    }
  : process.env.LOG_FILE
    ? {
        target: "pino/file",
        options: { destination: process.env.LOG_FILE, mkdir: true },
      }
    : undefined;

const loggerOptions: pino.LoggerOptions = {
  level: logLevel,
  ...(transport ? { transport } : {}),
  base: undefined, // Omit pid/hostname from JSON output
  // Only the useful fields of an error; SqliteError carries code, which we keep.
  serializers: {
    err: serializeError,
  },
  /**
   * Intercepts error-level logs and forwards the attached Error to Sentry.
   * Just use logger.error({ err }, "...") and it shows up there.
   */
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : firstArg && typeof firstArg === "object" && "err" in firstArg
              ? firstArg.err
              : undefined;

        if (errorCandidate instanceof Error) {
          const message = typeof args[1] === "string" ? args[1] : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // Dynamic import avoids the circular dep (sentry.ts logs through us).
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn("[logger] Failed to import Sentry module:", serializeError(importErr).message);
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
};

export const logger = transport ? pino(loggerOptions) : pino(loggerOptions, pino.destination({ dest: 2, sync: true }));
