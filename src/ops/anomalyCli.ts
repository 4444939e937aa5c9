/**
 * WHAT: CLI for temperature anomaly detection over the SQLite weather dataset
 * WHY: One command to load data, compute per-city statistics and print the outliers
 * HOW: Parse CLI args → open DB → ensure schema → optional import → detect → render
 * FLOWS:
 *   - --sample / --import <file>: load a JSON dataset first (--reset clears tables before)
 *   - default: detect with ANOMALY_THRESHOLD and print in REPORT_FORMAT
 * USAGE:
 *   weather-anomalies --sample --db :memory:
 *   weather-anomalies --threshold 2 --format csv > anomalies.csv
 *   weather-anomalies --import readings.json --stats
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { openDatabase, type Db } from "../db/db.js";
import { ensureWeatherSchema } from "../db/ensure.js";
import {
  SAMPLE_DATASET_PATH,
  clearWeatherDataset,
  importWeatherDataset,
  readDatasetFile,
} from "../features/anomalies/dataset.js";
import { findAnomaliesInDb } from "../features/anomalies/queries.js";
import { renderReport } from "../features/anomalies/report.js";
import { env, REPORT_FORMATS, type ReportFormat } from "../lib/env.js";
import { classifyError, errorContext, shouldReportToSentry, userFriendlyMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

// ============================================================================
// CLI Argument Parsing
// ============================================================================

export interface CLIArgs {
  db?: string;
  threshold?: number;
  format?: ReportFormat;
  importFile?: string;
  sample?: boolean;
  reset?: boolean;
  stats?: boolean;
  help?: boolean;
}

export type ParsedArgs = {
  args: CLIArgs;
  errors: string[];
};

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((f) => f === value);
}

/**
 * parseArgs
 * WHAT: process.argv → CLIArgs. argv[0] and argv[1] (node, script) are skipped.
 * Collects every problem instead of stopping at the first.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const args: CLIArgs = {};
  const errors: string[] = [];

  // Values may not start with "--": "--db --sample" means the path was forgotten.
  const takeValue = (i: number, flag: string): string | undefined => {
    const value = argv[i];
    if (value === undefined || value.startsWith("--")) {
      errors.push(`${flag} requires a value`);
      return undefined;
    }
    return value;
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case "--db": {
        const value = takeValue(i + 1, arg);
        if (value !== undefined) {
          args.db = value;
          i++;
        }
        break;
      }
      case "--threshold": {
        const value = takeValue(i + 1, arg);
        if (value === undefined) break;
        i++;
        const threshold = Number(value);
        if (value.trim() === "" || !Number.isFinite(threshold) || threshold < 0) {
          errors.push(`--threshold must be a number >= 0, got: ${value}`);
        } else {
          args.threshold = threshold;
        }
        break;
      }
      case "--format": {
        const value = takeValue(i + 1, arg);
        if (value === undefined) break;
        i++;
        if (isReportFormat(value)) {
          args.format = value;
        } else {
          errors.push(`--format must be one of ${REPORT_FORMATS.join(", ")}, got: ${value}`);
        }
        break;
      }
      case "--import": {
        const value = takeValue(i + 1, arg);
        if (value !== undefined) {
          args.importFile = value;
          i++;
        }
        break;
      }
      case "--sample":
        args.sample = true;
        break;
      case "--reset":
        args.reset = true;
        break;
      case "--stats":
        args.stats = true;
        break;
      case "--help":
      case "-h":
        args.help = true;
        break;
      default:
        errors.push(`Unknown argument: ${arg}`);
    }
  }

  return { args, errors };
}

export function helpText(): string {
  return `
Weather Anomalies: per-city temperature z-scores

USAGE:
  weather-anomalies [OPTIONS]

OPTIONS:
  --db <path>         SQLite database file (default: DB_PATH, ${env.DB_PATH})
  --threshold <n>     Report readings with |z| > n (default: ANOMALY_THRESHOLD, ${env.ANOMALY_THRESHOLD})
  --format <f>        table | csv | json (default: REPORT_FORMAT, ${env.REPORT_FORMAT})
  --import <file>     Import a JSON dataset before detecting
  --sample            Import the bundled sample dataset before detecting
  --reset             Clear locations, stations and readings before importing
  --stats             Also print per-city mean and standard deviation
  --help, -h          Show this help message

EXAMPLES:
  # Try it without touching any file
  weather-anomalies --db :memory: --sample --stats

  # Stricter cutoff, spreadsheet output
  weather-anomalies --threshold 2 --format csv > anomalies.csv

DATASET FORMAT:
  { "locations": [{ "location_id": 1, "city": "Denver" }],
    "stations":  [{ "station_id": 10, "location_id": 1 }],
    "readings":  [{ "reading_date": "2024-01-01", "station_id": 10, "temperature": 41.2 }] }

NOTES:
  - Readings whose station or location is unknown are ignored
  - Cities whose readings are all identical have no spread and never report anomalies
`;
}

// ============================================================================
// Run
// ============================================================================

/**
 * runCli
 * WHAT: Execute one CLI invocation. Returns the process exit code.
 * An empty report is success (0); usage and runtime errors are 1.
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  const { args, errors } = parseArgs(argv);

  if (errors.length > 0) {
    for (const e of errors) {
      console.error(`❌ ${e}`);
    }
    console.error(helpText());
    return 1;
  }

  if (args.help) {
    console.log(helpText());
    return 0;
  }

  const dbPath = args.db ?? env.DB_PATH;
  const threshold = args.threshold ?? env.ANOMALY_THRESHOLD;
  const format = args.format ?? env.REPORT_FORMAT;

  let db: Db | undefined;
  try {
    db = openDatabase(dbPath);
    ensureWeatherSchema(db);

    if (args.reset) {
      clearWeatherDataset(db);
    }
    if (args.sample) {
      importWeatherDataset(db, readDatasetFile(SAMPLE_DATASET_PATH));
    }
    if (args.importFile) {
      importWeatherDataset(db, readDatasetFile(args.importFile));
    }

    const result = findAnomaliesInDb(db, { threshold });
    console.log(renderReport(format, result, { threshold, includeStats: args.stats }));
    return 0;
  } catch (err) {
    const classified = classifyError(err);
    const context = errorContext(classified, { dbPath });

    // Error level (with err attached) is what forwards to Sentry; operator
    // mistakes stay at warn.
    if (shouldReportToSentry(classified)) {
      logger.error({ err, ...context }, "[cli] command failed");
    } else {
      logger.warn(context, "[cli] command rejected");
    }

    console.error(`❌ ${userFriendlyMessage(classified)}`);
    return 1;
  } finally {
    db?.close();
  }
}
