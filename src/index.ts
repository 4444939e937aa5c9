#!/usr/bin/env node
/**
 * WHAT: Process entrypoint for the weather-anomalies CLI.
 * FLOWS: init Sentry → runCli(process.argv) → flush Sentry → exit code
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, flushSentry } from "./lib/sentry.js";
import { runCli } from "./ops/anomalyCli.js";

initializeSentry();

const code = await runCli(process.argv);
await flushSentry();
process.exitCode = code;
