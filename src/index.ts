#!/usr/bin/env node
/**
 * wayback-dump
 *
 * A TypeScript CLI that saves every archived snapshot of a URL from the
 * Wayback Machine to a local folder.
 * - Lists captures through the CDX API (exact, prefix, host or domain match)
 * - Downloads them concurrently, at most --concurrency at a time
 * - Names files <timestamp>_<original url>.html
 * - Keeps going when single snapshots fail and lists them in failed_urls.txt
 *
 * Usage:
 *   npm run dev -- <url> [--output <dir>] [--matchType prefix] [--concurrency 5]
 *     [--timeoutMs 15000] [--userAgent <string>]
 *
 * Node >= 20 required (for global fetch and AbortSignal.timeout).
 */

import { runCLI } from "./cli.js";
import { errorMessage } from "./errors.js";

runCLI().catch((err) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
