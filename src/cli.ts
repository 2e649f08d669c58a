/**
 * Command-line entry: list captures, download them, report
 */

import path from "node:path";
import { downloadSnapshots } from "./downloader.js";
import { errorMessage, IndexQueryError } from "./errors.js";
import { listSnapshots } from "./network/cdx.js";
import { configureRequests } from "./network/fetch.js";
import { parseOptions } from "./options.js";
import { FAILURE_LOG, formatSummary, writeFailureLog } from "./report.js";
import type { DownloadSummary } from "./types.js";
import { ensureDir } from "./utils/filesystem.js";

/**
 * Parse CLI arguments and run the download
 * Rejects only for configuration and index query errors
 */
export async function runCLI(
  args: readonly string[] = process.argv.slice(2),
): Promise<DownloadSummary> {
  const options = parseOptions(args);
  configureRequests({ userAgent: options.userAgent });

  console.log(`Fetching archived URLs for ${options.target} using CDX API`);
  const snapshots = await listSnapshots(options.target, options.matchType);
  if (snapshots.length === 0) {
    throw new IndexQueryError(`No snapshots found for ${options.target}`);
  }
  console.log(`Found ${snapshots.length} archived URLs.`);

  const outDir = path.resolve(process.cwd(), options.outDir);
  await ensureDir(outDir);
  console.log(`Saving to ${outDir}\n`);

  // Ctrl+C lets in-flight downloads finish and cancels the rest
  const controller = new AbortController();
  const onInterrupt = () => {
    console.warn("\nInterrupted. Cancelling pending downloads...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  let summary: DownloadSummary;
  try {
    summary = await downloadSnapshots(snapshots, outDir, {
      concurrency: options.concurrency,
      timeoutMs: options.timeoutMs,
      signal: controller.signal,
    });
  } finally {
    process.off("SIGINT", onInterrupt);
  }

  console.log(`\n${formatSummary(summary)}`);
  // the batch is done; a log that cannot be written does not fail the run
  try {
    const logFile = await writeFailureLog(outDir, summary.failures);
    if (logFile) {
      console.log(`Some URLs failed to download. Check ${logFile} for details.`);
    }
  } catch (err) {
    console.warn(`Could not write ${FAILURE_LOG}: ${errorMessage(err)}`);
  }
  return summary;
}
