/**
 * Run summary output
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { DownloadSummary, FailedOutcome } from "./types.js";
import { archiveUrl } from "./utils/url.js";

export const FAILURE_LOG = "failed_urls.txt";

export function formatSummary(summary: DownloadSummary): string {
  const lines = [
    `Attempted ${summary.total}: ${summary.saved} saved, ${summary.failed} failed`,
  ];
  for (const { locator, cause } of summary.failures) {
    lines.push(`  - ${locator.timestamp} ${locator.originalUrl}: ${cause}`);
  }
  return lines.join("\n");
}

/**
 * Write the archive URLs that failed, one per line, next to the snapshots
 * Returns the log path, or null when nothing failed
 */
export async function writeFailureLog(
  outDir: string,
  failures: readonly FailedOutcome[],
): Promise<string | null> {
  if (failures.length === 0) return null;
  const logFile = path.join(outDir, FAILURE_LOG);
  const content = failures.map((f) => archiveUrl(f.locator)).join("\n");
  await fs.writeFile(logFile, `${content}\n`, "utf8");
  return logFile;
}
