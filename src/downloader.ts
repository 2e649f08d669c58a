/**
 * Concurrent snapshot downloading
 */

import path from "node:path";
import pLimit from "p-limit";
import { ConfigError, errorMessage } from "./errors.js";
import { DEFAULT_TIMEOUT_MS, fetchArchived } from "./network/fetch.js";
import type {
  DownloadOutcome,
  DownloadSummary,
  FailedOutcome,
  SnapshotLocator,
} from "./types.js";
import { writeSnapshot } from "./utils/filesystem.js";
import { archiveUrl, snapshotFilename } from "./utils/url.js";

export interface DownloadOptions {
  /** Maximum number of snapshots in flight at once */
  concurrency: number;
  timeoutMs?: number;
  /** Checked each time a slot is acquired; pending snapshots settle as cancelled */
  signal?: AbortSignal;
}

/**
 * Download every locator into outDir, at most `concurrency` at a time
 * Resolves once each locator has exactly one outcome; a failed snapshot
 * never rejects the batch
 */
export async function downloadSnapshots(
  locators: readonly SnapshotLocator[],
  outDir: string,
  options: DownloadOptions,
): Promise<DownloadSummary> {
  const { concurrency, timeoutMs = DEFAULT_TIMEOUT_MS, signal } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const limit = pLimit(concurrency);
  const total = locators.length;

  async function processSnapshot(
    locator: SnapshotLocator,
    index: number,
  ): Promise<DownloadOutcome> {
    const url = archiveUrl(locator);
    if (signal?.aborted) {
      return { status: "failed", locator, cause: "cancelled" };
    }

    console.log(`Downloading ${index + 1}/${total}: ${url}`);
    try {
      const body = await fetchArchived(url, timeoutMs);
      const file = await writeSnapshot(outDir, snapshotFilename(locator), body);
      console.log(`Saved: ${url} -> ${path.relative(outDir, file)}`);
      return { status: "saved", locator, path: file };
    } catch (err) {
      const cause = errorMessage(err);
      console.warn(`Skipping ${url}: ${cause}`);
      return { status: "failed", locator, cause };
    }
  }

  const outcomes = await Promise.all(
    locators.map((locator, i) => limit(() => processSnapshot(locator, i))),
  );

  const failures = outcomes.filter(
    (o): o is FailedOutcome => o.status === "failed",
  );
  return {
    total,
    saved: total - failures.length,
    failed: failures.length,
    outcomes,
    failures,
  };
}
