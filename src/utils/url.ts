/**
 * Wayback Machine URL and file naming utilities
 */

import { ConfigError } from "../errors.js";
import type { SnapshotLocator } from "../types.js";
import { safeFilename } from "./filesystem.js";

export const ARCHIVE_HOST = "https://web.archive.org";

const MAX_NAME_LENGTH = 150;

/**
 * URL under which the archive serves a capture
 */
export function archiveUrl(locator: SnapshotLocator): string {
  return `${ARCHIVE_HOST}/web/${locator.timestamp}/${locator.originalUrl}`;
}

/**
 * Derive the local file name for a capture: `<timestamp>_<original>.html`
 * Identical locators always map to the same name
 */
export function snapshotFilename(locator: SnapshotLocator): string {
  const stamp = safeFilename(locator.timestamp) || "unknown";
  const withoutScheme = locator.originalUrl.replace(/^[a-z][a-z0-9+.-]*:\/\//i, "");
  const name = safeFilename(withoutScheme).slice(0, MAX_NAME_LENGTH).replace(/_+$/, "");
  return name ? `${stamp}_${name}.html` : `${stamp}.html`;
}

/**
 * Validate the URL or bare host given on the command line
 * Returns the trimmed input, which is what the CDX API gets queried with
 */
export function normalizeTarget(input: string): string {
  const target = input.trim();
  if (!target || /\s/.test(target)) {
    throw new ConfigError(`Invalid URL: "${input}"`);
  }

  const hasScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(target);
  if (hasScheme && !/^https?:\/\//i.test(target)) {
    throw new ConfigError(`Unsupported URL scheme: "${input}"`);
  }

  let parsed: URL;
  try {
    parsed = new URL(hasScheme ? target : `http://${target}`);
  } catch {
    throw new ConfigError(`Invalid URL: "${input}"`);
  }
  if (!parsed.hostname) {
    throw new ConfigError(`Invalid URL: "${input}"`);
  }
  return target;
}
