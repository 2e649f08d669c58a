/**
 * Wayback Machine CDX index queries
 */

import { errorMessage, IndexQueryError } from "../errors.js";
import { parseCdxRows } from "../parsers/cdx.js";
import type { MatchType, SnapshotLocator } from "../types.js";
import { ARCHIVE_HOST } from "../utils/url.js";
import { fetchOnce } from "./fetch.js";

export const CDX_ENDPOINT = `${ARCHIVE_HOST}/cdx/search/cdx`;

const INDEX_TIMEOUT_MS = 30_000;

/**
 * Build the CDX query URL; only captures the archive served with 200 are listed
 */
export function buildCdxQuery(target: string, matchType: MatchType): string {
  const query = new URL(CDX_ENDPOINT);
  query.searchParams.set("url", target);
  query.searchParams.set("matchType", matchType);
  query.searchParams.set("filter", "statuscode:200");
  query.searchParams.set("output", "json");
  return query.toString();
}

/**
 * List every archived capture of target
 * Any failure here is fatal for the run and raised as IndexQueryError
 */
export async function listSnapshots(
  target: string,
  matchType: MatchType,
  timeoutMs = INDEX_TIMEOUT_MS,
): Promise<SnapshotLocator[]> {
  const url = buildCdxQuery(target, matchType);

  let res: Response;
  try {
    res = await fetchOnce(url, timeoutMs);
  } catch (err) {
    throw new IndexQueryError(`Failed to fetch CDX API: ${errorMessage(err)}`, { cause: err });
  }
  if (!res.ok) {
    throw new IndexQueryError(`CDX API responded with HTTP ${res.status}`);
  }

  let data: unknown;
  try {
    const body = await res.text();
    // the API answers an empty body instead of [] for some queries
    data = body.trim() ? JSON.parse(body) : [];
  } catch (err) {
    throw new IndexQueryError(`Failed to parse CDX JSON: ${errorMessage(err)}`, { cause: err });
  }

  return parseCdxRows(data);
}
