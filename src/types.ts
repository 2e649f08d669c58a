/**
 * Shared types for snapshot listing and downloading
 */

export const MATCH_TYPES = ["exact", "prefix", "host", "domain"] as const;

/** CDX `matchType`: how the target URL is matched against captures */
export type MatchType = (typeof MATCH_TYPES)[number];

/** A single archived capture, as listed by the CDX API */
export interface SnapshotLocator {
  readonly timestamp: string;
  readonly originalUrl: string;
}

export interface SavedOutcome {
  status: "saved";
  locator: SnapshotLocator;
  path: string;
}

export interface FailedOutcome {
  status: "failed";
  locator: SnapshotLocator;
  cause: string;
}

export type DownloadOutcome = SavedOutcome | FailedOutcome;

export interface DownloadSummary {
  total: number;
  saved: number;
  failed: number;
  /** One entry per submitted locator, in input order */
  outcomes: DownloadOutcome[];
  failures: FailedOutcome[];
}
