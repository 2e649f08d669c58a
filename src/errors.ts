/**
 * Fatal error classes. Anything else raised while downloading a single
 * snapshot is recorded as a failed outcome instead.
 */

/** Invalid user input, raised before any network activity */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** The CDX index query failed or returned nothing to download */
export class IndexQueryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IndexQueryError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error && err.message ? err.message : String(err);
}
