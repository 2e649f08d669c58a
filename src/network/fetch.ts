/**
 * Network fetch utilities
 */

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

/** Per-snapshot request timeout */
export const DEFAULT_TIMEOUT_MS = 15_000;

const BASE_REQUEST_HEADERS: Record<string, string> = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept:
    "text/html,application/xhtml+xml,application/xml;q=0.9,application/json;q=0.8,*/*;q=0.7",
  "Accept-Language": "en-US,en;q=0.9",
};

let requestHeaders: Record<string, string> = { ...BASE_REQUEST_HEADERS };

/**
 * Configure request settings
 */
export function configureRequests(options: { userAgent?: string }): void {
  requestHeaders = {
    ...BASE_REQUEST_HEADERS,
    "User-Agent": options.userAgent || DEFAULT_USER_AGENT,
  };
}

/**
 * Fetch once without retry, returns response even if not ok
 * The request is aborted once timeoutMs elapses
 */
export async function fetchOnce(
  url: string,
  timeoutMs = DEFAULT_TIMEOUT_MS,
): Promise<Response> {
  return fetch(url, {
    redirect: "follow",
    headers: { ...requestHeaders },
    signal: AbortSignal.timeout(timeoutMs),
  });
}

/**
 * Download an archived capture and return its body bytes
 * Throws on network errors, timeouts and non-2xx responses
 */
export async function fetchArchived(
  url: string,
  timeoutMs = DEFAULT_TIMEOUT_MS,
): Promise<Uint8Array> {
  const res = await fetchOnce(url, timeoutMs);
  if (!res.ok) {
    throw new Error(`HTTP ${res.status}`);
  }
  return new Uint8Array(await res.arrayBuffer());
}
