import { setTimeout as delay } from 'node:timers/promises';
import { vi } from 'vitest';
import { CDX_ENDPOINT } from '../../src/network/cdx.js';

export interface ArchiveStubOptions {
  /** Raw CDX response body; defaults to an empty array */
  cdxBody?: string;
  cdxStatus?: number;
  /** Archive URLs answered with HTTP 500 */
  failing?: string[];
  delayMs?: number;
  onSnapshotRequest?: (url: string) => void;
}

/**
 * Replace global fetch with an in-process archive.
 * Tracks how many snapshot requests are in flight at once.
 */
export function stubArchive(options: ArchiveStubOptions = {}) {
  const failing = new Set(options.failing ?? []);
  let active = 0;
  let maxActive = 0;

  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const url = typeof input === 'string' ? input : input.toString();
    if (url.startsWith(CDX_ENDPOINT)) {
      return new Response(options.cdxBody ?? '[]', {
        status: options.cdxStatus ?? 200,
        headers: { 'content-type': 'application/json' },
      });
    }

    active++;
    maxActive = Math.max(maxActive, active);
    try {
      options.onSnapshotRequest?.(url);
      await delay(options.delayMs ?? 1);
      if (failing.has(url)) {
        return new Response('Internal Server Error', { status: 500 });
      }
      return new Response(`<html><body>${url}</body></html>`, {
        status: 200,
        headers: { 'content-type': 'text/html' },
      });
    } finally {
      active--;
    }
  });

  vi.stubGlobal('fetch', fetchMock);
  return {
    fetchMock,
    maxActive: () => maxActive,
    snapshotCalls: () =>
      fetchMock.mock.calls.map(([input]) => String(input)).filter((u) => !u.startsWith(CDX_ENDPOINT)),
  };
}

export const CDX_HEADER = ['urlkey', 'timestamp', 'original', 'mimetype', 'statuscode', 'digest', 'length'];

export function cdxBody(captures: Array<[timestamp: string, original: string]>): string {
  const rows = captures.map(([timestamp, original]) => [
    'com,example)/',
    timestamp,
    original,
    'text/html',
    '200',
    'DIGEST',
    '1024',
  ]);
  return JSON.stringify([CDX_HEADER, ...rows]);
}
