import { afterEach, describe, it, expect, vi } from 'vitest';
import { configureRequests, DEFAULT_USER_AGENT, fetchArchived, fetchOnce } from '../../src/network/fetch.js';

function headersOf(init: RequestInit | undefined): Record<string, string | ReadonlyArray<string>> {
  const headers = init?.headers;
  return headers && !Array.isArray(headers) && !(headers instanceof Headers) ? headers : {};
}

describe('fetchOnce', () => {
  afterEach(() => {
    configureRequests({});
  });

  it('should send the default user agent with a timeout signal', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response('ok'));
    vi.stubGlobal('fetch', fetchMock);

    await fetchOnce('https://web.archive.org/web/1/https://example.com/');

    const init = fetchMock.mock.calls[0]?.[1];
    expect(headersOf(init)['User-Agent']).toBe(DEFAULT_USER_AGENT);
    expect(init?.signal).toBeInstanceOf(AbortSignal);
    expect(init?.redirect).toBe('follow');
  });

  it('should use a configured user agent', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response('ok'));
    vi.stubGlobal('fetch', fetchMock);

    configureRequests({ userAgent: 'test-agent/1.0' });
    await fetchOnce('https://web.archive.org/');

    expect(headersOf(fetchMock.mock.calls[0]?.[1])['User-Agent']).toBe('test-agent/1.0');
  });

  it('should abort requests that exceed the timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('request timed out')));
          }),
      ),
    );

    await expect(fetchOnce('https://web.archive.org/', 5)).rejects.toThrow('request timed out');
  });
});

describe('fetchArchived', () => {
  it('should return the body bytes of a 2xx response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>snapshot</html>')));

    const body = await fetchArchived('https://web.archive.org/web/1/https://example.com/');
    expect(new TextDecoder().decode(body)).toBe('<html>snapshot</html>');
  });

  it('should throw on non-2xx responses', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('gone', { status: 404 })));

    await expect(fetchArchived('https://web.archive.org/web/1/https://example.com/')).rejects.toThrow('HTTP 404');
  });
});
