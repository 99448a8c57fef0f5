import { describe, it, expect, vi, beforeEach } from 'vitest';
import { probeHttp } from '../http-probe.js';

const options = { timeoutMs: 1000, maxRedirects: 30 };

describe('probeHttp', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    global.fetch = vi.fn();
  });

  it('records status, reason phrase and latency', async () => {
    vi.mocked(fetch).mockResolvedValue(new Response('ok', { status: 200 }));

    const result = await probeHttp('https://example.com', options);

    expect(result.outcome).toEqual({
      statusCode: 200,
      statusText: 'OK',
      redirectCount: 0,
      finalUrl: 'https://example.com',
    });
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
    expect(result.error).toBeUndefined();
  });

  it('follows redirects and counts hops', async () => {
    vi.mocked(fetch)
      .mockResolvedValueOnce(new Response(null, { status: 301, headers: { location: '/next' } }))
      .mockResolvedValueOnce(new Response(null, { status: 302, headers: { location: 'https://www.example.com/final' } }))
      .mockResolvedValueOnce(new Response('done', { status: 200, statusText: 'OK' }));

    const result = await probeHttp('https://example.com', options);

    expect(fetch).toHaveBeenNthCalledWith(2, 'https://example.com/next', expect.objectContaining({ redirect: 'manual' }));
    expect(result.outcome.redirectCount).toBe(2);
    expect(result.outcome.finalUrl).toBe('https://www.example.com/final');
  });

  it('stops after the redirect limit', async () => {
    vi.mocked(fetch).mockImplementation(async () => new Response(null, { status: 302, headers: { location: '/loop' } }));

    const result = await probeHttp('https://example.com', { timeoutMs: 1000, maxRedirects: 2 });

    expect(fetch).toHaveBeenCalledTimes(3);
    expect(result.error).toBe('HTTP request failed: Exceeded 2 redirects');
    expect(result.latencyMs).toBeUndefined();
  });

  it('adds an error for status >= 400 but keeps the latency', async () => {
    vi.mocked(fetch).mockResolvedValue(new Response('missing', { status: 404, statusText: 'Not Found' }));

    const result = await probeHttp('https://example.com/nope', options);

    expect(result.outcome.statusCode).toBe(404);
    expect(result.error).toBe('HTTP Error 404: Not Found');
    expect(result.latencyMs).toBeDefined();
  });

  it('reports a timeout', async () => {
    vi.mocked(fetch).mockImplementation(
      (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () =>
            reject(new DOMException('This operation was aborted', 'AbortError')),
          );
        }),
    );

    const result = await probeHttp('https://slow.example', { timeoutMs: 10, maxRedirects: 30 });

    expect(result).toEqual({
      outcome: { redirectCount: 0, failureReason: 'Request timeout' },
      error: 'Request timed out',
    });
  });

  it('reports a refused connection', async () => {
    vi.mocked(fetch).mockRejectedValue(
      new TypeError('fetch failed', {
        cause: Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' }),
      }),
    );

    const result = await probeHttp('https://127.0.0.1', options);

    expect(result.outcome.failureReason).toBe('Connection error');
    expect(result.error).toBe('Connection error: connect ECONNREFUSED 127.0.0.1:443');
  });
});
