import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GatewayAnalysisService } from '../gateway-analysis-service.js';
import { AnalysisServiceError } from '../analysis-service.js';

const request = { prompt: 'Analyze this URL', context: 'url-analysis', timeoutMs: 1000 };

async function captureError(promise: Promise<unknown>): Promise<AnalysisServiceError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AnalysisServiceError) return error;
    throw error;
  }
  throw new Error('expected rejection');
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('GatewayAnalysisService', () => {
  const service = new GatewayAnalysisService('http://analysis.local:8080');

  beforeEach(() => {
    vi.clearAllMocks();
    global.fetch = vi.fn();
  });

  it('posts the prompt and context and returns the response', async () => {
    vi.mocked(fetch).mockResolvedValue(
      jsonResponse({ response: 'Looks healthy.', model: 'llama3', context: 'url-analysis', processing_time_ms: 812 }),
    );

    const result = await service.analyze(request);

    expect(result).toEqual({ text: 'Looks healthy.', model: 'llama3', processingTimeMs: 812 });
    expect(fetch).toHaveBeenCalledWith(
      'http://analysis.local:8080/api/analyze',
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify({ prompt: 'Analyze this URL', context: 'url-analysis' }),
      }),
    );
  });

  it('reports non-2xx statuses with the error detail', async () => {
    vi.mocked(fetch).mockResolvedValue(jsonResponse({ error: 'model not loaded' }, 500));

    const error = await captureError(service.analyze(request));

    expect(error.kind).toBe('status');
    expect(error.status).toBe(500);
    expect(error.message).toBe('Analysis API returned status 500: model not loaded');
  });

  it('uses the raw text when the error body is not JSON', async () => {
    vi.mocked(fetch).mockResolvedValue(new Response('Bad gateway', { status: 502 }));

    const error = await captureError(service.analyze(request));
    expect(error.message).toBe('Analysis API returned status 502: Bad gateway');
  });

  it('treats an error field in a 200 body as an API error', async () => {
    vi.mocked(fetch).mockResolvedValue(jsonResponse({ error: 'overloaded', details: 'queue full' }));

    const error = await captureError(service.analyze(request));

    expect(error.kind).toBe('api_error');
    expect(error.message).toBe('Analysis API error: overloaded');
  });

  it('rejects a body without a response', async () => {
    vi.mocked(fetch).mockResolvedValue(jsonResponse({ model: 'llama3' }));

    const error = await captureError(service.analyze(request));
    expect(error.kind).toBe('invalid_response');
  });

  it('rejects a non-JSON body', async () => {
    vi.mocked(fetch).mockResolvedValue(new Response('<html>', { status: 200 }));

    const error = await captureError(service.analyze(request));
    expect(error.kind).toBe('invalid_response');
  });

  it('reports connection failures', async () => {
    vi.mocked(fetch).mockRejectedValue(
      new TypeError('fetch failed', {
        cause: Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:8080'), { code: 'ECONNREFUSED' }),
      }),
    );

    const error = await captureError(service.analyze(request));

    expect(error.kind).toBe('connection');
    expect(error.message).toBe('Analysis API connection failed: connect ECONNREFUSED 127.0.0.1:8080');
  });

  it('times out a slow gateway', async () => {
    vi.mocked(fetch).mockImplementation(
      (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () =>
            reject(new DOMException('This operation was aborted', 'AbortError')),
          );
        }),
    );

    const error = await captureError(service.analyze({ ...request, timeoutMs: 10 }));

    expect(error.kind).toBe('timeout');
    expect(error.message).toBe('Analysis API timeout after 10ms');
  });
});
