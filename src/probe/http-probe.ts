import { STATUS_CODES } from 'http';
import type { HttpOutcome } from '../schemas/index.js';
import { classifyConnectionError } from './classify-error.js';

export interface HttpProbeOptions {
  timeoutMs: number;
  maxRedirects: number;
}

export interface HttpProbeResult {
  outcome: HttpOutcome;
  // only set when a response was obtained
  latencyMs?: number;
  // message for the record's error list, absent on success
  error?: string;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export function reasonPhrase(response: Response): string {
  return response.statusText || STATUS_CODES[response.status] || 'Unknown';
}

/**
 * GET the URL following redirects by hand so the hop count is known.
 * The timeout covers the whole chain including the final body.
 */
export async function probeHttp(url: string, options: HttpProbeOptions): Promise<HttpProbeResult> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  const startedAt = performance.now();
  let current = url;
  let redirectCount = 0;

  try {
    for (;;) {
      const response = await fetch(current, {
        method: 'GET',
        redirect: 'manual',
        signal: controller.signal,
      });

      const location = response.headers.get('location');
      if (REDIRECT_STATUSES.has(response.status) && location) {
        await response.body?.cancel();
        if (redirectCount >= options.maxRedirects) {
          throw new Error(`Exceeded ${options.maxRedirects} redirects`);
        }
        redirectCount++;
        current = new URL(location, current).toString();
        continue;
      }

      await response.arrayBuffer();
      const latencyMs = performance.now() - startedAt;
      const statusText = reasonPhrase(response);
      const outcome: HttpOutcome = {
        statusCode: response.status,
        statusText,
        redirectCount,
        finalUrl: current,
      };

      return response.status >= 400
        ? { outcome, latencyMs, error: `HTTP Error ${response.status}: ${statusText}` }
        : { outcome, latencyMs };
    }
  } catch (error) {
    const info = classifyConnectionError(error);

    if (info.errorType === 'timeout') {
      return {
        outcome: { redirectCount, failureReason: 'Request timeout' },
        error: 'Request timed out',
      };
    }

    if (info.errorType === 'connection_refused' || info.errorType === 'dns_failed' || info.errorType === 'network_error') {
      return {
        outcome: { redirectCount, failureReason: 'Connection error' },
        error: `Connection error: ${info.reason}`,
      };
    }

    return {
      outcome: { redirectCount, failureReason: info.reason },
      error: `HTTP request failed: ${info.reason}`,
    };
  } finally {
    clearTimeout(timer);
  }
}
