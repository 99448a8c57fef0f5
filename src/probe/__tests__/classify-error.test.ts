import { describe, it, expect } from 'vitest';
import { classifyConnectionError } from '../classify-error.js';

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('classifyConnectionError', () => {
  it('detects aborts as timeouts', () => {
    const error = new DOMException('This operation was aborted', 'AbortError');
    expect(classifyConnectionError(error).errorType).toBe('timeout');
  });

  it('reads the code from the fetch cause', () => {
    const error = new TypeError('fetch failed', {
      cause: withCode('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED'),
    });
    const info = classifyConnectionError(error);

    expect(info.errorType).toBe('connection_refused');
    expect(info.isConnectionError).toBe(true);
    expect(info.reason).toBe('connect ECONNREFUSED 127.0.0.1:443');
  });

  it('detects DNS failures', () => {
    const info = classifyConnectionError(withCode('getaddrinfo ENOTFOUND nope.invalid', 'ENOTFOUND'));
    expect(info.errorType).toBe('dns_failed');
  });

  it('detects certificate problems', () => {
    const info = classifyConnectionError(withCode('certificate has expired', 'CERT_HAS_EXPIRED'));
    expect(info.errorType).toBe('ssl_error');
  });

  it('detects resets as network errors', () => {
    const info = classifyConnectionError(withCode('read ECONNRESET', 'ECONNRESET'));
    expect(info.errorType).toBe('network_error');
  });

  it('falls back to unknown', () => {
    expect(classifyConnectionError(new Error('boom'))).toEqual({
      isConnectionError: false,
      errorType: 'unknown',
      reason: 'boom',
    });
    expect(classifyConnectionError(undefined).reason).toBe('Unknown error');
  });
});
