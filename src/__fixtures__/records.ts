import type { DiagnosticRecord } from '../schemas/index.js';

// Healthy https record; tests override what they need
export function makeRecord(overrides: Partial<DiagnosticRecord> = {}): DiagnosticRecord {
  return {
    target: 'https://httpbin.org/status/200',
    hostname: 'httpbin.org',
    port: 443,
    scheme: 'https',
    probedAt: '2026-03-01T12:00:00.000Z',
    dns: { resolved: true, address: '10.1.2.3' },
    portReachable: { open: true },
    tls: { valid: true, subject: 'CN=httpbin.org', issuer: 'O=Test CA' },
    http: { statusCode: 200, statusText: 'OK', redirectCount: 0, finalUrl: 'https://httpbin.org/status/200' },
    latencyMs: 420,
    errors: [],
    ...overrides,
  };
}

export function makeHttpRecord(overrides: Partial<DiagnosticRecord> = {}): DiagnosticRecord {
  return makeRecord({
    target: 'http://example.com',
    hostname: 'example.com',
    port: 80,
    scheme: 'http',
    tls: null,
    http: { statusCode: 200, statusText: 'OK', redirectCount: 0, finalUrl: 'http://example.com' },
    ...overrides,
  });
}
