import { describe, it, expect } from 'vitest';
import { aggregate } from '../aggregator.js';
import { DiagnosticRecordSchema } from '../../schemas/index.js';

const httpsTarget = {
  target: 'https://example.com',
  hostname: 'example.com',
  host: 'example.com',
  port: 443,
  scheme: 'https',
};

describe('aggregate', () => {
  it('counts a 4xx status as a failed probe', () => {
    const record = aggregate({
      target: httpsTarget,
      probedAt: '2026-01-01T00:00:00.000Z',
      dns: { resolved: true, address: '10.0.0.1' },
      portReachable: { open: true },
      tls: { valid: true },
      http: { statusCode: 503, statusText: 'Service Unavailable', redirectCount: 0 },
      latencyMs: 80,
      httpError: 'HTTP Error 503: Service Unavailable',
    });

    expect(record.errors).toEqual(['HTTP Error 503: Service Unavailable']);
    expect(record.latencyMs).toBe(80);
    expect(DiagnosticRecordSchema.safeParse(record).success).toBe(true);
  });

  it('drops TLS for non-https targets and latency without a response', () => {
    const record = aggregate({
      target: { ...httpsTarget, target: 'http://example.com', port: 80, scheme: 'http' },
      probedAt: '2026-01-01T00:00:00.000Z',
      dns: { resolved: true },
      portReachable: { open: false, failureReason: 'connect ECONNREFUSED 10.0.0.1:80' },
      tls: { valid: false, failureReason: 'ignored' },
      http: { redirectCount: 0, failureReason: 'Connection error' },
      latencyMs: 12,
      httpError: 'Connection error: connect ECONNREFUSED 10.0.0.1:80',
    });

    expect(record.tls).toBeNull();
    expect(record.latencyMs).toBeUndefined();
    expect(record.errors).toEqual([
      'Port connection failed: connect ECONNREFUSED 10.0.0.1:80',
      'Connection error: connect ECONNREFUSED 10.0.0.1:80',
    ]);
  });
});
