import { describe, it, expect } from 'vitest';
import { normalizeTarget, parseTarget, serverNameFor } from '../target.js';

describe('normalizeTarget', () => {
  it('prefixes https:// when no scheme is given', () => {
    expect(normalizeTarget('example.com')).toBe('https://example.com');
    expect(normalizeTarget('  example.com/path ')).toBe('https://example.com/path');
  });

  it('keeps an explicit scheme', () => {
    expect(normalizeTarget('http://example.com')).toBe('http://example.com');
  });
});

describe('parseTarget', () => {
  it('uses the default port for the scheme', () => {
    const https = parseTarget('example.com');
    const http = parseTarget('http://example.com');

    expect(https).toEqual({
      ok: true,
      target: { target: 'https://example.com', hostname: 'example.com', host: 'example.com', port: 443, scheme: 'https' },
    });
    expect(http.ok && http.target.port).toBe(80);
  });

  it('keeps a declared port', () => {
    const parsed = parseTarget('http://localhost:8080/health');
    expect(parsed.ok && parsed.target.port).toBe(8080);
  });

  it('strips IPv6 brackets for the socket host', () => {
    const parsed = parseTarget('http://[::1]:3000');
    expect(parsed.ok && parsed.target.hostname).toBe('[::1]');
    expect(parsed.ok && parsed.target.host).toBe('::1');
  });

  it('reports unparseable input', () => {
    const parsed = parseTarget('http://');
    expect(parsed.ok).toBe(false);
    expect(!parsed.ok && parsed.error).toMatch(/^Invalid URL "http:\/\/"/);
  });
});

describe('serverNameFor', () => {
  it('omits SNI for IP literals', () => {
    expect(serverNameFor('10.0.0.1')).toBeUndefined();
    expect(serverNameFor('::1')).toBeUndefined();
    expect(serverNameFor('example.com')).toBe('example.com');
  });
});
