import { isIP } from 'net';

export interface ProbeTarget {
  target: string;
  hostname: string;
  // hostname without IPv6 brackets, usable for sockets and lookups
  host: string;
  port: number;
  scheme: string;
}

export type ParsedTarget =
  | { ok: true; target: ProbeTarget }
  | { ok: false; target: string; error: string };

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Prefix `https://` when the input carries no scheme.
 */
export function normalizeTarget(input: string): string {
  const trimmed = input.trim();
  return SCHEME_PATTERN.test(trimmed) ? trimmed : `https://${trimmed}`;
}

export function defaultPort(scheme: string): number {
  return scheme === 'https' ? 443 : 80;
}

export function parseTarget(input: string): ParsedTarget {
  const target = normalizeTarget(input);

  let url: URL;
  try {
    url = new URL(target);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, target, error: `Invalid URL "${input}": ${reason}` };
  }

  if (!url.hostname) {
    return { ok: false, target, error: `Invalid URL "${input}": no hostname` };
  }

  const scheme = url.protocol.replace(/:$/, '').toLowerCase();
  const host = url.hostname.replace(/^\[(.*)\]$/, '$1');

  return {
    ok: true,
    target: {
      target,
      hostname: url.hostname,
      host,
      port: url.port ? Number(url.port) : defaultPort(scheme),
      scheme,
    },
  };
}

/**
 * SNI must not be an IP literal.
 */
export function serverNameFor(host: string): string | undefined {
  return isIP(host) === 0 ? host : undefined;
}
