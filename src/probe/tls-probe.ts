import { connect, type PeerCertificate } from 'tls';
import type { TlsOutcome } from '../schemas/index.js';
import { serverNameFor } from './target.js';

function formatName(name: PeerCertificate['subject'] | undefined): string | undefined {
  if (!name) return undefined;
  const parts = Object.entries(name)
    .filter(([, value]) => value !== undefined && value !== '')
    .map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? parts.join(', ') : undefined;
}

function toIso(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? value : date.toISOString();
}

export function describeCertificate(cert: PeerCertificate): Omit<TlsOutcome, 'valid' | 'failureReason'> {
  return {
    subject: formatName(cert.subject),
    issuer: formatName(cert.issuer),
    notBefore: toIso(cert.valid_from),
    notAfter: toIso(cert.valid_to),
  };
}

/**
 * TLS handshake with SNI and certificate verification.
 */
export function probeTls(host: string, port: number, timeoutMs: number): Promise<TlsOutcome> {
  return new Promise<TlsOutcome>((resolve) => {
    let settled = false;
    const socket = connect({
      host,
      port,
      servername: serverNameFor(host),
      rejectUnauthorized: true,
    });

    const finish = (outcome: TlsOutcome) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(outcome);
    };

    socket.setTimeout(timeoutMs);
    socket.once('secureConnect', () => {
      const cert = socket.getPeerCertificate();
      finish({ valid: true, ...describeCertificate(cert) });
    });
    socket.once('timeout', () =>
      finish({ valid: false, failureReason: `TLS handshake with ${host}:${port} timed out after ${timeoutMs}ms` }),
    );
    socket.once('error', (error: Error) => finish({ valid: false, failureReason: error.message }));
  });
}
