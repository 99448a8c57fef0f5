import type { DiagnosticRecord, DnsOutcome, HttpOutcome, PortOutcome, TlsOutcome } from '../schemas/index.js';
import type { ProbeTarget } from './target.js';

export interface ProbeOutcomes {
  target: ProbeTarget;
  probedAt: string;
  dns: DnsOutcome;
  portReachable: PortOutcome;
  tls: TlsOutcome | null;
  http: HttpOutcome;
  latencyMs?: number;
  // set by the HTTP probe; also covers status >= 400
  httpError?: string;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Assemble the record. Error order is fixed: DNS, port, TLS, HTTP.
 */
export function aggregate(outcomes: ProbeOutcomes): DiagnosticRecord {
  const { target, dns, portReachable, http } = outcomes;
  const tls = target.scheme === 'https' ? outcomes.tls : null;
  const errors: string[] = [];

  if (!dns.resolved) {
    errors.push(`DNS Resolution failed: ${dns.failureReason ?? 'unknown error'}`);
  }
  if (!portReachable.open) {
    errors.push(`Port connection failed: ${portReachable.failureReason ?? 'port closed or blocked'}`);
  }
  if (tls && !tls.valid) {
    errors.push(`SSL Certificate issue: ${tls.failureReason ?? 'unknown error'}`);
  }
  if (outcomes.httpError) {
    errors.push(outcomes.httpError);
  }

  const record: DiagnosticRecord = {
    target: target.target,
    hostname: target.hostname,
    port: target.port,
    scheme: target.scheme,
    probedAt: outcomes.probedAt,
    dns: { ...dns },
    portReachable: { ...portReachable },
    tls: tls ? { ...tls } : null,
    http: { ...http },
    errors,
  };

  // latency only exists for a completed request
  if (outcomes.latencyMs !== undefined && http.statusCode !== undefined) {
    record.latencyMs = outcomes.latencyMs;
  }

  return deepFreeze(record);
}

/**
 * Record for input that does not parse to a hostname. No probe runs.
 */
export function invalidTargetRecord(target: string, error: string, probedAt: string): DiagnosticRecord {
  const reason = 'not attempted: invalid URL';
  return deepFreeze({
    target,
    hostname: '',
    port: 0,
    scheme: '',
    probedAt,
    dns: { resolved: false, failureReason: reason },
    portReachable: { open: false, failureReason: reason },
    tls: null,
    http: { redirectCount: 0, failureReason: reason },
    errors: [error],
    inputError: error,
  });
}
