import type { DiagnosticRecord } from '../schemas/index.js';
import type { ProbeConfig } from '../config/index.js';
import { DEFAULT_PROBE_CONFIG } from '../config/index.js';
import { aggregate, invalidTargetRecord } from './aggregator.js';
import { probeDns } from './dns-probe.js';
import { probeHttp } from './http-probe.js';
import { probePort } from './port-probe.js';
import { probeTls } from './tls-probe.js';
import { parseTarget } from './target.js';

export interface TargetProber {
  probe(url: string): Promise<DiagnosticRecord>;
}

export class Prober implements TargetProber {
  constructor(private config: ProbeConfig = DEFAULT_PROBE_CONFIG) {}

  /**
   * Run DNS, port, TLS and HTTP probes concurrently and aggregate them.
   * Never rejects; failures are recorded in the returned record.
   */
  async probe(url: string): Promise<DiagnosticRecord> {
    const probedAt = new Date().toISOString();
    const parsed = parseTarget(url);

    if (!parsed.ok) {
      console.log(`[Probe] ${parsed.error}`);
      return invalidTargetRecord(parsed.target, parsed.error, probedAt);
    }

    const { target } = parsed;
    const { host, port } = target;
    console.log(`[Probe] Probing ${target.target} (${host}:${port})`);

    const [dns, portReachable, tls, http] = await Promise.all([
      probeDns(host, this.config.dnsTimeoutMs),
      probePort(host, port, this.config.portTimeoutMs),
      target.scheme === 'https' ? probeTls(host, port, this.config.tlsTimeoutMs) : Promise.resolve(null),
      probeHttp(target.target, {
        timeoutMs: this.config.httpTimeoutMs,
        maxRedirects: this.config.maxRedirects,
      }),
    ]);

    const record = aggregate({
      target,
      probedAt,
      dns,
      portReachable,
      tls,
      http: http.outcome,
      latencyMs: http.latencyMs,
      httpError: http.error,
    });

    console.log(`[Probe] DNS: ${dns.resolved}, Port: ${portReachable.open}, TLS: ${tls ? tls.valid : 'n/a'}, HTTP: ${record.http.statusCode ?? 'failed'}, Errors: ${record.errors.length}`);

    return record;
  }
}

export function probe(url: string, config: ProbeConfig = DEFAULT_PROBE_CONFIG): Promise<DiagnosticRecord> {
  return new Prober(config).probe(url);
}
