import type { DiagnosticRecord } from '../schemas/index.js';

function httpLine(statusCode: number): string {
  if (statusCode >= 200 && statusCode < 300) return `✅ HTTP status ${statusCode} (OK)`;
  if (statusCode >= 300 && statusCode < 400) return `⚠️  HTTP status ${statusCode} (Redirect)`;
  return `❌ HTTP status ${statusCode} (Error)`;
}

function latencyLine(latencyMs: number): string {
  const ms = latencyMs.toFixed(0);
  if (latencyMs < 1000) return `✅ Response time ${ms}ms (Good)`;
  if (latencyMs < 3000) return `⚠️  Response time ${ms}ms (Slow)`;
  return `❌ Response time ${ms}ms (Very slow)`;
}

/**
 * Line summary of a record. This is the only probe data sent to the analysis service.
 */
export function buildSummary(record: DiagnosticRecord): string[] {
  const lines: string[] = [];

  lines.push(record.dns.resolved ? `✅ DNS resolves to ${record.dns.address ?? record.hostname}` : '❌ DNS resolution failed');
  lines.push(
    record.portReachable.open ? `✅ Port ${record.port} is open` : `❌ Port ${record.port} is closed or blocked`,
  );

  if (record.tls === null) {
    lines.push('⚪ SSL not applicable (HTTP)');
  } else {
    lines.push(record.tls.valid ? '✅ SSL certificate is valid' : '❌ SSL certificate issue detected');
  }

  if (record.http.statusCode !== undefined) {
    lines.push(httpLine(record.http.statusCode));
  }
  if (record.latencyMs !== undefined) {
    lines.push(latencyLine(record.latencyMs));
  }

  if (record.errors.length > 0) {
    lines.push('\n🚨 Issues detected:');
    for (const error of record.errors) {
      lines.push(`   • ${error}`);
    }
  }

  return lines;
}
