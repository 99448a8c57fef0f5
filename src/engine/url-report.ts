import type { DiagnosticRecord } from '../schemas/index.js';
import { formatMs, priorityFor, type Priority } from './format.js';

const TROUBLESHOOTING_STEPS = [
  '1. **Check connectivity** - Verify network access to the target',
  '2. **Verify DNS** - Ensure domain resolution is working',
  '3. **Test ports** - Confirm required ports are open',
  '4. **Check SSL** - Validate certificate for HTTPS sites',
  '5. **DNS settings** - Verify DNS resolution',
  '6. **Service status** - Check if the target service is running',
];

const PREVENTION = [
  '- Implement monitoring and alerting',
  '- Use load balancers for high availability',
  '- Regular SSL certificate renewal',
  '- Performance monitoring and optimization',
  '- Backup DNS configurations',
];

const PRIORITY_LINES: Record<Priority, string> = {
  Low: '🟢 **Priority: Low** - No critical issues',
  Medium: '🟡 **Priority: Medium** - Some issues detected',
  High: '🔴 **Priority: High** - Multiple critical issues',
};

function connectivityLines(record: DiagnosticRecord): string[] {
  const { dns, portReachable, tls, http, latencyMs } = record;
  const lines: string[] = [];

  lines.push(dns.resolved ? `✅ **DNS Resolution:** ${dns.address ?? 'Resolved'}` : '❌ **DNS Resolution:** Failed');
  lines.push(
    portReachable.open ? `✅ **Port ${record.port}:** Open` : `❌ **Port ${record.port}:** Closed or blocked`,
  );

  if (tls === null) {
    lines.push('⚪ **SSL Certificate:** Not applicable (HTTP)');
  } else {
    lines.push(tls.valid ? '✅ **SSL Certificate:** Valid' : '❌ **SSL Certificate:** Invalid or expired');
  }

  if (http.statusCode !== undefined) {
    const ok = http.statusCode >= 200 && http.statusCode < 300;
    lines.push(`${ok ? '✅' : '❌'} **HTTP Status:** ${http.statusCode} ${http.statusText ?? ''}`.trimEnd());
  } else if (http.failureReason) {
    lines.push(`❌ **HTTP Status:** ${http.failureReason}`);
  } else {
    lines.push('❌ **HTTP Status:** Failed to retrieve');
  }

  if (latencyMs !== undefined) {
    lines.push(`${latencyMs < 1000 ? '✅' : '⚠️'} **Response Time:** ${formatMs(latencyMs)}`);
  } else {
    lines.push('❌ **Response Time:** Failed to measure');
  }

  return lines;
}

/**
 * Full Markdown report for a record, used when no question was asked.
 */
export function buildUrlReport(record: DiagnosticRecord): string {
  const issues = record.errors.length > 0 ? record.errors.map((e) => `• ${e}`) : ['No critical issues detected.'];

  return [
    '# URL Analysis Report',
    '',
    `**URL:** ${record.target}`,
    `**Analyzed:** ${record.probedAt}`,
    '',
    '## 🔍 Test Results',
    '',
    '### Connectivity Tests',
    ...connectivityLines(record),
    '',
    '## 🚨 Issues Found',
    ...issues,
    '',
    '## 🔧 Troubleshooting Steps',
    '',
    ...TROUBLESHOOTING_STEPS,
    '',
    '## 📊 Priority Assessment',
    PRIORITY_LINES[priorityFor(record.errors.length)],
    '',
    '## 🛡️ Prevention Recommendations',
    ...PREVENTION,
    '',
    '---',
    '*This analysis was generated automatically. For AI-powered insights, ensure the analysis service is available.*',
    '',
  ].join('\n');
}
