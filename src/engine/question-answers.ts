import type { DiagnosticRecord } from '../schemas/index.js';
import { classifyQuestion } from './question-classifier.js';
import { describeDomain } from './domain-catalog.js';
import { formatMs } from './format.js';

type Answerer = (record: DiagnosticRecord) => string[];

function domainOf(record: DiagnosticRecord): string {
  return record.hostname || record.target;
}

const availability: Answerer = (record) => {
  const parts: string[] = [];
  const latency = record.latencyMs;

  if (latency !== undefined && latency > 1000) {
    parts.push(
      `Based on the current connectivity analysis, your service is experiencing slower response times (${formatMs(latency)}), which can impact availability.`,
      'To improve availability, you should implement caching strategies at multiple levels (application, database, and CDN) to reduce latency.',
    );
  } else if (latency !== undefined) {
    parts.push(`Your service is currently performing well with a response time of ${formatMs(latency)}.`);
  }

  if (record.tls === null) {
    parts.push(
      "However, you're currently using HTTP, which poses security risks and can impact availability. Upgrading to HTTPS is critical for both security and reliability, as it ensures encrypted connections and prevents potential man-in-the-middle attacks.",
    );
  }

  if (record.errors.length > 0) {
    parts.push(
      `Additionally, there are some issues that need attention: ${record.errors.slice(0, 2).join('; ')}.`,
      'These should be addressed to ensure stable service availability.',
    );
  } else {
    parts.push('The connectivity tests show no critical issues detected, indicating your service is stable.');
  }

  parts.push(
    'To further enhance availability, consider deploying across multiple Availability Zones (AZs) to ensure redundancy and fault tolerance.',
    'Setting up comprehensive health checks and monitoring alerts will help you proactively identify and resolve issues before they impact users.',
    'Implementing proper load balancing ensures traffic is distributed evenly across your infrastructure, and auto-scaling based on demand patterns will help maintain performance during traffic spikes.',
  );
  return parts;
};

const performance: Answerer = (record) => {
  const latency = record.latencyMs;

  if (latency === undefined || latency <= 0) {
    return [
      "Unfortunately, I couldn't measure the response time during the connectivity test.",
      'This could indicate network issues or the service may be timing out.',
      'I recommend checking your server logs, network connectivity, and ensuring your service is properly configured and responding to requests.',
    ];
  }

  if (latency > 2000) {
    return [
      `Your service is experiencing very slow response times (${formatMs(latency)}), which significantly impacts user experience.`,
      'This could be due to high server load, inefficient database queries, or lack of caching.',
      'I recommend checking your server resource utilization (CPU, memory, and network), implementing caching at multiple levels (application cache, database query cache, and CDN), and considering a Content Delivery Network (CDN) to serve static content from locations closer to your users.',
    ];
  }

  if (latency > 1000) {
    return [
      `Your service response time is slow (${formatMs(latency)}) and could be improved.`,
      'This may be caused by server resource constraints or lack of optimization.',
      'I suggest checking server load and resource utilization, implementing caching strategies, and considering a CDN to improve performance, especially for static assets.',
    ];
  }

  return [
    `Your service is performing well with an acceptable response time of ${formatMs(latency)}.`,
    'This indicates good performance, but you can still optimize further by implementing caching and ensuring your infrastructure is properly scaled for your traffic patterns.',
  ];
};

const security: Answerer = (record) => {
  if (record.tls === null) {
    return [
      'Your website is currently using HTTP, which is a critical security concern.',
      'All data transmitted between users and your server is unencrypted, making it vulnerable to interception and man-in-the-middle attacks.',
      "I strongly recommend upgrading to HTTPS immediately by obtaining an SSL certificate (you can use free certificates from Let's Encrypt).",
      'Additionally, implement HTTPS redirects to automatically send HTTP traffic to HTTPS, and add security headers like HSTS (HTTP Strict Transport Security) and CSP (Content Security Policy) to further enhance your security posture.',
    ];
  }

  if (record.tls.valid) {
    return [
      'Your website is properly secured with a valid SSL certificate configured correctly.',
      'This means your connections are encrypted using HTTPS, which protects data in transit between clients and your server.',
      'Your SSL certificate is valid and properly configured, providing both security and trust for your users.',
    ];
  }

  return [
    'There are SSL certificate issues detected with your HTTPS configuration.',
    'This could mean the certificate is expired, invalid, or misconfigured.',
    'You should fix this immediately as it can cause browser warnings for your users and potentially expose security vulnerabilities.',
  ];
};

const errors: Answerer = (record) => {
  const parts: string[] = [];

  if (record.errors.length > 0) {
    const list = record.errors.slice(0, 5).map((error) => `  - ${error}`).join('\n');
    parts.push(
      `During the connectivity analysis, I found several issues that need attention:\n${list}\nThese issues should be investigated and resolved to ensure your service operates correctly.`,
      'Check your server logs, review your configuration, and verify that all required services are running properly.',
    );
  } else {
    parts.push(
      'Based on the connectivity tests performed, no critical issues were detected with your service.',
      'The DNS resolution is working, the required ports are open, and the service is responding correctly.',
      'However, I recommend regularly monitoring your service and performing periodic checks to maintain this healthy state.',
    );
  }

  const status = record.http.statusCode;
  if (status !== undefined && status >= 400) {
    parts.push(
      `Additionally, there's an HTTP error (${status}) being returned, which indicates the service is encountering issues.`,
      'You should check your service logs and application error handling to identify and resolve the root cause.',
    );
  }
  return parts;
};

const identity: Answerer = (record) => [describeDomain(domainOf(record))];

const general: Answerer = (record) => {
  const parts: string[] = [];
  const { statusCode, statusText } = record.http;

  if (statusCode === 200) {
    parts.push(`The website (${domainOf(record)}) is currently online and accessible.`);
  } else if (statusCode !== undefined) {
    parts.push(`The website is returning HTTP status ${statusCode} (${statusText ?? 'Unknown status'}).`);
  }

  const latency = record.latencyMs;
  if (latency !== undefined && latency > 0) {
    if (latency < 500) {
      parts.push(`The service is performing excellently with a response time of ${formatMs(latency)}, which indicates very good performance.`);
    } else if (latency < 1000) {
      parts.push(`The service has good performance with a response time of ${formatMs(latency)}.`);
    } else {
      parts.push(`The response time is ${formatMs(latency)}, which could be improved with optimization techniques.`);
    }
  }

  parts.push(
    'To maintain and improve service quality, I recommend monitoring performance and availability metrics, implementing proper logging and alerting systems, and conducting regular security assessments.',
  );
  if (record.tls === null) {
    parts.push('Additionally, upgrading to HTTPS would significantly improve security by encrypting all data transmitted between users and your server.');
  }
  return parts;
};

const ANSWERERS = { availability, performance, security, errors, identity, general } satisfies Record<
  ReturnType<typeof classifyQuestion>,
  Answerer
>;

/**
 * Answer a free-text question from the record alone.
 */
export function answerQuestion(record: DiagnosticRecord, question: string): string {
  const topic = classifyQuestion(question);
  const answer = ANSWERERS[topic](record).join(' ').trim();
  return answer || "I couldn't provide a specific answer to your question based on the available data.";
}
