export type ConnectionErrorType =
  | 'timeout'
  | 'connection_refused'
  | 'dns_failed'
  | 'ssl_error'
  | 'network_error'
  | 'unknown';

export interface ConnectionErrorInfo {
  isConnectionError: boolean;
  errorType: ConnectionErrorType;
  // most specific human-readable reason found on the error chain
  reason: string;
}

interface ErrorFacts {
  names: string[];
  codes: string[];
  messages: string[];
}

function collectFacts(error: unknown, facts: ErrorFacts = { names: [], codes: [], messages: [] }, depth = 0): ErrorFacts {
  if (depth > 3 || error === null || error === undefined) return facts;

  if (error instanceof Error) {
    facts.names.push(error.name);
    if (error.message) facts.messages.push(error.message);
    if ('code' in error && typeof error.code === 'string') {
      facts.codes.push(error.code);
    }
    return collectFacts(error.cause, facts, depth + 1);
  }

  if (typeof error === 'string') {
    facts.messages.push(error);
  }
  return facts;
}

function pickReason(facts: ErrorFacts): string {
  // fetch wraps the socket error as `cause`; the innermost message is the useful one
  const reason = facts.messages[facts.messages.length - 1];
  return reason ?? 'Unknown error';
}

export function classifyConnectionError(error: unknown): ConnectionErrorInfo {
  const facts = collectFacts(error);
  const codes = facts.codes.map((c) => c.toUpperCase());
  const message = facts.messages.join(' ').toLowerCase();
  const reason = pickReason(facts);

  if (
    facts.names.some((n) => n === 'AbortError' || n === 'TimeoutError') ||
    codes.some((c) => c === 'ETIMEDOUT' || c === 'UND_ERR_CONNECT_TIMEOUT' || c === 'UND_ERR_HEADERS_TIMEOUT') ||
    message.includes('timeout') ||
    message.includes('timed out')
  ) {
    return { isConnectionError: true, errorType: 'timeout', reason };
  }

  if (codes.includes('ECONNREFUSED') || message.includes('econnrefused')) {
    return { isConnectionError: true, errorType: 'connection_refused', reason };
  }

  if (
    codes.some((c) => c === 'ENOTFOUND' || c === 'EAI_AGAIN' || c === 'ENODATA') ||
    message.includes('enotfound') ||
    message.includes('getaddrinfo')
  ) {
    return { isConnectionError: true, errorType: 'dns_failed', reason };
  }

  if (
    codes.some((c) => c.startsWith('ERR_TLS') || c.startsWith('ERR_SSL') || c.includes('CERT')) ||
    message.includes('ssl') ||
    message.includes('certificate')
  ) {
    return { isConnectionError: true, errorType: 'ssl_error', reason };
  }

  if (
    codes.some((c) => ['ECONNRESET', 'EHOSTUNREACH', 'ENETUNREACH', 'EPIPE', 'UND_ERR_SOCKET'].includes(c)) ||
    message.includes('econnreset') ||
    message.includes('network')
  ) {
    return { isConnectionError: true, errorType: 'network_error', reason };
  }

  return { isConnectionError: false, errorType: 'unknown', reason };
}
