import { lookup } from 'dns/promises';
import type { DnsOutcome } from '../schemas/index.js';
import { classifyConnectionError } from './classify-error.js';
import { withTimeout } from './with-timeout.js';

export async function probeDns(host: string, timeoutMs: number): Promise<DnsOutcome> {
  try {
    const { address } = await withTimeout(lookup(host), timeoutMs, 'DNS lookup');
    return { resolved: true, address };
  } catch (error) {
    return { resolved: false, failureReason: classifyConnectionError(error).reason };
  }
}
