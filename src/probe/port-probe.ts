import { createConnection } from 'net';
import type { PortOutcome } from '../schemas/index.js';

/**
 * TCP connect check. The socket is destroyed as soon as the outcome is known.
 */
export function probePort(host: string, port: number, timeoutMs: number): Promise<PortOutcome> {
  return new Promise<PortOutcome>((resolve) => {
    let settled = false;
    const socket = createConnection({ host, port });

    const finish = (outcome: PortOutcome) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(outcome);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish({ open: true }));
    socket.once('timeout', () =>
      finish({ open: false, failureReason: `Connection to ${host}:${port} timed out after ${timeoutMs}ms` }),
    );
    socket.once('error', (error: Error) => finish({ open: false, failureReason: error.message }));
  });
}
