export { Prober, probe } from './prober.js';
export type { TargetProber } from './prober.js';
export { aggregate, invalidTargetRecord } from './aggregator.js';
export type { ProbeOutcomes } from './aggregator.js';
export { parseTarget, normalizeTarget, defaultPort } from './target.js';
export type { ProbeTarget, ParsedTarget } from './target.js';
export { classifyConnectionError } from './classify-error.js';
export type { ConnectionErrorInfo, ConnectionErrorType } from './classify-error.js';
