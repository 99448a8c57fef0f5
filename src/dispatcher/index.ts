export { AnalysisDispatcher } from './analysis-dispatcher.js';
export type { AiAttempt, DispatcherOptions } from './analysis-dispatcher.js';
