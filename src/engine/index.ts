export { FallbackReasoner, fallback } from './fallback-reasoner.js';
export { classifyQuestion } from './question-classifier.js';
export type { QuestionTopic } from './question-classifier.js';
export { describeDomain } from './domain-catalog.js';
export { priorityFor } from './format.js';
export type { Priority } from './format.js';
export { buildUrlReport } from './url-report.js';
export { answerQuestion } from './question-answers.js';
export { buildInfrastructureReport, isHealthy } from './infrastructure-reports.js';
