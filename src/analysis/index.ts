export { AnalysisServiceError } from './analysis-service.js';
export type { AnalysisService, AnalysisRequest, AnalysisResponse, AnalysisErrorKind } from './analysis-service.js';
export { GatewayAnalysisService } from './gateway-analysis-service.js';
export { ChatModelAnalysisService, contentToText } from './chat-model-analysis-service.js';
export { createAnalysisService } from './create-analysis-service.js';
export type { AnalysisServiceOptions } from './create-analysis-service.js';
export { buildSummary } from './summary.js';
export { buildUrlPrompt, buildInfrastructurePrompt, URL_ANALYSIS_CONTEXT, INFRASTRUCTURE_CONTEXTS } from './prompts.js';
export { isSoftFailureText, SOFT_FAILURE_MARKERS } from './soft-failure.js';
