import type { AnalysisConfig } from '../config/index.js';
import { createLLM, resolveModel } from '../llm/index.js';
import type { AnalysisService } from './analysis-service.js';
import { ChatModelAnalysisService } from './chat-model-analysis-service.js';
import { GatewayAnalysisService } from './gateway-analysis-service.js';

export interface AnalysisServiceOptions {
  // overrides config.apiUrl, e.g. from --api-url
  apiUrl?: string;
}

export function createAnalysisService(config: AnalysisConfig, options: AnalysisServiceOptions = {}): AnalysisService {
  if (config.provider === 'gateway') {
    return new GatewayAnalysisService(options.apiUrl ?? config.apiUrl);
  }

  const llmConfig = { provider: config.provider, model: config.model };
  return new ChatModelAnalysisService(createLLM(llmConfig, config), resolveModel(llmConfig), config.provider);
}
