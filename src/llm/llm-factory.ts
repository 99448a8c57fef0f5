// src/llm/llm-factory.ts
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ChatOpenAI } from '@langchain/openai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ConfigError, type AnalysisConfig } from '../config/index.js';

export type ChatProvider = 'internal' | 'google' | 'openai' | 'anthropic';

export interface LLMConfig {
  provider: ChatProvider;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

// Default models per provider
export const DEFAULT_MODELS: Record<ChatProvider, string> = {
  internal: 'gpt-4o-mini',
  google: 'gemini-2.0-flash',
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-20241022',
};

function requireKey(value: string | undefined, name: string): string {
  if (!value) {
    throw new ConfigError(`${name} is required for this analysis provider`);
  }
  return value;
}

export function resolveModel(config: LLMConfig): string {
  return config.model || DEFAULT_MODELS[config.provider];
}

/**
 * Create a chat model for the configured provider
 */
export function createLLM(config: LLMConfig, analysis: AnalysisConfig): BaseChatModel {
  const { provider } = config;
  const model = resolveModel(config);
  const temperature = config.temperature ?? 0;
  const maxTokens = config.maxTokens ?? 4096;

  console.log(`[LLM] Provider: ${provider}, Model: ${model}`);

  switch (provider) {
    case 'internal':
      return new ChatOpenAI({
        model,
        temperature,
        apiKey: requireKey(analysis.internalKey, 'INTERNAL_AI_KEY'),
        configuration: {
          baseURL: requireKey(analysis.internalUrl, 'INTERNAL_AI_URL'),
        },
      });

    case 'google':
      return new ChatGoogleGenerativeAI({
        model,
        temperature,
        maxOutputTokens: maxTokens,
        apiKey: requireKey(analysis.googleApiKey, 'GOOGLE_API_KEY'),
      });

    case 'openai':
      return new ChatOpenAI({
        model,
        temperature,
        maxTokens,
        apiKey: requireKey(analysis.openaiApiKey, 'OPENAI_API_KEY'),
      });

    case 'anthropic':
      return new ChatAnthropic({
        model,
        temperature,
        maxTokens,
        apiKey: requireKey(analysis.anthropicApiKey, 'ANTHROPIC_API_KEY'),
      });
  }
}
