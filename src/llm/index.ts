// src/llm/index.ts
export { createLLM, resolveModel, DEFAULT_MODELS } from './llm-factory.js';
export type { ChatProvider, LLMConfig } from './llm-factory.js';
