// src/config/index.ts
export { loadConfig, ConfigError, DEFAULT_PROBE_CONFIG, ANALYSIS_PROVIDERS } from './config.js';
export type { AppConfig, ProbeConfig, AnalysisConfig, ServerConfig, AnalysisProvider } from './config.js';
