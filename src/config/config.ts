// src/config/config.ts
import { z } from 'zod';

export const ANALYSIS_PROVIDERS = ['gateway', 'internal', 'openai', 'anthropic', 'google'] as const;
export type AnalysisProvider = (typeof ANALYSIS_PROVIDERS)[number];

export interface ProbeConfig {
  dnsTimeoutMs: number;
  portTimeoutMs: number;
  tlsTimeoutMs: number;
  httpTimeoutMs: number;
  maxRedirects: number;
}

export interface AnalysisConfig {
  provider: AnalysisProvider;
  apiUrl: string;
  model?: string;
  timeoutMs: number;
  questionTimeoutMs: number;
  internalUrl?: string;
  internalKey?: string;
  openaiApiKey?: string;
  anthropicApiKey?: string;
  googleApiKey?: string;
}

export interface ServerConfig {
  port: number;
}

export interface AppConfig {
  probe: ProbeConfig;
  analysis: AnalysisConfig;
  server: ServerConfig;
}

export const DEFAULT_PROBE_CONFIG: ProbeConfig = {
  dnsTimeoutMs: 5000,
  portTimeoutMs: 5000,
  tlsTimeoutMs: 5000,
  httpTimeoutMs: 10000,
  maxRedirects: 30,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const millis = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  PROBE_DNS_TIMEOUT_MS: millis(DEFAULT_PROBE_CONFIG.dnsTimeoutMs),
  PROBE_PORT_TIMEOUT_MS: millis(DEFAULT_PROBE_CONFIG.portTimeoutMs),
  PROBE_TLS_TIMEOUT_MS: millis(DEFAULT_PROBE_CONFIG.tlsTimeoutMs),
  PROBE_HTTP_TIMEOUT_MS: millis(DEFAULT_PROBE_CONFIG.httpTimeoutMs),
  PROBE_MAX_REDIRECTS: z.coerce.number().int().min(0).default(DEFAULT_PROBE_CONFIG.maxRedirects),
  ANALYSIS_PROVIDER: z.enum(ANALYSIS_PROVIDERS).default('gateway'),
  ANALYSIS_API_URL: z.string().url().default('http://localhost:8080'),
  ANALYSIS_MODEL: optionalText,
  ANALYSIS_TIMEOUT_MS: millis(30000),
  ANALYSIS_QUESTION_TIMEOUT_MS: millis(15000),
  INTERNAL_AI_URL: optionalText,
  INTERNAL_AI_KEY: optionalText,
  OPENAI_API_KEY: optionalText,
  ANTHROPIC_API_KEY: optionalText,
  GOOGLE_API_KEY: optionalText,
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
});

// Empty strings in .env files mean "unset"
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Build the application config from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    probe: {
      dnsTimeoutMs: e.PROBE_DNS_TIMEOUT_MS,
      portTimeoutMs: e.PROBE_PORT_TIMEOUT_MS,
      tlsTimeoutMs: e.PROBE_TLS_TIMEOUT_MS,
      httpTimeoutMs: e.PROBE_HTTP_TIMEOUT_MS,
      maxRedirects: e.PROBE_MAX_REDIRECTS,
    },
    analysis: {
      provider: e.ANALYSIS_PROVIDER,
      apiUrl: e.ANALYSIS_API_URL.replace(/\/+$/, ''),
      model: e.ANALYSIS_MODEL,
      timeoutMs: e.ANALYSIS_TIMEOUT_MS,
      questionTimeoutMs: e.ANALYSIS_QUESTION_TIMEOUT_MS,
      internalUrl: e.INTERNAL_AI_URL,
      internalKey: e.INTERNAL_AI_KEY,
      openaiApiKey: e.OPENAI_API_KEY,
      anthropicApiKey: e.ANTHROPIC_API_KEY,
      googleApiKey: e.GOOGLE_API_KEY,
    },
    server: { port: e.PORT },
  };
}
