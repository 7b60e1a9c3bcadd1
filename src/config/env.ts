import dotenv from 'dotenv';
import type { ProviderCredentials } from '../types.js';

export type EnvSource = Record<string, string | undefined>;

export interface TranslatorEnvConfig {
  provider: string;
  model: string;
  retries: number;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  extendedThinking: boolean;
  stateDbPath: string;
  logLevel: string;
  credentials: ProviderCredentials;
}

export const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

/**
 * Reads translator settings from the environment. When no source is given,
 * `.env` is loaded into `process.env` first.
 */
export function loadEnvConfig(source?: EnvSource): TranslatorEnvConfig {
  let env: EnvSource;
  if (source === undefined) {
    dotenv.config();
    env = process.env;
  } else {
    env = source;
  }

  return {
    provider: (env.AI_TRANSLATOR_PROVIDER ?? 'openai').toLowerCase(),
    model: env.AI_TRANSLATOR_MODEL ?? 'gpt-4o-mini',
    retries: numberFromEnv(env.AI_TRANSLATOR_RETRIES, 5),
    maxTokens: numberFromEnv(env.AI_TRANSLATOR_MAX_TOKENS, 4096),
    temperature: numberFromEnv(env.AI_TRANSLATOR_TEMPERATURE, 0.3),
    timeoutMs: numberFromEnv(env.AI_TRANSLATOR_TIMEOUT_MS, 30000),
    extendedThinking: booleanFromEnv(env.AI_TRANSLATOR_EXTENDED_THINKING, false),
    stateDbPath: env.AI_TRANSLATOR_STATE_DB ?? ':memory:',
    logLevel: env.LOG_LEVEL ?? 'info',
    credentials: {
      anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
      openaiApiKey: env.OPENAI_API_KEY || undefined,
      geminiApiKey: env.GEMINI_API_KEY || undefined,
    },
  };
}

/** Provider settings for the default single-provider setup. */
export function defaultProviderInput(config: TranslatorEnvConfig): Record<string, unknown> {
  return {
    vendor: config.provider,
    model: config.model,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    ...(config.extendedThinking ? { extendedThinking: {} } : {}),
  };
}
