import { ConfigurationError } from '../errors.js';
import type { BackendClient, BackendFactory, ProviderConfig, ProviderCredentials } from '../types.js';
import { AnthropicBackend } from './anthropic.js';
import { GeminiBackend } from './gemini.js';
import { MockBackend } from './mock.js';
import { OpenAIBackend } from './openai.js';

export { BaseBackend, type BackendConfig, type CostConfig } from './base.js';
export { AnthropicBackend, GeminiBackend, MockBackend, OpenAIBackend };

function requireKey(key: string | undefined, variable: string, vendor: string): string {
  if (!key) {
    throw new ConfigurationError(`${variable} is required for the ${vendor} provider`);
  }
  return key;
}

export function createBackendClient(config: ProviderConfig, credentials: ProviderCredentials = {}): BackendClient {
  switch (config.vendor) {
    case 'anthropic':
      return new AnthropicBackend({
        apiKey: requireKey(credentials.anthropicApiKey, 'ANTHROPIC_API_KEY', config.vendor),
        model: config.model,
        rateLimit: config.rateLimit,
      });
    case 'openai':
      return new OpenAIBackend({
        apiKey: requireKey(credentials.openaiApiKey, 'OPENAI_API_KEY', config.vendor),
        model: config.model,
        rateLimit: config.rateLimit,
        baseURL: typeof config.extras.baseURL === 'string' ? config.extras.baseURL : undefined,
      });
    case 'gemini':
      return new GeminiBackend({
        apiKey: requireKey(credentials.geminiApiKey, 'GEMINI_API_KEY', config.vendor),
        model: config.model,
        rateLimit: config.rateLimit,
      });
    case 'mock':
      return new MockBackend(config.model);
  }
}

export function backendFactoryFor(credentials: ProviderCredentials): BackendFactory {
  return (config) => createBackendClient(config, credentials);
}
