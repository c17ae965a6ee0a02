/**
 * Provider selection
 *
 * Exactly one text-generation backend is active per process; it is chosen
 * from LLM_PROVIDER at startup and built from its own settings.
 */

import type { Env } from '../../config/env.js';
import type { LLMProvider } from './LLMProvider.js';
import { OpenAIProvider } from './OpenAIProvider.js';
import { GeminiProvider } from './GeminiProvider.js';

export type LLMProviderConfig =
  | { provider: 'openai'; apiKey?: string; model: string }
  | { provider: 'gemini'; apiKey?: string; model: string; timeout: number }
  | { provider: 'ionet'; apiKey?: string; model: string; baseUrl: string };

export function providerConfigFromEnv(env: Env): LLMProviderConfig {
  switch (env.LLM_PROVIDER) {
    case 'openai':
      return { provider: 'openai', apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL };
    case 'gemini':
      return {
        provider: 'gemini',
        apiKey: env.GEMINI_API_KEY,
        model: env.GEMINI_MODEL,
        timeout: env.GEMINI_TIMEOUT,
      };
    case 'ionet':
      return {
        provider: 'ionet',
        apiKey: env.IONET_API_KEY,
        model: env.IONET_MODEL,
        baseUrl: env.IONET_BASE_URL,
      };
  }
}

/**
 * Build the provider named by `config`
 * @throws {ConfigurationError} when the provider's API key is missing
 */
export function createLLMProvider(config: LLMProviderConfig): LLMProvider {
  switch (config.provider) {
    case 'openai':
      return new OpenAIProvider({ apiKey: config.apiKey, defaultModel: config.model });
    case 'gemini':
      return new GeminiProvider({
        apiKey: config.apiKey,
        defaultModel: config.model,
        timeout: config.timeout,
      });
    case 'ionet':
      return new OpenAIProvider({
        name: 'ionet',
        apiKey: config.apiKey,
        apiKeyEnv: 'IONET_API_KEY',
        baseUrl: config.baseUrl,
        defaultModel: config.model,
      });
  }
}
