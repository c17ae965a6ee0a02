import { createLLMProvider, providerConfigFromEnv } from '../providerFactory.js';
import { OpenAIProvider } from '../OpenAIProvider.js';
import { GeminiProvider } from '../GeminiProvider.js';
import { parseEnv } from '../../../config/env.js';
import { ConfigurationError } from '../../../types/errors.js';

describe('providerFactory', () => {
  describe('providerConfigFromEnv', () => {
    it('should select Gemini by default', () => {
      const env = parseEnv({ NODE_ENV: 'test', GEMINI_API_KEY: 'test-key' });

      expect(providerConfigFromEnv(env)).toEqual({
        provider: 'gemini',
        apiKey: 'test-key',
        model: 'gemini-2.0-flash',
        timeout: 300000,
      });
    });

    it('should carry the io.net endpoint and model', () => {
      const env = parseEnv({ NODE_ENV: 'test', LLM_PROVIDER: 'ionet', IONET_API_KEY: 'test-key' });

      expect(providerConfigFromEnv(env)).toEqual({
        provider: 'ionet',
        apiKey: 'test-key',
        model: 'deepseek-ai/DeepSeek-V3',
        baseUrl: 'https://api.intelligence.io.solutions/api/v1',
      });
    });
  });

  describe('createLLMProvider', () => {
    it('should build the provider named by the config', () => {
      const openai = createLLMProvider({ provider: 'openai', apiKey: 'test-key', model: 'gpt-4o-mini' });
      const gemini = createLLMProvider({ provider: 'gemini', apiKey: 'test-key', model: 'gemini-2.0-flash', timeout: 1000 });
      const ionet = createLLMProvider({
        provider: 'ionet',
        apiKey: 'test-key',
        model: 'deepseek-ai/DeepSeek-V3',
        baseUrl: 'https://api.intelligence.io.solutions/api/v1',
      });

      expect(openai).toBeInstanceOf(OpenAIProvider);
      expect(openai.getName()).toBe('openai');
      expect(gemini).toBeInstanceOf(GeminiProvider);
      expect(gemini.getName()).toBe('gemini');
      expect(ionet).toBeInstanceOf(OpenAIProvider);
      expect(ionet.getName()).toBe('ionet');
    });

    it('should name the missing key of the selected provider', () => {
      expect(() => createLLMProvider({ provider: 'ionet', model: 'deepseek-ai/DeepSeek-V3', baseUrl: 'http://localhost' })).toThrow(
        'ionet not configured. Missing: IONET_API_KEY'
      );
      expect(() => createLLMProvider({ provider: 'openai', model: 'gpt-4o-mini' })).toThrow(ConfigurationError);
    });
  });
});
