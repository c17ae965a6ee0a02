/**
 * OpenAI LLM Provider
 *
 * Implements LLMProvider for the OpenAI API and for OpenAI-compatible
 * endpoints such as io.net (same SDK, different base URL).
 */

import OpenAI from 'openai';
import type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { ConfigurationError, GenerationError } from '../../types/errors.js';

export interface ChatCompletionRequest {
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
}

export interface ChatCompletionResult {
  content: string | null;
  model: string;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

/**
 * The one chat-completion call this provider needs from the SDK
 */
export interface OpenAIClient {
  complete(request: ChatCompletionRequest, signal?: AbortSignal): Promise<ChatCompletionResult>;
}

export interface OpenAIProviderConfig {
  name?: string; // Reported provider name, e.g. 'ionet'
  apiKey?: string;
  apiKeyEnv?: string; // Variable named in the configuration error
  baseUrl?: string;
  defaultModel?: string;
  client?: OpenAIClient;
}

function toChatMessage(message: LLMMessage) {
  switch (message.role) {
    case 'system':
      return { role: 'system' as const, content: message.content };
    case 'assistant':
      return { role: 'assistant' as const, content: message.content };
    case 'user':
      return { role: 'user' as const, content: message.content };
  }
}

/**
 * Build an OpenAIClient backed by the official SDK
 */
export function createOpenAIClient(apiKey: string, baseUrl?: string): OpenAIClient {
  // One request per rate-limit grant: SDK retries would bypass the bucket
  const openai = new OpenAI({ apiKey, baseURL: baseUrl, maxRetries: 0 });

  return {
    async complete(request, signal) {
      const response = await openai.chat.completions.create(
        {
          model: request.model,
          messages: request.messages.map(toChatMessage),
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        },
        { signal }
      );

      return {
        content: response.choices[0]?.message?.content ?? null,
        model: response.model,
        usage: response.usage,
      };
    },
  };
}

export class OpenAIProvider implements LLMProvider {
  private readonly name: string;
  private readonly defaultModel: string;
  private readonly client: OpenAIClient;

  constructor(config: OpenAIProviderConfig = {}) {
    this.name = config.name ?? 'openai';
    this.defaultModel = config.defaultModel ?? 'gpt-4o-mini';

    if (config.client) {
      this.client = config.client;
    } else {
      // No client and no key: fail at startup
      if (!config.apiKey) {
        throw new ConfigurationError(this.name, [config.apiKeyEnv ?? 'OPENAI_API_KEY']);
      }
      this.client = createOpenAIClient(config.apiKey, config.baseUrl);
    }
  }

  getName(): string {
    return this.name;
  }

  async generate(
    messages: LLMMessage[],
    options?: LLMGenerateOptions
  ): Promise<LLMResponse> {
    const model = options?.model || this.defaultModel;
    const temperature = options?.temperature ?? 0.3;

    try {
      const response = await this.client.complete(
        {
          model,
          messages,
          temperature,
          maxTokens: options?.max_tokens,
        },
        options?.signal
      );

      const content = response.content?.trim();
      if (!content) {
        throw new GenerationError(this.name, 'Empty response from model', {
          reason: 'empty_response',
          model,
        });
      }

      return {
        content,
        model: response.model,
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens,
            }
          : undefined,
      };
    } catch (error) {
      if (!options?.signal?.aborted) {
        logger.error({ error, model, provider: this.name }, 'Error calling OpenAI-compatible API');
      }
      throw error;
    }
  }
}
