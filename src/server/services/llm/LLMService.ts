/**
 * LLM Service for summarization
 *
 * The single gateway between the orchestrator and the configured provider:
 * every call waits for a rate-limit token first, and every provider failure
 * leaves here as a GenerationError (or CancellationError when the caller
 * aborted).
 */

import type { LLMProvider } from './LLMProvider.js';
import type { RateLimiter } from '../infrastructure/rateLimiter.js';
import {
  CancellationError,
  GenerationError,
  errorMessage,
} from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';

export interface GenerateOptions {
  signal?: AbortSignal;
}

/**
 * Produces one completion for a system/user prompt pair
 */
export interface TextGenerator {
  generate(systemPrompt: string, userPrompt: string, options?: GenerateOptions): Promise<string>;
}

export interface LLMConfig {
  temperature: number;
  maxTokens: number;
  model?: string; // Overrides the provider's default model
}

/**
 * Service for interacting with LLM APIs
 */
export class LLMService implements TextGenerator {
  constructor(
    private readonly provider: LLMProvider,
    private readonly rateLimiter: RateLimiter,
    private readonly config: LLMConfig
  ) {}

  getProviderName(): string {
    return this.provider.getName();
  }

  async generate(systemPrompt: string, userPrompt: string, options: GenerateOptions = {}): Promise<string> {
    const { signal } = options;
    // Created per call so the caller's run context is bound
    const log = createChildLogger({ component: 'LLMService' });

    await this.rateLimiter.acquire(signal);

    const startTime = Date.now();
    try {
      const response = await this.provider.generate(
        [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        {
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
          model: this.config.model,
          signal,
        }
      );

      log.debug(
        {
          provider: this.provider.getName(),
          model: response.model,
          duration: Date.now() - startTime,
          totalTokens: response.usage?.totalTokens,
        },
        'Generation completed'
      );

      return response.content;
    } catch (error) {
      if (error instanceof CancellationError || error instanceof GenerationError) {
        throw error;
      }
      if (signal?.aborted) {
        throw new CancellationError('Generation cancelled', { provider: this.provider.getName() });
      }
      throw new GenerationError(
        this.provider.getName(),
        errorMessage(error),
        { duration: Date.now() - startTime },
        error
      );
    }
  }
}
