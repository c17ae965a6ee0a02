/**
 * Summarization Configuration
 *
 * Derives the settings of each component from the validated environment.
 */

import type { Env } from './env.js';
import { providerConfigFromEnv, type LLMProviderConfig } from '../services/llm/providerFactory.js';
import type { LLMConfig } from '../services/llm/LLMService.js';
import type { RateLimitConfig } from '../services/infrastructure/rateLimiter.js';
import type { SummarizationConfig } from '../services/summarization/DocumentSummarizationService.js';

export interface DocumentSummarizerConfig {
  provider: LLMProviderConfig;
  llm: LLMConfig;
  rateLimit: RateLimitConfig;
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
  };
  summarization: SummarizationConfig;
}

export function buildSummarizationConfig(env: Env): DocumentSummarizerConfig {
  return {
    provider: providerConfigFromEnv(env),
    llm: {
      temperature: env.LLM_TEMPERATURE,
      maxTokens: env.LLM_MAX_TOKENS,
    },
    rateLimit: {
      requestsPerMinute: env.RATE_LIMIT_RPM,
      burstSize: env.RATE_LIMIT_BURST,
    },
    chunking: {
      chunkSize: env.CHUNK_SIZE,
      chunkOverlap: env.CHUNK_OVERLAP,
    },
    summarization: {
      maxBatchSize: env.SUMMARY_MAX_BATCH_SIZE,
    },
  };
}
