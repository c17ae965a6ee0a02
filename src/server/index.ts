/**
 * docsum composition root
 *
 * Builds the summarization pipeline once per process: provider, shared rate
 * limiter, rate-limited generator, chunker and orchestrator, each injected
 * explicitly into the next.
 */

import { getEnv, type Env } from './config/env.js';
import { closeHttpAgents } from './config/httpClient.js';
import { buildSummarizationConfig } from './config/summarization.js';
import { TextChunker } from './chunking/TextChunker.js';
import type { LLMProvider } from './services/llm/LLMProvider.js';
import { LLMService } from './services/llm/LLMService.js';
import { createLLMProvider } from './services/llm/providerFactory.js';
import { TokenBucketRateLimiter } from './services/infrastructure/rateLimiter.js';
import { DocumentSummarizationService } from './services/summarization/DocumentSummarizationService.js';
import { logger } from './utils/logger.js';

export interface DocumentSummarizerOverrides {
  provider?: LLMProvider;
  rateLimiter?: TokenBucketRateLimiter;
}

export interface DocumentSummarizer {
  service: DocumentSummarizationService;
  generator: LLMService;
  rateLimiter: TokenBucketRateLimiter;
  dispose(): void;
}

/**
 * Build a ready-to-use summarizer from the environment
 *
 * @throws {ConfigurationError} when the environment is invalid or the selected provider has no API key
 */
export function createDocumentSummarizer(
  env: Env = getEnv(),
  overrides: DocumentSummarizerOverrides = {}
): DocumentSummarizer {
  const config = buildSummarizationConfig(env);

  const provider = overrides.provider ?? createLLMProvider(config.provider);
  const rateLimiter = overrides.rateLimiter ?? new TokenBucketRateLimiter(config.rateLimit);
  const generator = new LLMService(provider, rateLimiter, config.llm);
  const chunker = new TextChunker(config.chunking);
  const service = new DocumentSummarizationService(generator, chunker, config.summarization);

  logger.info(
    {
      provider: provider.getName(),
      requestsPerMinute: config.rateLimit.requestsPerMinute,
      burstSize: config.rateLimit.burstSize,
      chunkSize: chunker.chunkSize,
      chunkOverlap: chunker.chunkOverlap,
    },
    'Document summarizer initialized'
  );

  return {
    service,
    generator,
    rateLimiter,
    dispose() {
      rateLimiter.dispose();
      closeHttpAgents();
    },
  };
}

export { getEnv, parseEnv, resetEnv, LLM_PROVIDERS } from './config/env.js';
export type { Env, LLMProviderName } from './config/env.js';
export { buildSummarizationConfig } from './config/summarization.js';
export type { DocumentSummarizerConfig } from './config/summarization.js';
export { TextChunker, split, DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from './chunking/TextChunker.js';
export type { Chunk, ChunkingConfig } from './chunking/TextChunker.js';
export { TokenBucketRateLimiter } from './services/infrastructure/rateLimiter.js';
export type { RateLimiter, RateLimitConfig } from './services/infrastructure/rateLimiter.js';
export type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './services/llm/LLMProvider.js';
export { OpenAIProvider } from './services/llm/OpenAIProvider.js';
export { GeminiProvider } from './services/llm/GeminiProvider.js';
export { createLLMProvider, providerConfigFromEnv } from './services/llm/providerFactory.js';
export type { LLMProviderConfig } from './services/llm/providerFactory.js';
export { LLMService } from './services/llm/LLMService.js';
export type { TextGenerator, GenerateOptions, LLMConfig } from './services/llm/LLMService.js';
export {
  DocumentSummarizationService,
  EMPTY_DOCUMENT_SUMMARY,
  DEFAULT_MAX_BATCH_SIZE,
} from './services/summarization/DocumentSummarizationService.js';
export type {
  SummarizationConfig,
  SummarizeOptions,
  SummaryProgress,
  SummaryPhase,
} from './services/summarization/DocumentSummarizationService.js';
export {
  AppError,
  ConfigurationError,
  GenerationError,
  CancellationError,
  ErrorCode,
  isAppError,
  toAppError,
} from './types/errors.js';
