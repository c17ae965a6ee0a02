/**
 * Document Summarization Service
 *
 * Map-reduce summarization of long document text. Each chunk is summarized
 * concurrently (map); the partial summaries are then combined in batches of
 * at most `maxBatchSize` until a final combine produces one summary (reduce).
 * Throughput is bounded by the rate limiter behind the TextGenerator, not
 * here.
 */

import { randomUUID } from 'crypto';
import type { TextChunker } from '../../chunking/TextChunker.js';
import type { TextGenerator } from '../llm/LLMService.js';
import { CancellationError, ConfigurationError } from '../../types/errors.js';
import { createChildLogger, runWithContext } from '../../utils/logger.js';
import { fanOut, toBatches } from '../../utils/concurrency.js';
import {
  MAP_SYSTEM_PROMPT,
  REDUCE_SYSTEM_PROMPT,
  buildCombinePrompt,
  buildMapPrompt,
} from './prompts.js';

export const EMPTY_DOCUMENT_SUMMARY = 'No content to summarize.';
export const DEFAULT_MAX_BATCH_SIZE = 10;

/**
 * Configuration for document summarization
 */
export interface SummarizationConfig {
  maxBatchSize?: number; // Summaries per combine call (default: 10)
  maxConcurrency?: number; // In-flight generation calls per run (default: unbounded)
}

export type SummaryPhase = 'chunking' | 'mapping' | 'reducing' | 'combining' | 'complete';

export interface SummaryProgress {
  phase: SummaryPhase;
  completed: number;
  total: number;
  message: string;
}

export interface SummarizeOptions {
  signal?: AbortSignal;
  onProgress?: (progress: SummaryProgress) => void;
}

/**
 * Service for summarizing document text of any length
 */
export class DocumentSummarizationService {
  private readonly maxBatchSize: number;
  private readonly maxConcurrency?: number;

  constructor(
    private readonly generator: TextGenerator,
    private readonly chunker: TextChunker,
    config: SummarizationConfig = {}
  ) {
    const maxBatchSize = config.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
    if (!Number.isInteger(maxBatchSize) || maxBatchSize < 2) {
      throw new ConfigurationError(
        'DocumentSummarizationService',
        ['SUMMARY_MAX_BATCH_SIZE'],
        `maxBatchSize must be an integer of at least 2, got ${maxBatchSize}`
      );
    }
    if (
      config.maxConcurrency !== undefined &&
      !(Number.isInteger(config.maxConcurrency) && config.maxConcurrency > 0)
    ) {
      throw new ConfigurationError(
        'DocumentSummarizationService',
        [],
        `maxConcurrency must be a positive integer, got ${config.maxConcurrency}`
      );
    }

    this.maxBatchSize = maxBatchSize;
    this.maxConcurrency = config.maxConcurrency;
  }

  /**
   * Number of map calls a summary of this text would make
   */
  countChunks(text: string): number {
    return this.chunker.countChunks(text);
  }

  /**
   * Produce one Markdown summary of `text`
   *
   * @throws {GenerationError} from the first failed generation call; no partial summary is returned
   * @throws {CancellationError} when `options.signal` aborts
   */
  async summarize(text: string, options: SummarizeOptions = {}): Promise<string> {
    if (!text.trim()) {
      return EMPTY_DOCUMENT_SUMMARY;
    }
    if (options.signal?.aborted) {
      throw new CancellationError('Summarization cancelled before start');
    }

    return runWithContext({ runId: randomUUID() }, () => this.run(text, options));
  }

  private async run(text: string, options: SummarizeOptions): Promise<string> {
    const log = createChildLogger({ component: 'DocumentSummarizationService' });
    const { signal, onProgress } = options;
    const startTime = Date.now();

    const chunks = this.chunker.split(text);
    onProgress?.({
      phase: 'chunking',
      completed: chunks.length,
      total: chunks.length,
      message: `Split into ${chunks.length} chunk(s)`,
    });
    log.info({ textLength: text.length, chunkCount: chunks.length }, 'Starting document summarization');

    let summary: string;
    if (chunks.length === 1) {
      // Short document: the section summary is the final summary
      summary = await this.generator.generate(MAP_SYSTEM_PROMPT, buildMapPrompt(chunks[0].text), { signal });
    } else {
      let summaries = await this.mapChunks(chunks.map((chunk) => chunk.text), options);

      let pass = 0;
      while (summaries.length > this.maxBatchSize) {
        pass++;
        summaries = await this.reducePass(summaries, pass, options);
        log.debug({ pass, remaining: summaries.length }, 'Reduce pass completed');
      }

      onProgress?.({ phase: 'combining', completed: 0, total: 1, message: 'Combining summaries' });
      summary = await this.generator.generate(REDUCE_SYSTEM_PROMPT, buildCombinePrompt(summaries), { signal });
    }

    onProgress?.({ phase: 'complete', completed: 1, total: 1, message: 'Complete' });
    log.info(
      { chunkCount: chunks.length, summaryLength: summary.length, duration: Date.now() - startTime },
      'Document summarization completed'
    );

    return summary;
  }

  private async mapChunks(texts: string[], options: SummarizeOptions): Promise<string[]> {
    const total = texts.length;
    let completed = 0;
    options.onProgress?.({ phase: 'mapping', completed, total, message: `Summarizing ${total} sections` });

    return fanOut(
      texts,
      async (chunkText, _index, signal) => {
        const summary = await this.generator.generate(MAP_SYSTEM_PROMPT, buildMapPrompt(chunkText), { signal });
        completed++;
        options.onProgress?.({
          phase: 'mapping',
          completed,
          total,
          message: `Summarized ${completed}/${total} sections`,
        });
        return summary;
      },
      { signal: options.signal, concurrency: this.maxConcurrency }
    );
  }

  private async reducePass(summaries: string[], pass: number, options: SummarizeOptions): Promise<string[]> {
    const batches = toBatches(summaries, this.maxBatchSize);
    const total = batches.length;
    let completed = 0;
    options.onProgress?.({ phase: 'reducing', completed, total, message: `Reduce pass ${pass}: ${total} batches` });

    return fanOut(
      batches,
      async (batch, _index, signal) => {
        const combined = await this.generator.generate(REDUCE_SYSTEM_PROMPT, buildCombinePrompt(batch), { signal });
        completed++;
        options.onProgress?.({
          phase: 'reducing',
          completed,
          total,
          message: `Reduce pass ${pass}: combined ${completed}/${total} batches`,
        });
        return combined;
      },
      { signal: options.signal, concurrency: this.maxConcurrency }
    );
  }
}
