/**
 * TextChunker - Splits document text into bounded, ordered, overlapping chunks
 *
 * Short documents (trimmed length within chunkSize) become a single chunk so
 * they cost one generation call. Longer documents go through the configured
 * strategy, recursive separator splitting by default.
 */

import { ConfigurationError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { ChunkingStrategy, StrategyConfig } from './strategies/ChunkingStrategy.js';
import { RecursiveCharacterStrategy } from './strategies/RecursiveCharacterStrategy.js';

export const DEFAULT_CHUNK_SIZE = 4000; // ~1000 tokens
export const DEFAULT_CHUNK_OVERLAP = 200; // ~50 tokens

/**
 * One ordered unit of document text
 */
export interface Chunk {
  index: number;
  text: string;
  length: number;
  start: number; // Offset of the chunk in the trimmed input
}

/**
 * Chunking configuration
 */
export interface ChunkingConfig {
  chunkSize?: number;
  chunkOverlap?: number;
  strategy?: ChunkingStrategy;
}

export class TextChunker {
  private readonly config: StrategyConfig;
  private readonly strategy: ChunkingStrategy;

  constructor(config: ChunkingConfig = {}) {
    const chunkSize = config.chunkSize ?? DEFAULT_CHUNK_SIZE;
    const chunkOverlap = config.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;

    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new ConfigurationError('TextChunker', ['CHUNK_SIZE'], `chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new ConfigurationError(
        'TextChunker',
        ['CHUNK_OVERLAP'],
        `chunkOverlap must be an integer in [0, ${chunkSize - 1}], got ${chunkOverlap}`
      );
    }

    this.config = { chunkSize, chunkOverlap };
    this.strategy = config.strategy ?? new RecursiveCharacterStrategy();
  }

  get chunkSize(): number {
    return this.config.chunkSize;
  }

  get chunkOverlap(): number {
    return this.config.chunkOverlap;
  }

  /**
   * Split text into chunks
   *
   * @returns empty array for blank input, one chunk for short input
   */
  split(text: string): Chunk[] {
    const trimmed = text.trim();
    if (!trimmed) {
      return [];
    }

    if (trimmed.length <= this.config.chunkSize) {
      return [{ index: 0, text: trimmed, length: trimmed.length, start: 0 }];
    }

    const chunks = this.strategy
      .split(trimmed, this.config)
      .map((span, index) => ({ index, text: span.text, length: span.text.length, start: span.start }));

    logger.debug(
      {
        strategy: this.strategy.getName(),
        textLength: trimmed.length,
        chunkCount: chunks.length,
        chunkSize: this.config.chunkSize,
        chunkOverlap: this.config.chunkOverlap,
      },
      'Chunked document text'
    );

    return chunks;
  }

  /**
   * Number of chunks `split` would produce for this text
   */
  countChunks(text: string): number {
    return this.split(text).length;
  }
}

/**
 * Split text with explicit parameters
 */
export function split(text: string, chunkSize: number, overlap: number): Chunk[] {
  return new TextChunker({ chunkSize, chunkOverlap: overlap }).split(text);
}
