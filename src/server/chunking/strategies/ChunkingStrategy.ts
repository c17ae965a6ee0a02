/**
 * ChunkingStrategy - Interface for chunking strategies
 *
 * A strategy turns trimmed document text into ordered, located chunk texts.
 * Indices and the short-document fast path are handled by TextChunker.
 */

/**
 * Strategy configuration
 */
export interface StrategyConfig {
  chunkSize: number; // Maximum chunk size in characters
  chunkOverlap: number; // Maximum overlap between consecutive chunks in characters
}

/**
 * A piece of the input and the offset it starts at
 */
export interface TextSpan {
  text: string;
  start: number;
}

/**
 * ChunkingStrategy interface
 */
export interface ChunkingStrategy {
  /**
   * Get strategy name
   */
  getName(): string;

  /**
   * Split text into ordered chunks, each at most `config.chunkSize` long
   *
   * Must be deterministic and must not drop non-whitespace content. Every
   * span's text is trimmed and equals `text.slice(start, start + length)`.
   */
  split(text: string, config: StrategyConfig): TextSpan[];
}
