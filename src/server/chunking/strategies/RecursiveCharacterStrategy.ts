/**
 * RecursiveCharacterStrategy - Separator-priority recursive splitting
 *
 * Tries paragraph breaks first, then line breaks, sentence ends, commas,
 * spaces and finally single characters. Pieces small enough are merged
 * greedily up to the chunk size; pieces that are not are split again with the
 * next separators. A tail of each emitted chunk (at most `chunkOverlap`
 * characters) is carried into the following chunk.
 */

import type { ChunkingStrategy, StrategyConfig, TextSpan } from './ChunkingStrategy.js';

export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', ', ', ' ', ''];

export class RecursiveCharacterStrategy implements ChunkingStrategy {
  constructor(private readonly separators: readonly string[] = DEFAULT_SEPARATORS) {}

  getName(): string {
    return 'recursive-character';
  }

  split(text: string, config: StrategyConfig): TextSpan[] {
    return this.splitRecursive({ text, start: 0 }, this.separators, config);
  }

  private splitRecursive(span: TextSpan, separators: readonly string[], config: StrategyConfig): TextSpan[] {
    const { text } = span;
    const chunks: TextSpan[] = [];

    // Pick the first separator that occurs in the text; '' always matches
    let separator = separators[separators.length - 1] ?? '';
    let nextSeparators: readonly string[] = [];
    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i];
      if (candidate === '') {
        separator = candidate;
        break;
      }
      if (text.includes(candidate)) {
        separator = candidate;
        nextSeparators = separators.slice(i + 1);
        break;
      }
    }

    let pending: TextSpan[] = [];
    for (const piece of splitKeepingSeparator(span, separator)) {
      if (piece.text.length < config.chunkSize) {
        pending.push(piece);
        continue;
      }

      if (pending.length > 0) {
        chunks.push(...this.mergePieces(pending, config));
        pending = [];
      }

      if (nextSeparators.length === 0) {
        pushTrimmed(chunks, [piece]);
      } else {
        chunks.push(...this.splitRecursive(piece, nextSeparators, config));
      }
    }

    if (pending.length > 0) {
      chunks.push(...this.mergePieces(pending, config));
    }

    return chunks;
  }

  /**
   * Greedily merge pieces into chunks of at most chunkSize, carrying a tail of
   * at most chunkOverlap characters from each chunk into the next one.
   */
  private mergePieces(pieces: TextSpan[], config: StrategyConfig): TextSpan[] {
    const merged: TextSpan[] = [];
    const current: TextSpan[] = [];
    let total = 0;

    for (const piece of pieces) {
      const length = piece.text.length;
      if (current.length > 0 && total + length > config.chunkSize) {
        pushTrimmed(merged, current);

        while (total > config.chunkOverlap || (total > 0 && total + length > config.chunkSize)) {
          const dropped = current.shift();
          if (dropped === undefined) {
            break;
          }
          total -= dropped.text.length;
        }
      }

      current.push(piece);
      total += length;
    }

    pushTrimmed(merged, current);
    return merged;
  }
}

/**
 * Split on `separator`, attaching it to the start of the following piece.
 * An empty separator splits into code points so surrogate pairs stay whole.
 */
function splitKeepingSeparator(span: TextSpan, separator: string): TextSpan[] {
  const parts =
    separator === ''
      ? Array.from(span.text)
      : span.text.split(separator).map((part, index) => (index === 0 ? part : separator + part));

  const pieces: TextSpan[] = [];
  let offset = span.start;
  for (const part of parts) {
    if (part !== '') {
      pieces.push({ text: part, start: offset });
    }
    offset += part.length;
  }
  return pieces;
}

/**
 * Join consecutive pieces and push the result trimmed, keeping its offset
 */
function pushTrimmed(target: TextSpan[], pieces: TextSpan[]): void {
  if (pieces.length === 0) {
    return;
  }

  const joined = pieces.map((piece) => piece.text).join('');
  const text = joined.trim();
  if (text) {
    target.push({ text, start: pieces[0].start + joined.indexOf(text) });
  }
}
