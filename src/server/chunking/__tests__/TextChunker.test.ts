import { TextChunker, split, DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from '../TextChunker.js';
import { ConfigurationError } from '../../types/errors.js';

function buildDocument(paragraphs: number, tokensPerParagraph: number): { text: string; tokens: string[] } {
  const tokens: string[] = [];
  const blocks: string[] = [];
  for (let p = 0; p < paragraphs; p++) {
    const words: string[] = [];
    for (let w = 0; w < tokensPerParagraph; w++) {
      const token = `t${String(tokens.length + 1).padStart(4, '0')}`;
      tokens.push(token);
      words.push(token);
    }
    blocks.push(words.join(' '));
  }
  return { text: blocks.join('\n\n'), tokens };
}

describe('TextChunker', () => {
  describe('short and empty input', () => {
    it('should return no chunks for blank text', () => {
      expect(split('', 100, 10)).toEqual([]);
      expect(split('   \n\t  ', 100, 10)).toEqual([]);
    });

    it('should return the trimmed text as a single chunk when it fits', () => {
      expect(split('  hello world  ', 20, 5)).toEqual([
        { index: 0, text: 'hello world', length: 11, start: 0 },
      ]);
    });

    it('should keep text exactly chunkSize long in one chunk', () => {
      const chunks = split('abcdefghij', 10, 2);
      expect(chunks).toHaveLength(1);
      expect(chunks[0].text).toBe('abcdefghij');
    });
  });

  describe('recursive splitting', () => {
    it('should prefer paragraph breaks and report chunk offsets', () => {
      const text = 'aaaa bbbb\n\ncccc dddd\n\neeee ffff';
      const chunks = split(text, 20, 0);

      expect(chunks.map((c) => c.text)).toEqual(['aaaa bbbb\n\ncccc dddd', 'eeee ffff']);
      expect(chunks.map((c) => c.start)).toEqual([0, 22]);
      expect(chunks.map((c) => c.index)).toEqual([0, 1]);
    });

    it('should carry a bounded overlap between consecutive chunks', () => {
      const chunks = split('one two three four five six', 10, 5);

      expect(chunks.map((c) => c.text)).toEqual(['one two', 'two three', 'four five', 'five six']);
      expect(chunks.map((c) => c.start)).toEqual([0, 4, 14, 19]);
    });

    it('should report the offset of each chunk in repetitive text', () => {
      expect(split('ab ab ab ab ab ab', 10, 5)).toEqual([
        { index: 0, text: 'ab ab ab', length: 8, start: 0 },
        { index: 1, text: 'ab ab ab', length: 8, start: 6 },
        { index: 2, text: 'ab ab', length: 5, start: 12 },
      ]);
    });

    it('should report offsets of hard-split pieces', () => {
      const chunks = split('hi xxxxxxxxxxxx', 5, 0);
      expect(chunks.map((c) => c.start)).toEqual([0, 3, 7, 12]);
    });

    it('should hard-split text without any separator', () => {
      const chunks = split('abcdefghijkl', 5, 0);
      expect(chunks.map((c) => c.text)).toEqual(['abcde', 'fghij', 'kl']);
    });

    it('should hard-split a single word longer than chunkSize', () => {
      const chunks = split('hi xxxxxxxxxxxx', 5, 0);
      expect(chunks.map((c) => c.text)).toEqual(['hi', 'xxxx', 'xxxxx', 'xxx']);
    });

    it('should never cut a surrogate pair', () => {
      const chunks = split('😀😀😀😀', 3, 0);
      expect(chunks.map((c) => c.text)).toEqual(['😀', '😀', '😀', '😀']);
      expect(chunks.every((c) => c.length === 2)).toBe(true);
    });
  });

  describe('chunk invariants', () => {
    const chunkSize = 50;
    const overlap = 12;
    const { text, tokens } = buildDocument(8, 23);
    const chunks = split(text, chunkSize, overlap);

    it('should produce several chunks within the size limit', () => {
      expect(chunks.length).toBeGreaterThan(1);
      for (const chunk of chunks) {
        expect(chunk.length).toBeLessThanOrEqual(chunkSize);
        expect(chunk.length).toBe(chunk.text.length);
      }
    });

    it('should place every chunk at its reported offset', () => {
      for (const chunk of chunks) {
        expect(text.slice(chunk.start, chunk.start + chunk.length)).toBe(chunk.text);
      }
    });

    it('should leave only whitespace between consecutive chunks and overlap at most the configured amount', () => {
      for (let i = 1; i < chunks.length; i++) {
        const previousEnd = chunks[i - 1].start + chunks[i - 1].length;
        const next = chunks[i];
        if (next.start > previousEnd) {
          expect(text.slice(previousEnd, next.start).trim()).toBe('');
        } else {
          expect(previousEnd - next.start).toBeLessThanOrEqual(overlap);
        }
      }
    });

    it('should not drop any content', () => {
      for (const token of tokens) {
        expect(chunks.some((c) => c.text.includes(token))).toBe(true);
      }
    });

    it('should be deterministic', () => {
      expect(split(text, chunkSize, overlap)).toEqual(chunks);
    });
  });

  describe('configuration', () => {
    it('should use the default chunk size and overlap', () => {
      const chunker = new TextChunker();
      expect(chunker.chunkSize).toBe(DEFAULT_CHUNK_SIZE);
      expect(chunker.chunkOverlap).toBe(DEFAULT_CHUNK_OVERLAP);
    });

    it('should reject a non-positive chunk size', () => {
      expect(() => new TextChunker({ chunkSize: 0 })).toThrow(ConfigurationError);
    });

    it('should reject an overlap that is not smaller than the chunk size', () => {
      expect(() => new TextChunker({ chunkSize: 10, chunkOverlap: 10 })).toThrow(ConfigurationError);
      expect(() => new TextChunker({ chunkSize: 10, chunkOverlap: -1 })).toThrow(ConfigurationError);
    });

    it('should count chunks the same way split produces them', () => {
      const chunker = new TextChunker({ chunkSize: 20, chunkOverlap: 0 });
      expect(chunker.countChunks('aaaa bbbb\n\ncccc dddd\n\neeee ffff')).toBe(2);
      expect(chunker.countChunks('   ')).toBe(0);
    });
  });
});
