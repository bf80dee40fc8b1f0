import { describe, it, expect } from 'vitest';
import { packSentences, splitSentences, splitText, validateChunkingOptions } from '../SentenceSplitter';
import { ValidationError } from '../../base/ServiceError';

describe('SentenceSplitter', () => {
  describe('splitSentences', () => {
    it('splits on terminal punctuation and paragraph breaks', () => {
      const text = 'First one. Second one!  Third?\n\nNew para here.';

      expect(splitSentences(text)).toEqual([
        'First one.',
        'Second one!',
        'Third?',
        'New para here.',
      ]);
    });

    it('joins lines within a paragraph', () => {
      expect(splitSentences('Line one\ncontinues here. Next.')).toEqual([
        'Line one continues here.',
        'Next.',
      ]);
    });

    it('returns nothing for whitespace', () => {
      expect(splitSentences('  \n\n \t ')).toEqual([]);
    });
  });

  describe('packSentences', () => {
    const sentences = ['aaaa.', 'bbbb.', 'cccc.'];

    it('carries trailing sentences that fit in the overlap', () => {
      expect(packSentences(sentences, { chunkSize: 11, chunkOverlap: 5 })).toEqual([
        'aaaa. bbbb.',
        'bbbb. cccc.',
      ]);
    });

    it('carries nothing when overlap is zero', () => {
      expect(packSentences(sentences, { chunkSize: 11, chunkOverlap: 0 })).toEqual([
        'aaaa. bbbb.',
        'cccc.',
      ]);
    });

    it('emits an oversized sentence as its own chunk', () => {
      const long = 'x'.repeat(30);

      expect(packSentences(['short.', long, 'tail.'], { chunkSize: 20, chunkOverlap: 5 })).toEqual([
        'short.',
        long,
        'tail.',
      ]);
    });
  });

  describe('splitText', () => {
    it('keeps a short text in one chunk', () => {
      expect(splitText('The cat sat on the mat.', { chunkSize: 1000, chunkOverlap: 200 })).toEqual([
        'The cat sat on the mat.',
      ]);
    });

    it('bounds chunk length and keeps every sentence', () => {
      const all = Array.from({ length: 50 }, (_, i) => `Sentence number ${i} is here.`);
      const chunks = splitText(all.join(' '), { chunkSize: 100, chunkOverlap: 30 });

      expect(chunks.length).toBeGreaterThan(1);
      for (const chunk of chunks) {
        expect(chunk.length).toBeLessThanOrEqual(100);
      }
      for (const sentence of all) {
        expect(chunks.some(chunk => chunk.includes(sentence))).toBe(true);
      }
    });
  });

  describe('validateChunkingOptions', () => {
    it('rejects an overlap not smaller than the chunk size', () => {
      expect(() => validateChunkingOptions({ chunkSize: 100, chunkOverlap: 100 })).toThrow(ValidationError);
    });

    it('rejects a non-positive chunk size', () => {
      expect(() => validateChunkingOptions({ chunkSize: 0, chunkOverlap: 0 })).toThrow(ValidationError);
    });
  });
});
