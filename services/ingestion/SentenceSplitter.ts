import type { ChunkingOptions } from '../../shared/types';
import { ValidationError } from '../base/ServiceError';

const PARAGRAPH_BREAK = /\n[ \t]*\n/;
const SENTENCE_END = /(?<=[.!?])\s+/;

export function validateChunkingOptions(options: ChunkingOptions): void {
  const { chunkSize, chunkOverlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ValidationError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new ValidationError(`chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`);
  }
}

/**
 * Split text into sentences. Paragraph breaks always end a sentence; inside
 * a paragraph whitespace is collapsed and sentences end at `.`, `!` or `?`
 * followed by whitespace.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  for (const paragraph of text.split(PARAGRAPH_BREAK)) {
    const normalized = paragraph.replace(/\s+/g, ' ').trim();
    if (!normalized) {
      continue;
    }
    for (const sentence of normalized.split(SENTENCE_END)) {
      if (sentence) {
        sentences.push(sentence);
      }
    }
  }
  return sentences;
}

function joinedLength(parts: readonly string[]): number {
  if (parts.length === 0) {
    return 0;
  }
  return parts.reduce((sum, part) => sum + part.length, 0) + parts.length - 1;
}

/**
 * Trailing whole sentences of `parts` whose joined length fits in `overlap`.
 */
function overlapTail(parts: readonly string[], overlap: number): string[] {
  const tail: string[] = [];
  let length = 0;
  for (let i = parts.length - 1; i >= 0; i--) {
    const next = length === 0 ? parts[i].length : length + 1 + parts[i].length;
    if (next > overlap) {
      break;
    }
    tail.unshift(parts[i]);
    length = next;
  }
  return tail;
}

/**
 * Greedily pack sentences (joined by a space) into chunks of at most
 * `chunkSize` characters. When a chunk is closed, its trailing sentences
 * fitting in `chunkOverlap` characters open the next one. A sentence longer
 * than `chunkSize` becomes a chunk of its own and carries no overlap.
 */
export function packSentences(sentences: readonly string[], options: ChunkingOptions): string[] {
  validateChunkingOptions(options);
  const { chunkSize, chunkOverlap } = options;

  const chunks: string[] = [];
  let current: string[] = [];

  for (const sentence of sentences) {
    if (sentence.length > chunkSize) {
      if (current.length > 0) {
        chunks.push(current.join(' '));
      }
      chunks.push(sentence);
      current = [];
      continue;
    }

    const candidate = current.length === 0 ? sentence.length : joinedLength(current) + 1 + sentence.length;
    if (candidate <= chunkSize) {
      current.push(sentence);
      continue;
    }

    chunks.push(current.join(' '));
    const carried = overlapTail(current, chunkOverlap);
    while (carried.length > 0 && joinedLength(carried) + 1 + sentence.length > chunkSize) {
      carried.shift();
    }
    current = [...carried, sentence];
  }

  if (current.length > 0) {
    chunks.push(current.join(' '));
  }
  return chunks;
}

export function splitText(text: string, options: ChunkingOptions): string[] {
  return packSentences(splitSentences(text), options);
}
