/**
 * Similarity scorers comparing a candidate output with its ground truth.
 *
 * Encoder-backed scorers come from the model hub; the lexical and pixel scorers
 * here are the built-in fallbacks.
 */

import type { Image } from '../types.js';

export interface Tokenizer {
  readonly name: string;
  tokenize(text: string): string[];
}

/**
 * Preprocessing bundle of a visual-language model. Its tokenizer, when present,
 * is used to split answers for lexical scoring.
 */
export interface Processor {
  readonly name: string;
  readonly tokenizer: Tokenizer | null;
}

export interface SimilarityScorer<TOutput> {
  readonly name: string;
  /** A score in [0, 1]; 1 means identical. */
  compare(reference: TOutput, candidate: TOutput): number;
}

const WORD_PATTERN = /[\p{L}\p{N}]+|[^\s\p{L}\p{N}]/gu;

export function splitWords(text: string): string[] {
  return text.match(WORD_PATTERN) ?? [];
}

/**
 * Token-level F1 over token multisets.
 */
export class TokenOverlapScorer implements SimilarityScorer<string> {
  readonly name = 'token-f1';
  private readonly tokenize: (text: string) => string[];

  constructor(tokenizer: Tokenizer | null = null) {
    this.tokenize = tokenizer ? (text) => tokenizer.tokenize(text) : splitWords;
  }

  compare(reference: string, candidate: string): number {
    const refTokens = this.tokenize(reference);
    const candTokens = this.tokenize(candidate);
    if (refTokens.length === 0 && candTokens.length === 0) return 1;
    if (refTokens.length === 0 || candTokens.length === 0) return 0;

    const counts = new Map<string, number>();
    for (const t of refTokens) counts.set(t, (counts.get(t) ?? 0) + 1);
    let overlap = 0;
    for (const t of candTokens) {
      const remaining = counts.get(t) ?? 0;
      if (remaining > 0) {
        overlap++;
        counts.set(t, remaining - 1);
      }
    }
    if (overlap === 0) return 0;

    const precision = overlap / candTokens.length;
    const recall = overlap / refTokens.length;
    return (2 * precision * recall) / (precision + recall);
  }
}

/**
 * `1 - mean absolute pixel difference / 255`; images of different shapes score 0.
 */
export class PixelSimilarityScorer implements SimilarityScorer<Image> {
  readonly name = 'pixel';

  compare(reference: Image, candidate: Image): number {
    if (
      reference.width !== candidate.width ||
      reference.height !== candidate.height ||
      reference.channels !== candidate.channels
    ) {
      return 0;
    }
    const n = reference.data.length;
    if (n === 0) return 1;
    let total = 0;
    for (let i = 0; i < n; i++) {
      total += Math.abs((reference.data[i] ?? 0) - (candidate.data[i] ?? 0));
    }
    return 1 - total / n / 255;
  }
}
