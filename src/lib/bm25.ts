/**
 * BM25 sparse vectors + Reciprocal Rank Fusion
 *
 * Documents are tokenized with a light stemmer, terms are hashed into a
 * 32-bit index space and weighted with BM25 term-frequency saturation.
 * IDF is left to the backend (Qdrant's `idf` modifier on the sparse slot).
 * Queries weight every distinct term 1.
 *
 * k1=1.3, b=0.75; RRF k=60.
 */

import type { SparseVector } from './storage/types.js';

const K1 = 1.3; // Term frequency saturation
const B = 0.75; // Length normalization
const AVG_DOC_LENGTH = 32; // Assumed average document length, in terms

export const RRF_K = 60;

// ============================================================================
// Tokenizer
// ============================================================================

/**
 * Porter Stemmer (simplified)
 * Handles common English suffixes
 */
export function stem(word: string): string {
  if (word.length < 3) return word;

  let w = word.toLowerCase();

  // Step 1a: plurals
  if (w.endsWith('sses')) w = w.slice(0, -2);
  else if (w.endsWith('ies')) w = w.slice(0, -2);
  else if (w.endsWith('ss')) {
    /* keep */
  } else if (w.endsWith('s')) w = w.slice(0, -1);

  // Step 1b: -ed, -ing
  if (w.endsWith('eed')) {
    if (w.length > 4) w = w.slice(0, -1);
  } else if (w.endsWith('ed')) {
    const base = w.slice(0, -2);
    if (/[aeiou]/.test(base)) w = base;
  } else if (w.endsWith('ing')) {
    const base = w.slice(0, -3);
    if (/[aeiou]/.test(base)) w = base;
  }

  // Step 2: common suffixes
  const suffixes: [string, string][] = [
    ['ational', 'ate'],
    ['tional', 'tion'],
    ['ization', 'ize'],
    ['ation', 'ate'],
    ['fulness', 'ful'],
    ['ousness', 'ous'],
    ['iveness', 'ive'],
    ['ement', 'e'],
    ['ment', ''],
    ['ness', ''],
    ['able', ''],
    ['ible', ''],
    ['ful', ''],
    ['less', ''],
    ['ive', ''],
    ['ize', ''],
    ['ise', ''],
    ['ly', ''],
    ['er', ''],
    ['or', ''],
  ];

  for (const [suffix, replacement] of suffixes) {
    if (w.endsWith(suffix) && w.length - suffix.length >= 2) {
      w = w.slice(0, -suffix.length) + replacement;
      break;
    }
  }

  return w;
}

/**
 * Tokenize natural-language text into stemmed terms, repeats kept.
 * Words shorter than 3 characters are dropped. When stemming changes a
 * word the original is kept as an extra term for exact matches.
 */
export function tokenize(text: string): string[] {
  const words = text
    .replace(/[^a-zA-Z0-9\s]/g, ' ')
    .toLowerCase()
    .split(/\s+/)
    .filter((t) => t.length > 2);

  const terms: string[] = [];
  for (const word of words) {
    const stemmed = stem(word);
    terms.push(stemmed);
    if (stemmed !== word) terms.push(word);
  }
  return terms;
}

/** FNV-1a, 32-bit. Sparse indices must fit an unsigned 32-bit integer. */
export function hashTerm(term: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < term.length; i++) {
    hash ^= term.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

// ============================================================================
// Sparse encoder
// ============================================================================

export interface SparseEncoder {
  encodeDocument(text: string): SparseVector;
  encodeQuery(text: string): SparseVector;
}

function termFrequencies(text: string): { counts: Map<number, number>; length: number } {
  const terms = tokenize(text);
  const counts = new Map<number, number>();
  for (const term of terms) {
    const index = hashTerm(term);
    counts.set(index, (counts.get(index) ?? 0) + 1);
  }
  return { counts, length: terms.length };
}

function toSparse(weights: Map<number, number>): SparseVector {
  const indices = [...weights.keys()].sort((a, b) => a - b);
  return { indices, values: indices.map((i) => weights.get(i) ?? 0) };
}

export class Bm25SparseEncoder implements SparseEncoder {
  encodeDocument(text: string): SparseVector {
    const { counts, length } = termFrequencies(text);
    const norm = K1 * (1 - B + (B * length) / AVG_DOC_LENGTH);
    const weights = new Map<number, number>();
    for (const [index, tf] of counts) {
      weights.set(index, (tf * (K1 + 1)) / (tf + norm));
    }
    return toSparse(weights);
  }

  encodeQuery(text: string): SparseVector {
    const { counts } = termFrequencies(text);
    const weights = new Map<number, number>();
    for (const index of counts.keys()) weights.set(index, 1);
    return toSparse(weights);
  }
}

// ============================================================================
// Reciprocal Rank Fusion
// ============================================================================

export interface RankedItem<T> {
  id: string;
  item: T;
}

export interface FusedItem<T> extends RankedItem<T> {
  score: number;
  /** Number of input lists the item appeared in */
  appearances: number;
}

/**
 * Reciprocal Rank Fusion: RRF(d) = Σ 1/(k + rank(d)), rank 1-based.
 *
 * Sorted by fused score desc, then appearances desc, then id asc.
 * A duplicate id inside one list counts at its best rank only.
 * The item kept is the first one seen.
 */
export function reciprocalRankFusion<T>(lists: RankedItem<T>[][], k: number = RRF_K): FusedItem<T>[] {
  const fused = new Map<string, FusedItem<T>>();

  for (const list of lists) {
    const seen = new Set<string>();
    list.forEach((entry, index) => {
      if (seen.has(entry.id)) return;
      seen.add(entry.id);

      const contribution = 1 / (k + index + 1);
      const existing = fused.get(entry.id);
      if (existing) {
        existing.score += contribution;
        existing.appearances += 1;
      } else {
        fused.set(entry.id, { id: entry.id, item: entry.item, score: contribution, appearances: 1 });
      }
    });
  }

  return [...fused.values()].sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    if (b.appearances !== a.appearances) return b.appearances - a.appearances;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });
}
