/**
 * @file src/lib/shingles.ts
 * @description Groups token sequences into overlapping n-gram shingles, either as a set of
 *              distinct shingles or as a multiset that keeps occurrence counts.
 */

import type { OverlapStrategy } from '../shared/evaluator-config';
import { DEFAULT_OVERLAP, SHINGLE_SIZE } from '../shared/evaluator-config';

export interface ShingleSet {
  kind: 'set';
  shingles: Set<string>;
}

export interface ShingleMultiset {
  kind: 'multiset';
  counts: Map<string, number>;
}

export type ShingleCollection = ShingleSet | ShingleMultiset;

const normalizeSize = (size: number): number =>
  Number.isFinite(size) && size >= 1 ? Math.floor(size) : 1;

/**
 * Windows of `size` tokens joined by a single space. A sequence shorter than the
 * window yields one truncated shingle so short documents still score.
 */
const windows = (tokens: readonly string[], size: number): string[] => {
  if (tokens.length === 0) {
    return [];
  }
  const n = normalizeSize(size);
  if (tokens.length < n) {
    return [tokens.join(' ')];
  }
  const result: string[] = [];
  for (let i = 0; i <= tokens.length - n; i += 1) {
    result.push(tokens.slice(i, i + n).join(' '));
  }
  return result;
};

export const shingleSet = (tokens: readonly string[], size: number = SHINGLE_SIZE): ShingleSet => ({
  kind: 'set',
  shingles: new Set(windows(tokens, size)),
});

export const shingleMultiset = (
  tokens: readonly string[],
  size: number = SHINGLE_SIZE,
): ShingleMultiset => {
  const counts = new Map<string, number>();
  windows(tokens, size).forEach((shingle) => {
    counts.set(shingle, (counts.get(shingle) ?? 0) + 1);
  });
  return { kind: 'multiset', counts };
};

export const buildShingles = (
  tokens: readonly string[],
  size: number = SHINGLE_SIZE,
  representation: OverlapStrategy = DEFAULT_OVERLAP,
): ShingleCollection =>
  representation === 'set' ? shingleSet(tokens, size) : shingleMultiset(tokens, size);

/** Number of shingles in the collection, counting repeats for multisets. */
export const shingleTotal = (collection: ShingleCollection): number => {
  if (collection.kind === 'set') {
    return collection.shingles.size;
  }
  let total = 0;
  collection.counts.forEach((count) => {
    total += count;
  });
  return total;
};
