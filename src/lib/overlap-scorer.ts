/**
 * @file src/lib/overlap-scorer.ts
 * @description Compares a ground-truth shingle collection with a predicted one and derives
 *              precision, recall and F1 from the true/false positive and false negative counts.
 *
 * Degenerate inputs never throw:
 *   - an empty prediction scores 0/0/0, even against an empty truth;
 *   - an empty truth with a non-empty prediction scores precision 0, recall 1, F1 0.
 */

import type { ShingleCollection } from './shingles';
import { shingleTotal } from './shingles';

export interface OverlapCounts {
  tp: number;
  fp: number;
  fn: number;
}

export interface OverlapScore extends OverlapCounts {
  precision: number;
  recall: number;
  f1: number;
}

const setCounts = (truth: ReadonlySet<string>, prediction: ReadonlySet<string>): OverlapCounts => {
  let tp = 0;
  prediction.forEach((shingle) => {
    if (truth.has(shingle)) {
      tp += 1;
    }
  });
  return { tp, fp: prediction.size - tp, fn: truth.size - tp };
};

const multisetCounts = (
  truth: ReadonlyMap<string, number>,
  prediction: ReadonlyMap<string, number>,
): OverlapCounts => {
  const keys = new Set<string>([...truth.keys(), ...prediction.keys()]);
  let tp = 0;
  let fp = 0;
  let fn = 0;
  keys.forEach((key) => {
    const truthCount = truth.get(key) ?? 0;
    const predCount = prediction.get(key) ?? 0;
    tp += Math.min(truthCount, predCount);
    fp += Math.max(0, predCount - truthCount);
    fn += Math.max(0, truthCount - predCount);
  });
  return { tp, fp, fn };
};

const asSet = (collection: ShingleCollection): Set<string> =>
  collection.kind === 'set' ? collection.shingles : new Set(collection.counts.keys());

export const countOverlap = (
  truth: ShingleCollection,
  prediction: ShingleCollection,
): OverlapCounts => {
  if (truth.kind === 'multiset' && prediction.kind === 'multiset') {
    return multisetCounts(truth.counts, prediction.counts);
  }
  // Mixed representations fall back to presence-only comparison.
  return setCounts(asSet(truth), asSet(prediction));
};

const ratio = (numerator: number, denominator: number): number =>
  denominator > 0 ? numerator / denominator : 0;

export const f1Score = (precision: number, recall: number): number =>
  precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;

export const scoreOverlap = (
  truth: ShingleCollection,
  prediction: ShingleCollection,
): OverlapScore => {
  const counts = countOverlap(truth, prediction);
  if (shingleTotal(prediction) === 0) {
    return { ...counts, precision: 0, recall: 0, f1: 0 };
  }
  if (shingleTotal(truth) === 0) {
    return { ...counts, precision: 0, recall: 1, f1: 0 };
  }
  const precision = ratio(counts.tp, counts.tp + counts.fp);
  const recall = ratio(counts.tp, counts.tp + counts.fn);
  return { ...counts, precision, recall, f1: f1Score(precision, recall) };
};
