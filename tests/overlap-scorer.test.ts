/**
 * @file tests/overlap-scorer.test.ts
 * @description Unit tests for precision/recall/F1 over shingle collections.
 */

import { describe, expect, it } from 'vitest';
import { f1Score, scoreOverlap } from '../src/lib/overlap-scorer';
import { buildShingles } from '../src/lib/shingles';
import { tokenize } from '../src/lib/tokenizer';
import type { OverlapStrategy } from '../src/shared/evaluator-config';

const score = (truth: string, prediction: string, size = 4, overlap: OverlapStrategy = 'multiset') =>
  scoreOverlap(
    buildShingles(tokenize(truth), size, overlap),
    buildShingles(tokenize(prediction), size, overlap),
  );

describe('scoreOverlap', () => {
  it('scores identical texts as a perfect match', () => {
    const result = score('The cat sat on the mat', 'the cat sat on the mat');
    expect(result).toEqual({ tp: 3, fp: 0, fn: 0, precision: 1, recall: 1, f1: 1 });
  });

  it('scores an empty prediction as zero while keeping the missed shingles', () => {
    expect(score('a b c d e', '')).toEqual({ tp: 0, fp: 0, fn: 2, precision: 0, recall: 0, f1: 0 });
  });

  it('gives recall 1 and precision 0 when the truth is empty', () => {
    expect(score('', 'x y z w')).toEqual({ tp: 0, fp: 1, fn: 0, precision: 0, recall: 1, f1: 0 });
  });

  it('scores two empty texts as zero', () => {
    expect(score('', '')).toEqual({ tp: 0, fp: 0, fn: 0, precision: 0, recall: 0, f1: 0 });
  });

  it('computes partial overlap', () => {
    const result = score('a b c d e f', 'a b c d x');
    expect(result.tp).toBe(1);
    expect(result.fp).toBe(1);
    expect(result.fn).toBe(2);
    expect(result.precision).toBe(0.5);
    expect(result.recall).toBeCloseTo(1 / 3, 10);
    expect(result.f1).toBeCloseTo(0.4, 10);
  });

  it('caps multiset matches at the smaller count', () => {
    const result = score('a a a', 'a a a a a', 2, 'multiset');
    expect(result).toEqual({ tp: 2, fp: 2, fn: 0, precision: 0.5, recall: 1, f1: 2 / 3 });
  });

  it('ignores repetition under set overlap', () => {
    expect(score('a a a', 'a a a a a', 2, 'set')).toEqual({
      tp: 1,
      fp: 0,
      fn: 0,
      precision: 1,
      recall: 1,
      f1: 1,
    });
  });

  it('compares mixed representations by presence only', () => {
    const result = scoreOverlap(
      buildShingles(['a', 'a', 'a'], 2, 'set'),
      buildShingles(['a', 'a', 'a', 'a', 'a'], 2, 'multiset'),
    );
    expect(result.tp).toBe(1);
    expect(result.fp).toBe(0);
  });

  it('keeps every metric within [0, 1]', () => {
    const result = score('one two three four five six seven', 'four five six seven eight nine');
    [result.precision, result.recall, result.f1].forEach((value) => {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(1);
    });
  });
});

describe('f1Score', () => {
  it('is zero when both inputs are zero', () => {
    expect(f1Score(0, 0)).toBe(0);
  });

  it('is the harmonic mean otherwise', () => {
    expect(f1Score(0.5, 1)).toBeCloseTo(2 / 3, 10);
  });
});
