/**
 * @file tests/fixtures.ts
 * @description Small shared corpus for aggregator, renderer and results-file tests.
 *
 *   a: candidate exact, baseline stops early
 *   b: candidate extracts nothing
 *   c: candidate prepends navigation text
 */

import { evaluateResultSet } from '../src/lib/document-evaluator';
import type { ComparisonRow, SourceMetrics } from '../src/lib/aggregator';
import { computeGaps } from '../src/lib/aggregator';

export const pair = { candidate: 'mine', baseline: 'ref' };

export const texts = {
  groundTruth: new Map([
    ['a', 'one two three four five six'],
    ['b', 'red green blue cyan magenta'],
    ['c', 'alpha beta gamma delta'],
  ]),
  candidate: new Map([
    ['a', 'one two three four five six'],
    ['b', ''],
    ['c', 'Home home alpha beta gamma delta'],
  ]),
  baseline: new Map([
    ['a', 'one two three four'],
    ['b', 'red green blue cyan magenta'],
    ['c', 'alpha beta gamma delta'],
  ]),
};

export const buildResultSet = () =>
  evaluateResultSet(texts.groundTruth, [
    { name: pair.candidate, texts: texts.candidate },
    { name: pair.baseline, texts: texts.baseline },
  ]);

export const metrics = (precision: number, recall: number, f1: number, length: number): SourceMetrics => ({
  precision,
  recall,
  f1,
  length,
});

export const comparisonRow = (
  documentId: string,
  candidate: SourceMetrics,
  baseline: SourceMetrics,
  truthLength = 10,
): ComparisonRow => ({
  documentId,
  truthLength,
  candidate,
  baseline,
  gaps: computeGaps(candidate, baseline),
});
