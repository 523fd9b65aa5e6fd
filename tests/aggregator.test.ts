/**
 * @file tests/aggregator.test.ts
 * @description Unit tests for ranking, deficit buckets, boilerplate mining and report assembly.
 */

import { describe, expect, it } from 'vitest';
import {
  averageBySource,
  buildComparisonRows,
  buildEvaluationReport,
  classifyDeficits,
  detectBoilerplate,
  excerpt,
  extraTokens,
  rankDocuments,
} from '../src/lib/aggregator';
import { REPORT_SIZES } from '../src/shared/evaluator-config';
import { buildResultSet, comparisonRow, metrics, pair, texts } from './fixtures';

describe('rankDocuments', () => {
  const rows = [
    comparisonRow('x', metrics(0.5, 0.5, 0.25, 10), metrics(0.75, 0.5, 0.75, 10)),
    comparisonRow('y', metrics(0.5, 0.5, 0.5, 10), metrics(0.75, 0.75, 0.75, 10)),
    comparisonRow('z', metrics(0.25, 0.5, 0.25, 10), metrics(0.75, 0.5, 0.75, 10)),
  ];

  it('orders by descending F1 gap and keeps input order on ties', () => {
    const ranked = rankDocuments(rows);
    expect(ranked.map((row) => [row.documentId, row.rank, row.gap])).toEqual([
      ['x', 1, 0.5],
      ['z', 2, 0.5],
      ['y', 3, 0.25],
    ]);
  });

  it('ranks by another gap', () => {
    expect(rankDocuments(rows, 'precision_gap').map((row) => row.documentId)).toEqual(['z', 'x', 'y']);
    expect(rankDocuments(rows, 'recall_gap').map((row) => row.documentId)).toEqual(['y', 'x', 'z']);
  });

  it('returns the same top-K on repeated calls', () => {
    const first = rankDocuments(rows, 'f1_gap', 2).map((row) => row.documentId);
    const second = rankDocuments(rows, 'f1_gap', 2).map((row) => row.documentId);
    expect(first).toEqual(['x', 'z']);
    expect(second).toEqual(first);
  });

  it('handles an empty input', () => {
    expect(rankDocuments([], 'f1_gap', 10)).toEqual([]);
  });
});

describe('classifyDeficits', () => {
  it('puts each document in every bucket it qualifies for', () => {
    const buckets = classifyDeficits([
      comparisonRow('p', metrics(0.5, 0.5, 0.5, 40), metrics(0.75, 0.5, 0.75, 40)),
      comparisonRow('e', metrics(0, 0, 0, 0), metrics(0.5, 0.5, 0.5, 12)),
      comparisonRow('o', metrics(0.5, 0.5, 0.5, 250), metrics(0.5, 0.5, 0.5, 120)),
      comparisonRow('s', metrics(0.5, 0.5, 0.5, 250), metrics(0.5, 0.5, 0.5, 100)),
    ]);
    expect(buckets).toEqual({
      precisionDeficit: ['p', 'e'],
      recallDeficit: ['e'],
      f1Deficit: ['p', 'e'],
      emptyExtraction: ['e'],
      overExtraction: ['o'],
    });
  });

  it('does not flag a gap equal to the threshold', () => {
    const buckets = classifyDeficits(
      [comparisonRow('edge', metrics(0.5, 0.5, 0.5, 10), metrics(0.75, 0.75, 0.75, 10))],
      { deficit: 0.25, overExtractionRatio: 2, minComparisonLength: 100 },
    );
    expect(buckets.precisionDeficit).toEqual([]);
    expect(buckets.recallDeficit).toEqual([]);
    expect(buckets.f1Deficit).toEqual([]);
  });

  it('does not count an empty extraction when the truth is empty', () => {
    const buckets = classifyDeficits([
      comparisonRow('blank', metrics(0, 0, 0, 0), metrics(0, 0, 0, 0), 0),
    ]);
    expect(buckets.emptyExtraction).toEqual([]);
  });
});

describe('detectBoilerplate', () => {
  const truth = new Map([
    ['d1', 'the story text'],
    ['d2', 'another story'],
  ]);
  const predictions = new Map([
    ['d1', 'Menu menu login the story text ok'],
    ['d2', 'menu login subscribe another story'],
  ]);

  it('lists prediction tokens missing from the truth, every occurrence included', () => {
    expect(extraTokens(truth.get('d1'), predictions.get('d1'))).toEqual(['menu', 'menu', 'login', 'ok']);
  });

  it('orders by count and drops short tokens', () => {
    expect(detectBoilerplate(['d1', 'd2'], truth, predictions)).toEqual([
      { token: 'menu', count: 3 },
      { token: 'login', count: 2 },
      { token: 'subscribe', count: 1 },
    ]);
  });

  it('filters the length after taking the shortlist', () => {
    expect(detectBoilerplate(['d1', 'd2'], truth, predictions, { shortlist: 3 })).toEqual([
      { token: 'menu', count: 3 },
      { token: 'login', count: 2 },
    ]);
  });

  it('measures token length in code points', () => {
    const wide = new Map([['d', '𠀀𠀀 abc 𠀀𠀀𠀀']]);
    expect(detectBoilerplate(['d'], new Map([['d', 'x']]), wide)).toEqual([
      { token: 'abc', count: 1 },
      { token: '𠀀𠀀𠀀', count: 1 },
    ]);
  });

  it('only looks at the listed documents', () => {
    expect(detectBoilerplate(['d2'], truth, predictions)).toEqual([
      { token: 'menu', count: 1 },
      { token: 'login', count: 1 },
      { token: 'subscribe', count: 1 },
    ]);
  });
});

describe('averageBySource', () => {
  it('macro-averages each source over all documents', () => {
    const averages = averageBySource(buildResultSet(), ['mine', 'ref']);
    expect(averages.mine.documents).toBe(3);
    expect(averages.mine.precision).toBeCloseTo(4 / 9, 10);
    expect(averages.mine.recall).toBeCloseTo(2 / 3, 10);
    expect(averages.mine.f1).toBeCloseTo(0.5, 10);
    expect(averages.ref.precision).toBe(1);
    expect(averages.ref.recall).toBeCloseTo(7 / 9, 10);
    expect(averages.ref.f1).toBeCloseTo(5 / 6, 10);
  });

  it('returns zeros for an empty result set', () => {
    expect(averageBySource([], ['mine'])).toEqual({
      mine: { precision: 0, recall: 0, f1: 0, documents: 0 },
    });
  });
});

describe('excerpt', () => {
  it('counts code points', () => {
    expect(excerpt('😀abc', 2)).toBe('😀a');
    expect(excerpt(undefined, 5)).toBe('');
  });
});

describe('buildComparisonRows', () => {
  it('pairs candidate and baseline metrics with gaps', () => {
    const [a] = buildComparisonRows(buildResultSet(), pair);
    expect(a.documentId).toBe('a');
    expect(a.truthLength).toBe(6);
    expect(a.candidate).toEqual({ precision: 1, recall: 1, f1: 1, length: 6 });
    expect(a.baseline.precision).toBe(1);
    expect(a.baseline.recall).toBeCloseTo(1 / 3, 10);
    expect(a.baseline.f1).toBeCloseTo(0.5, 10);
    expect(a.baseline.length).toBe(4);
    expect(a.gaps.f1_gap).toBeCloseTo(-0.5, 10);
  });
});

describe('buildEvaluationReport', () => {
  const report = buildEvaluationReport(buildResultSet(), pair, texts, {
    sizes: { ...REPORT_SIZES, rankedRows: 2 },
  });

  it('keeps the top ranked rows', () => {
    expect(report.documentCount).toBe(3);
    expect(report.rankBy).toBe('f1_gap');
    expect(report.ranked.map((row) => [row.documentId, row.rank])).toEqual([
      ['b', 1],
      ['c', 2],
    ]);
  });

  it('counts deficits', () => {
    expect(report.deficits).toEqual({
      counts: {
        precisionDeficit: 2,
        recallDeficit: 1,
        f1Deficit: 2,
        emptyExtraction: 1,
        overExtraction: 0,
      },
      emptyExtractionSample: ['b'],
    });
  });

  it('mines boilerplate from the worst documents', () => {
    expect(report.boilerplate).toEqual({ documents: 3, tokens: [{ token: 'home', count: 2 }] });
  });

  it('samples the worst document', () => {
    expect(report.worst?.document.documentId).toBe('b');
    expect(report.worst?.truthExcerpt).toBe('red green blue cyan magenta');
    expect(report.worst?.candidateExcerpt).toBe('');
    expect(report.worst?.baselineExcerpt).toBe('red green blue cyan magenta');
  });

  it('has no worst sample without documents', () => {
    const empty = buildEvaluationReport([], pair, texts);
    expect(empty.worst).toBeNull();
    expect(empty.ranked).toEqual([]);
    expect(empty.boilerplate).toEqual({ documents: 0, tokens: [] });
  });
});
