/**
 * @file tests/result-set.test.ts
 * @description Unit tests for the flat results rows and results-file validation.
 */

import { describe, expect, it } from 'vitest';
import { buildComparisonRows, buildEvaluationReport } from '../src/lib/aggregator';
import {
  buildResultsFile,
  collidingColumns,
  parseResultsFile,
  RESULTS_SCHEMA,
  rowsFromFlat,
  toFlatRows,
  type ResultsMeta,
} from '../src/lib/result-set';
import { DEFICIT_THRESHOLDS, REPORT_SIZES } from '../src/shared/evaluator-config';
import { buildResultSet, pair, texts } from './fixtures';

const meta: ResultsMeta = {
  evaluator_version: 'shinglebench-evaluator@test',
  content_hash: 'abc123',
  generated_at: '2026-01-01T00:00:00.000Z',
  cache_ttl_hours: 72,
  options: {
    shingle_size: 4,
    tokenizer: 'word',
    overlap: 'multiset',
    document_order: 'lexicographic',
    text_field: 'articleBody',
    rank_by: 'f1_gap',
    thresholds: DEFICIT_THRESHOLDS,
    report: REPORT_SIZES,
  },
  sources: ['mine', 'ref'],
  pair,
  inputs: { ground_truth: '/data/truth.json', predictions: { mine: '/data/mine.json', ref: '/data/ref.json' } },
};

describe('toFlatRows', () => {
  it('emits one row per document with per-source columns and gaps', () => {
    const rows = toFlatRows(buildResultSet(), pair);
    expect(rows.map((row) => row.document_id)).toEqual(['a', 'b', 'c']);
    expect(Object.keys(rows[0])).toEqual([
      'document_id',
      'truth_len',
      'mine_precision',
      'mine_recall',
      'mine_f1',
      'mine_len',
      'mine_tp',
      'mine_fp',
      'mine_fn',
      'ref_precision',
      'ref_recall',
      'ref_f1',
      'ref_len',
      'ref_tp',
      'ref_fp',
      'ref_fn',
      'precision_gap',
      'recall_gap',
      'f1_gap',
    ]);
    expect(rows[1]).toMatchObject({
      document_id: 'b',
      truth_len: 5,
      mine_len: 0,
      mine_tp: 0,
      mine_fn: 2,
      ref_tp: 2,
      ref_f1: 1,
      f1_gap: 1,
    });
  });

  it('round-trips into the comparison rows', () => {
    const resultSet = buildResultSet();
    expect(rowsFromFlat(toFlatRows(resultSet, pair), pair)).toEqual(buildComparisonRows(resultSet, pair));
  });
});

describe('collidingColumns', () => {
  it('finds the row columns a source name would overwrite', () => {
    expect(collidingColumns('truth')).toEqual(['truth_len']);
    expect(collidingColumns('mine')).toEqual([]);
    expect(collidingColumns('document')).toEqual([]);
  });
});

describe('parseResultsFile', () => {
  const resultSet = buildResultSet();
  const results = buildResultsFile({
    resultSet,
    report: buildEvaluationReport(resultSet, pair, texts),
    meta,
  });

  it('accepts a serialized results file', () => {
    const parsed = parseResultsFile(JSON.parse(JSON.stringify(results)), 'results.json');
    expect(parsed.schema).toBe(RESULTS_SCHEMA);
    expect(parsed.meta).toEqual(meta);
    expect(parsed.rows).toEqual(results.rows);
    expect(parsed.report.ranked.map((row) => row.documentId)).toEqual(['b', 'c', 'a']);
  });

  it('names the file and the offending field', () => {
    expect(() => parseResultsFile({ ...results, schema: 'other/1' }, 'results.json')).toThrow(
      /^Results file results\.json does not match shinglebench\.results\/1 \(schema: /,
    );
    expect(() => parseResultsFile(null, 'broken.json')).toThrow(
      /^Results file broken\.json does not match shinglebench\.results\/1 \(root: /,
    );
  });
});
