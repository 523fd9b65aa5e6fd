/**
 * @file src/lib/result-set.ts
 * @description Shapes an evaluated Result Set into the flat, schema-tagged results file that the
 *              `show` command and downstream tooling (spreadsheets, dashboards) consume, and reads
 *              such a file back into comparison rows.
 */

import { z } from 'zod';
import type {
  DeficitThresholds,
  DocumentOrder,
  OverlapStrategy,
  RankKey,
  ReportSizes,
  TokenizerStrategy,
} from '../shared/evaluator-config';
import {
  DOCUMENT_ORDERS,
  OVERLAP_STRATEGIES,
  RANK_KEYS,
  TOKENIZER_STRATEGIES,
} from '../shared/evaluator-config';
import type { ComparisonPair, ComparisonRow, EvaluationReport, SourceMetrics } from './aggregator';
import { buildComparisonRows, computeGaps } from './aggregator';
import type { ResultSet } from './document-evaluator';

export const RESULTS_SCHEMA = 'shinglebench.results/1';

export type FlatResultRow = Record<string, string | number>;

export interface ResultsOptions {
  shingle_size: number;
  tokenizer: TokenizerStrategy;
  overlap: OverlapStrategy;
  document_order: DocumentOrder;
  text_field: string;
  rank_by: RankKey;
  thresholds: DeficitThresholds;
  report: ReportSizes;
}

export interface ResultsMeta {
  evaluator_version: string;
  content_hash: string;
  generated_at: string;
  cache_ttl_hours: number;
  options: ResultsOptions;
  sources: string[];
  pair: ComparisonPair;
  inputs: {
    ground_truth: string;
    predictions: Record<string, string>;
  };
}

export interface ResultsFile {
  schema: typeof RESULTS_SCHEMA;
  meta: ResultsMeta;
  rows: FlatResultRow[];
  report: EvaluationReport;
}

const sourceColumns = (source: string) => ({
  precision: `${source}_precision`,
  recall: `${source}_recall`,
  f1: `${source}_f1`,
  length: `${source}_len`,
  tp: `${source}_tp`,
  fp: `${source}_fp`,
  fn: `${source}_fn`,
});

export const RESERVED_COLUMNS: readonly string[] = [
  'document_id',
  'truth_len',
  'precision_gap',
  'recall_gap',
  'f1_gap',
];

/** Reserved row columns that a source with this name would overwrite. */
export const collidingColumns = (source: string): string[] =>
  Object.values(sourceColumns(source)).filter((column) => RESERVED_COLUMNS.includes(column));

/**
 * One row per document: per-source counts and metrics, then the candidate/baseline gaps.
 */
export const toFlatRows = (resultSet: ResultSet, pair: ComparisonPair): FlatResultRow[] => {
  const comparison = buildComparisonRows(resultSet, pair);
  return resultSet.map((evaluation, index) => {
    const row: FlatResultRow = {
      document_id: evaluation.documentId,
      truth_len: evaluation.truthLength,
    };
    evaluation.records.forEach((record) => {
      const columns = sourceColumns(record.source);
      row[columns.precision] = record.precision;
      row[columns.recall] = record.recall;
      row[columns.f1] = record.f1;
      row[columns.length] = record.predictionLength;
      row[columns.tp] = record.tp;
      row[columns.fp] = record.fp;
      row[columns.fn] = record.fn;
    });
    const { gaps } = comparison[index];
    row.precision_gap = gaps.precision_gap;
    row.recall_gap = gaps.recall_gap;
    row.f1_gap = gaps.f1_gap;
    return row;
  });
};

const numberField = (row: FlatResultRow, key: string): number => {
  const value = row[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
};

const metricsFromRow = (row: FlatResultRow, source: string): SourceMetrics => {
  const columns = sourceColumns(source);
  return {
    precision: numberField(row, columns.precision),
    recall: numberField(row, columns.recall),
    f1: numberField(row, columns.f1),
    length: numberField(row, columns.length),
  };
};

/** Rebuilds comparison rows from a results file so they can be re-ranked. */
export const rowsFromFlat = (
  rows: readonly FlatResultRow[],
  pair: ComparisonPair,
): ComparisonRow[] =>
  rows.map((row) => {
    const candidate = metricsFromRow(row, pair.candidate);
    const baseline = metricsFromRow(row, pair.baseline);
    return {
      documentId: String(row.document_id ?? ''),
      truthLength: numberField(row, 'truth_len'),
      candidate,
      baseline,
      gaps: computeGaps(candidate, baseline),
    };
  });

export interface BuildResultsFileInput {
  resultSet: ResultSet;
  report: EvaluationReport;
  meta: ResultsMeta;
}

export const buildResultsFile = ({ resultSet, report, meta }: BuildResultsFileInput): ResultsFile => ({
  schema: RESULTS_SCHEMA,
  meta,
  rows: toFlatRows(resultSet, meta.pair),
  report,
});

const metricsSchema = z.object({
  precision: z.number(),
  recall: z.number(),
  f1: z.number(),
  length: z.number(),
});

const rankedSchema = z.object({
  documentId: z.string(),
  truthLength: z.number(),
  candidate: metricsSchema,
  baseline: metricsSchema,
  gaps: z.object({ precision_gap: z.number(), recall_gap: z.number(), f1_gap: z.number() }),
  rank: z.number(),
  gap: z.number(),
});

const pairSchema = z.object({ candidate: z.string(), baseline: z.string() });

const rankKeySchema = z.enum(RANK_KEYS);

const averagesSchema = z.object({
  precision: z.number(),
  recall: z.number(),
  f1: z.number(),
  documents: z.number(),
});

const reportSchema = z.object({
  pair: pairSchema,
  rankBy: rankKeySchema,
  documentCount: z.number(),
  averages: z.record(averagesSchema),
  ranked: z.array(rankedSchema),
  deficits: z.object({
    counts: z.object({
      precisionDeficit: z.number(),
      recallDeficit: z.number(),
      f1Deficit: z.number(),
      emptyExtraction: z.number(),
      overExtraction: z.number(),
    }),
    emptyExtractionSample: z.array(z.string()),
  }),
  boilerplate: z.object({
    documents: z.number(),
    tokens: z.array(z.object({ token: z.string(), count: z.number() })),
  }),
  worst: z
    .object({
      document: rankedSchema,
      truthExcerpt: z.string(),
      candidateExcerpt: z.string(),
      baselineExcerpt: z.string(),
    })
    .nullable(),
});

const sizesSchema = z.object({
  rankedRows: z.number(),
  boilerplateDocuments: z.number(),
  boilerplateTokens: z.number(),
  minBoilerplateTokenLength: z.number(),
  sampleChars: z.number(),
  listLimit: z.number(),
});

export const ResultsFileSchema = z.object({
  schema: z.literal(RESULTS_SCHEMA),
  meta: z.object({
    evaluator_version: z.string(),
    content_hash: z.string(),
    generated_at: z.string(),
    cache_ttl_hours: z.number(),
    options: z.object({
      shingle_size: z.number(),
      tokenizer: z.enum(TOKENIZER_STRATEGIES),
      overlap: z.enum(OVERLAP_STRATEGIES),
      document_order: z.enum(DOCUMENT_ORDERS),
      text_field: z.string(),
      rank_by: rankKeySchema,
      thresholds: z.object({
        deficit: z.number(),
        overExtractionRatio: z.number(),
        minComparisonLength: z.number(),
      }),
      report: sizesSchema,
    }),
    sources: z.array(z.string()),
    pair: pairSchema,
    inputs: z.object({
      ground_truth: z.string(),
      predictions: z.record(z.string()),
    }),
  }),
  rows: z.array(z.record(z.union([z.string(), z.number()]))),
  report: reportSchema,
});

/**
 * Validates parsed JSON against the results schema; `label` names the file in the error.
 */
export const parseResultsFile = (payload: unknown, label: string): ResultsFile => {
  const parsed = ResultsFileSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? issue.path.join('.') : 'root';
    throw new Error(
      `Results file ${label} does not match ${RESULTS_SCHEMA} (${where}: ${issue?.message ?? 'invalid'}).`,
    );
  }
  return parsed.data;
};
