/**
 * @file src/lib/aggregator.ts
 * @description Ranking, deficit classification, boilerplate mining and summary statistics over
 *              a Result Set. Everything here compares a candidate extractor with a baseline; a
 *              positive gap means the candidate scored below the baseline on that document.
 */

import type { DeficitThresholds, RankKey, ReportSizes, TokenizerStrategy } from '../shared/evaluator-config';
import {
  DEFAULT_RANK_KEY,
  DEFAULT_TOKENIZER,
  DEFICIT_THRESHOLDS,
  REPORT_SIZES,
} from '../shared/evaluator-config';
import type { ComparisonRecord, ResultSet, TextCollection } from './document-evaluator';
import { findRecord } from './document-evaluator';
import { tokenize } from './tokenizer';

export interface ComparisonPair {
  candidate: string;
  baseline: string;
}

export interface SourceMetrics {
  precision: number;
  recall: number;
  f1: number;
  length: number;
}

export type GapMetrics = Record<RankKey, number>;

export interface ComparisonRow {
  documentId: string;
  truthLength: number;
  candidate: SourceMetrics;
  baseline: SourceMetrics;
  gaps: GapMetrics;
}

export interface RankedDocument extends ComparisonRow {
  rank: number;
  gap: number;
}

const EMPTY_METRICS: SourceMetrics = { precision: 0, recall: 0, f1: 0, length: 0 };

const toMetrics = (record: ComparisonRecord | undefined): SourceMetrics =>
  record
    ? {
        precision: record.precision,
        recall: record.recall,
        f1: record.f1,
        length: record.predictionLength,
      }
    : EMPTY_METRICS;

export const computeGaps = (candidate: SourceMetrics, baseline: SourceMetrics): GapMetrics => ({
  precision_gap: baseline.precision - candidate.precision,
  recall_gap: baseline.recall - candidate.recall,
  f1_gap: baseline.f1 - candidate.f1,
});

export const buildComparisonRows = (resultSet: ResultSet, pair: ComparisonPair): ComparisonRow[] =>
  resultSet.map((evaluation) => {
    const candidate = toMetrics(findRecord(evaluation, pair.candidate));
    const baseline = toMetrics(findRecord(evaluation, pair.baseline));
    return {
      documentId: evaluation.documentId,
      truthLength: evaluation.truthLength,
      candidate,
      baseline,
      gaps: computeGaps(candidate, baseline),
    };
  });

/**
 * Sorts by descending gap. Ties keep their Result Set order, so ranking the same
 * rows twice always yields the same top-K.
 */
export const rankDocuments = (
  rows: readonly ComparisonRow[],
  key: RankKey = DEFAULT_RANK_KEY,
  limit?: number,
): RankedDocument[] => {
  const ranked = rows
    .map((row, index) => ({ row, index }))
    .sort((a, b) => b.row.gaps[key] - a.row.gaps[key] || a.index - b.index)
    .map(({ row }, position) => ({ ...row, rank: position + 1, gap: row.gaps[key] }));
  return limit === undefined ? ranked : ranked.slice(0, Math.max(0, limit));
};

export interface DeficitBuckets {
  precisionDeficit: string[];
  recallDeficit: string[];
  f1Deficit: string[];
  emptyExtraction: string[];
  overExtraction: string[];
}

export type DeficitCategory = keyof DeficitBuckets;

export const classifyDeficits = (
  rows: readonly ComparisonRow[],
  thresholds: DeficitThresholds = DEFICIT_THRESHOLDS,
): DeficitBuckets => {
  const buckets: DeficitBuckets = {
    precisionDeficit: [],
    recallDeficit: [],
    f1Deficit: [],
    emptyExtraction: [],
    overExtraction: [],
  };
  rows.forEach(({ documentId, truthLength, candidate, baseline, gaps }) => {
    if (candidate.precision < baseline.precision - thresholds.deficit) {
      buckets.precisionDeficit.push(documentId);
    }
    if (candidate.recall < baseline.recall - thresholds.deficit) {
      buckets.recallDeficit.push(documentId);
    }
    if (gaps.f1_gap > thresholds.deficit) {
      buckets.f1Deficit.push(documentId);
    }
    if (candidate.length === 0 && truthLength > 0) {
      buckets.emptyExtraction.push(documentId);
    }
    if (
      candidate.length > baseline.length * thresholds.overExtractionRatio &&
      baseline.length > thresholds.minComparisonLength
    ) {
      buckets.overExtraction.push(documentId);
    }
  });
  return buckets;
};

export interface BoilerplateToken {
  token: string;
  count: number;
}

export interface BoilerplateOptions {
  tokenizer?: TokenizerStrategy;
  shortlist?: number;
  minTokenLength?: number;
}

/**
 * Tokens the prediction emits that never occur in the document's ground truth.
 * Every occurrence is kept, so repeated navigation text weighs accordingly.
 */
export const extraTokens = (
  truthText: string | undefined,
  predictionText: string | undefined,
  tokenizer: TokenizerStrategy = DEFAULT_TOKENIZER,
): string[] => {
  const truthTokens = new Set(tokenize(truthText, tokenizer));
  return tokenize(predictionText, tokenizer).filter((token) => !truthTokens.has(token));
};

/**
 * Counts extra tokens across the given documents, keeps the `shortlist` most frequent
 * (ties in first-seen order) and drops shortlisted tokens shorter than `minTokenLength`
 * code points.
 */
export const detectBoilerplate = (
  documentIds: readonly string[],
  groundTruth: TextCollection,
  predictions: TextCollection,
  options: BoilerplateOptions = {},
): BoilerplateToken[] => {
  const tokenizer = options.tokenizer ?? DEFAULT_TOKENIZER;
  const shortlist = options.shortlist ?? REPORT_SIZES.boilerplateTokens;
  const minTokenLength = options.minTokenLength ?? REPORT_SIZES.minBoilerplateTokenLength;

  const counts = new Map<string, number>();
  documentIds.forEach((documentId) => {
    extraTokens(groundTruth.get(documentId), predictions.get(documentId), tokenizer).forEach(
      (token) => counts.set(token, (counts.get(token) ?? 0) + 1),
    );
  });

  return [...counts.entries()]
    .map(([token, count]) => ({ token, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, Math.max(0, shortlist))
    .filter((entry) => Array.from(entry.token).length >= minTokenLength);
};

export interface MetricAverages {
  precision: number;
  recall: number;
  f1: number;
  documents: number;
}

/** Macro averages per source over every document in the Result Set. */
export const averageBySource = (
  resultSet: ResultSet,
  sources: readonly string[],
): Record<string, MetricAverages> => {
  const averages: Record<string, MetricAverages> = {};
  sources.forEach((source) => {
    let precision = 0;
    let recall = 0;
    let f1 = 0;
    resultSet.forEach((evaluation) => {
      const record = findRecord(evaluation, source);
      precision += record?.precision ?? 0;
      recall += record?.recall ?? 0;
      f1 += record?.f1 ?? 0;
    });
    const documents = resultSet.length;
    averages[source] = {
      precision: documents ? precision / documents : 0,
      recall: documents ? recall / documents : 0,
      f1: documents ? f1 / documents : 0,
      documents,
    };
  });
  return averages;
};

/** First `length` characters, counted in code points rather than UTF-16 units. */
export const excerpt = (text: string | undefined, length: number): string =>
  Array.from(text ?? '')
    .slice(0, Math.max(0, length))
    .join('');

export interface WorstDocumentSample {
  document: RankedDocument;
  truthExcerpt: string;
  candidateExcerpt: string;
  baselineExcerpt: string;
}

export interface EvaluationTexts {
  groundTruth: TextCollection;
  candidate: TextCollection;
  baseline: TextCollection;
}

export interface EvaluationReport {
  pair: ComparisonPair;
  rankBy: RankKey;
  documentCount: number;
  averages: Record<string, MetricAverages>;
  ranked: RankedDocument[];
  deficits: {
    counts: Record<DeficitCategory, number>;
    emptyExtractionSample: string[];
  };
  boilerplate: {
    documents: number;
    tokens: BoilerplateToken[];
  };
  worst: WorstDocumentSample | null;
}

export interface ReportOptions {
  rankBy?: RankKey;
  thresholds?: DeficitThresholds;
  sizes?: ReportSizes;
  tokenizer?: TokenizerStrategy;
}

export const countDeficits = (buckets: DeficitBuckets): Record<DeficitCategory, number> => ({
  precisionDeficit: buckets.precisionDeficit.length,
  recallDeficit: buckets.recallDeficit.length,
  f1Deficit: buckets.f1Deficit.length,
  emptyExtraction: buckets.emptyExtraction.length,
  overExtraction: buckets.overExtraction.length,
});

export const buildEvaluationReport = (
  resultSet: ResultSet,
  pair: ComparisonPair,
  texts: EvaluationTexts,
  options: ReportOptions = {},
): EvaluationReport => {
  const rankBy = options.rankBy ?? DEFAULT_RANK_KEY;
  const sizes = options.sizes ?? REPORT_SIZES;
  const rows = buildComparisonRows(resultSet, pair);
  const ranked = rankDocuments(rows, rankBy);
  const buckets = classifyDeficits(rows, options.thresholds ?? DEFICIT_THRESHOLDS);

  const worstIds = ranked.slice(0, sizes.boilerplateDocuments).map((row) => row.documentId);
  const boilerplate = detectBoilerplate(worstIds, texts.groundTruth, texts.candidate, {
    tokenizer: options.tokenizer,
    shortlist: sizes.boilerplateTokens,
    minTokenLength: sizes.minBoilerplateTokenLength,
  });

  const worstRow = ranked[0];
  const worst: WorstDocumentSample | null = worstRow
    ? {
        document: worstRow,
        truthExcerpt: excerpt(texts.groundTruth.get(worstRow.documentId), sizes.sampleChars),
        candidateExcerpt: excerpt(texts.candidate.get(worstRow.documentId), sizes.sampleChars),
        baselineExcerpt: excerpt(texts.baseline.get(worstRow.documentId), sizes.sampleChars),
      }
    : null;

  return {
    pair,
    rankBy,
    documentCount: resultSet.length,
    averages: averageBySource(resultSet, [pair.candidate, pair.baseline]),
    ranked: ranked.slice(0, sizes.rankedRows),
    deficits: {
      counts: countDeficits(buckets),
      emptyExtractionSample: buckets.emptyExtraction.slice(0, sizes.listLimit),
    },
    boilerplate: { documents: worstIds.length, tokens: boilerplate },
    worst,
  };
};
