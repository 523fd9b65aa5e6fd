/**
 * @file src/shared/evaluator-config.ts
 * @description Centralized knobs for the shingle-overlap evaluator.
 *              Every tunable the engine and report read lives here with its default;
 *              `config.ts` layers CLI flags and the rc file on top of these values.
 */

import pkg from '../../package.json';

export const EVALUATOR_VERSION = `shinglebench-evaluator@${pkg.version}`;

/**
 * Cached result files remain valid for this many hours unless the
 * inputs or the resolved options change.
 */
export const CACHE_TTL_HOURS = 72;

export const TOKENIZER_STRATEGIES = ['whitespace', 'word'] as const;
export const OVERLAP_STRATEGIES = ['set', 'multiset'] as const;
export const DOCUMENT_ORDERS = ['lexicographic', 'input'] as const;
export const RANK_KEYS = ['f1_gap', 'precision_gap', 'recall_gap'] as const;

export type TokenizerStrategy = (typeof TOKENIZER_STRATEGIES)[number];
export type OverlapStrategy = (typeof OVERLAP_STRATEGIES)[number];
export type DocumentOrder = (typeof DOCUMENT_ORDERS)[number];
export type RankKey = (typeof RANK_KEYS)[number];

/**
 * Sliding n-gram window length (in tokens) for overlap scoring.
 */
export const SHINGLE_SIZE = 4;

export const DEFAULT_TOKENIZER: TokenizerStrategy = 'word';

/**
 * Multiset scoring counts a repeated shingle once per occurrence; set scoring
 * counts it once. Scores from the two strategies are not comparable.
 */
export const DEFAULT_OVERLAP: OverlapStrategy = 'multiset';

export const DEFAULT_DOCUMENT_ORDER: DocumentOrder = 'lexicographic';

export const DEFAULT_RANK_KEY: RankKey = 'f1_gap';

export const DEFAULT_TEXT_FIELD = 'articleBody';

export interface DeficitThresholds {
  /** Absolute metric gap before a document counts as a precision/recall/F1 deficit. */
  deficit: number;
  /** Candidate length must exceed baseline length by this factor to count as over-extraction. */
  overExtractionRatio: number;
  /** Baseline token length below which over-extraction is not judged. */
  minComparisonLength: number;
}

export const DEFICIT_THRESHOLDS: DeficitThresholds = {
  deficit: 0.1,
  overExtractionRatio: 2,
  minComparisonLength: 100,
};

export interface ReportSizes {
  rankedRows: number;
  boilerplateDocuments: number;
  boilerplateTokens: number;
  minBoilerplateTokenLength: number;
  sampleChars: number;
  listLimit: number;
}

export const REPORT_SIZES: ReportSizes = {
  rankedRows: 10,
  boilerplateDocuments: 20,
  boilerplateTokens: 30,
  minBoilerplateTokenLength: 3,
  sampleChars: 800,
  listLimit: 10,
};
