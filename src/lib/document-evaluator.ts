/**
 * @file src/lib/document-evaluator.ts
 * @description Runs tokenizer -> shingle builder -> overlap scorer for one ground-truth document
 *              against every prediction source, and over a whole ground-truth collection.
 */

import type {
  DocumentOrder,
  OverlapStrategy,
  TokenizerStrategy,
} from '../shared/evaluator-config';
import {
  DEFAULT_DOCUMENT_ORDER,
  DEFAULT_OVERLAP,
  DEFAULT_TOKENIZER,
  SHINGLE_SIZE,
} from '../shared/evaluator-config';
import { type OverlapScore, scoreOverlap } from './overlap-scorer';
import { buildShingles } from './shingles';
import { tokenize } from './tokenizer';

export type TextCollection = ReadonlyMap<string, string>;

export interface PredictionSource {
  name: string;
  texts: TextCollection;
}

export interface ComparisonRecord extends OverlapScore {
  documentId: string;
  source: string;
  truthLength: number;
  predictionLength: number;
}

export interface DocumentEvaluation {
  documentId: string;
  truthLength: number;
  records: ComparisonRecord[];
}

export type ResultSet = DocumentEvaluation[];

export interface EvaluationOptions {
  shingleSize?: number;
  tokenizer?: TokenizerStrategy;
  overlap?: OverlapStrategy;
  documentOrder?: DocumentOrder;
}

type ResolvedEvaluationOptions = Required<EvaluationOptions>;

const resolveOptions = (options: EvaluationOptions = {}): ResolvedEvaluationOptions => ({
  shingleSize: options.shingleSize ?? SHINGLE_SIZE,
  tokenizer: options.tokenizer ?? DEFAULT_TOKENIZER,
  overlap: options.overlap ?? DEFAULT_OVERLAP,
  documentOrder: options.documentOrder ?? DEFAULT_DOCUMENT_ORDER,
});

export const evaluateDocument = (
  documentId: string,
  truthText: string | null | undefined,
  sources: readonly PredictionSource[],
  options: EvaluationOptions = {},
): DocumentEvaluation => {
  const { shingleSize, tokenizer, overlap } = resolveOptions(options);
  const truthTokens = tokenize(truthText, tokenizer);
  const truthShingles = buildShingles(truthTokens, shingleSize, overlap);

  const records = sources.map((source): ComparisonRecord => {
    const predictionTokens = tokenize(source.texts.get(documentId), tokenizer);
    const score = scoreOverlap(
      truthShingles,
      buildShingles(predictionTokens, shingleSize, overlap),
    );
    return {
      documentId,
      source: source.name,
      ...score,
      truthLength: truthTokens.length,
      predictionLength: predictionTokens.length,
    };
  });

  return { documentId, truthLength: truthTokens.length, records };
};

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Ground truth defines the document universe: ids that only appear in a
 * prediction collection are never evaluated.
 *
 * `input` follows the collection's key order. Collections parsed from JSON list
 * integer-like ids (`"2"`, `"10"`) first in ascending numeric order, then the
 * remaining ids in file order.
 */
export const orderDocumentIds = (
  groundTruth: TextCollection,
  order: DocumentOrder = DEFAULT_DOCUMENT_ORDER,
): string[] => {
  const ids = [...groundTruth.keys()];
  return order === 'lexicographic' ? ids.sort(compareIds) : ids;
};

export const evaluateResultSet = (
  groundTruth: TextCollection,
  sources: readonly PredictionSource[],
  options: EvaluationOptions = {},
): ResultSet => {
  const resolved = resolveOptions(options);
  return orderDocumentIds(groundTruth, resolved.documentOrder).map((documentId) =>
    evaluateDocument(documentId, groundTruth.get(documentId), sources, resolved),
  );
};

export const findRecord = (
  evaluation: DocumentEvaluation,
  source: string,
): ComparisonRecord | undefined => evaluation.records.find((record) => record.source === source);
