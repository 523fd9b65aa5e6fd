/**
 * @file src/workflows/show-workflow.ts
 * @description Loads a results file and re-ranks its rows for display.
 */

import fs from 'node:fs';
import path from 'node:path';
import { rankDocuments, type RankedDocument } from '../lib/aggregator';
import { parseResultsFile, type ResultsFile, rowsFromFlat } from '../lib/result-set';
import type { RankKey } from '../shared/evaluator-config';

export const loadResultsFile = (filePath: string): ResultsFile => {
  const target = path.resolve(filePath);
  if (!fs.existsSync(target)) {
    throw new Error(`Results not found at ${target}. Run 'shinglebench evaluate' first.`);
  }
  let payload: unknown;
  try {
    payload = JSON.parse(fs.readFileSync(target, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Results file ${target} is not valid JSON (${message}).`);
  }
  return parseResultsFile(payload, target);
};

export interface ShowContext {
  resultsPath: string;
  results: ResultsFile;
  rankBy: RankKey;
  ranked: RankedDocument[];
}

export interface ShowOptions {
  rankBy?: RankKey;
  top?: number;
}

/**
 * Without overrides the stored ranking is returned untouched; with a different key or
 * size the flat rows are ranked again.
 */
export const loadShowContext = (resultsPath: string, options: ShowOptions = {}): ShowContext => {
  const results = loadResultsFile(resultsPath);
  const { report } = results;
  const rankBy = options.rankBy ?? report.rankBy;
  if (rankBy === report.rankBy && options.top === undefined) {
    return { resultsPath: path.resolve(resultsPath), results, rankBy, ranked: report.ranked };
  }
  const ranked = rankDocuments(
    rowsFromFlat(results.rows, results.meta.pair),
    rankBy,
    options.top ?? results.meta.options.report.rankedRows,
  );
  return { resultsPath: path.resolve(resultsPath), results, rankBy, ranked };
};

/**
 * Boilerplate and the worst-document sample are computed at evaluation time from
 * the stored ranking; only the table follows a different `--rank-by`.
 */
export const describeReranking = (context: ShowContext): string | null => {
  const storedKey = context.results.report.rankBy;
  if (context.rankBy === storedKey) return null;
  return `Table re-ranked by ${context.rankBy}; boilerplate and the worst document sample follow the stored ${storedKey} ranking.`;
};
