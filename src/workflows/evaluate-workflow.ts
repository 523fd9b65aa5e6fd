/**
 * @file src/workflows/evaluate-workflow.ts
 * @description Shared evaluation workflow: loads the ground truth and both prediction files,
 *              scores every document, builds the report and writes the results file.
 */

import fs from 'node:fs';
import path from 'node:path';
import { buildEvaluationReport, type EvaluationReport } from '../lib/aggregator';
import {
  evaluateResultSet,
  type PredictionSource,
  type ResultSet,
} from '../lib/document-evaluator';
import { buildResultsFile, type ResultsFile, type ResultsOptions } from '../lib/result-set';
import { loadTextCollection, type LoadedCollection } from '../shared/collections';
import type { ResolvedEvaluationConfig } from '../shared/config';
import { computeContentHash } from '../shared/content-hash';
import { CACHE_TTL_HOURS, EVALUATOR_VERSION } from '../shared/evaluator-config';
import { paths } from '../shared/paths';
import { probeCachedResults } from '../shared/results-cache';

export type EvaluateStatus = 'cached' | 'written';

export interface EvaluateWorkflowResult {
  status: EvaluateStatus;
  resultsPath: string;
  results: ResultsFile;
  detail?: string;
}

export interface EvaluateWorkflowHooks {
  onStart?: (config: ResolvedEvaluationConfig) => void;
  onComplete?: (result: EvaluateWorkflowResult) => void;
  onError?: (message: string) => void;
}

type WorkflowLogger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface EvaluateWorkflowOptions {
  config: ResolvedEvaluationConfig;
  output?: string;
  force?: boolean;
  logger?: WorkflowLogger;
  hooks?: EvaluateWorkflowHooks;
  now?: () => Date;
}

const getLogger = (logger?: WorkflowLogger): WorkflowLogger => logger ?? console;

export const toResultsOptions = (config: ResolvedEvaluationConfig): ResultsOptions => ({
  shingle_size: config.shingleSize,
  tokenizer: config.tokenizer,
  overlap: config.overlap,
  document_order: config.documentOrder,
  text_field: config.textField,
  rank_by: config.rankBy,
  thresholds: config.thresholds,
  report: config.report,
});

interface EvaluationInputs {
  groundTruth: LoadedCollection;
  candidate: LoadedCollection;
  baseline: LoadedCollection;
}

const loadInputs = (config: ResolvedEvaluationConfig): EvaluationInputs => ({
  groundTruth: loadTextCollection(config.groundTruthPath, config.textField),
  candidate: loadTextCollection(config.candidate.path, config.textField),
  baseline: loadTextCollection(config.baseline.path, config.textField),
});

const hashInputs = (config: ResolvedEvaluationConfig, inputs: EvaluationInputs): string =>
  computeContentHash(
    [inputs.groundTruth.raw, inputs.candidate.raw, inputs.baseline.raw],
    JSON.stringify({
      options: toResultsOptions(config),
      pair: { candidate: config.candidate.name, baseline: config.baseline.name },
    }),
  );

export type EvaluationTextInputs = Record<
  'groundTruth' | 'candidate' | 'baseline',
  Pick<LoadedCollection, 'texts'>
>;

export interface EvaluationRun {
  resultSet: ResultSet;
  report: EvaluationReport;
}

/**
 * Scores already-loaded inputs. Synchronous and free of I/O; the workflow below
 * wraps it with file loading, caching and persistence.
 */
export const runEvaluation = (
  config: ResolvedEvaluationConfig,
  inputs: EvaluationTextInputs,
): EvaluationRun => {
  const sources: PredictionSource[] = [
    { name: config.candidate.name, texts: inputs.candidate.texts },
    { name: config.baseline.name, texts: inputs.baseline.texts },
  ];
  const resultSet = evaluateResultSet(inputs.groundTruth.texts, sources, {
    shingleSize: config.shingleSize,
    tokenizer: config.tokenizer,
    overlap: config.overlap,
    documentOrder: config.documentOrder,
  });
  const report = buildEvaluationReport(
    resultSet,
    { candidate: config.candidate.name, baseline: config.baseline.name },
    {
      groundTruth: inputs.groundTruth.texts,
      candidate: inputs.candidate.texts,
      baseline: inputs.baseline.texts,
    },
    {
      rankBy: config.rankBy,
      thresholds: config.thresholds,
      sizes: config.report,
      tokenizer: config.tokenizer,
    },
  );
  return { resultSet, report };
};

const runEvaluationAsync = (
  config: ResolvedEvaluationConfig,
  inputs: EvaluationInputs,
): Promise<EvaluationRun> =>
  new Promise((resolve, reject) => {
    setImmediate(() => {
      try {
        resolve(runEvaluation(config, inputs));
      } catch (error) {
        reject(error);
      }
    });
  });

export const runEvaluateWorkflow = async ({
  config,
  output,
  force,
  logger,
  hooks,
  now = () => new Date(),
}: EvaluateWorkflowOptions): Promise<EvaluateWorkflowResult> => {
  const activeLogger = getLogger(logger);
  const resultsPath = path.resolve(
    output ?? paths.resultsFileFor(config.candidate.name, config.baseline.name),
  );
  hooks?.onStart?.(config);

  try {
    const inputs = loadInputs(config);
    const contentHash = hashInputs(config, inputs);

    if (!force) {
      const cached = probeCachedResults(resultsPath, contentHash, now().getTime());
      if (cached.status === 'fresh' && cached.results) {
        activeLogger.log(`[evaluate] reused cached results (${cached.results.meta.generated_at})`);
        const result: EvaluateWorkflowResult = {
          status: 'cached',
          resultsPath,
          results: cached.results,
          detail: 'reused cached results',
        };
        hooks?.onComplete?.(result);
        return result;
      }
      if (cached.status !== 'missing' && cached.reason) {
        activeLogger.log(`[evaluate] regenerating results (${cached.reason})`);
      }
    }

    const { resultSet, report } = await runEvaluationAsync(config, inputs);
    const results = buildResultsFile({
      resultSet,
      report,
      meta: {
        evaluator_version: EVALUATOR_VERSION,
        content_hash: contentHash,
        generated_at: now().toISOString(),
        cache_ttl_hours: CACHE_TTL_HOURS,
        options: toResultsOptions(config),
        sources: [config.candidate.name, config.baseline.name],
        pair: { candidate: config.candidate.name, baseline: config.baseline.name },
        inputs: {
          ground_truth: inputs.groundTruth.path,
          predictions: {
            [config.candidate.name]: inputs.candidate.path,
            [config.baseline.name]: inputs.baseline.path,
          },
        },
      },
    });

    paths.ensureDir(path.dirname(resultsPath));
    fs.writeFileSync(resultsPath, JSON.stringify(results, null, 2), 'utf8');
    activeLogger.log(`[evaluate] wrote ${resultsPath} (${resultSet.length} documents)`);

    const result: EvaluateWorkflowResult = { status: 'written', resultsPath, results };
    hooks?.onComplete?.(result);
    return result;
  } catch (error) {
    hooks?.onError?.(error instanceof Error ? error.message : String(error));
    throw error;
  }
};
