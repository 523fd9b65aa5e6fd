/**
 * @file src/commands/evaluate.ts
 * @description CLI wiring for the evaluation workflow: resolves options, drives the spinner and
 *              prints the report once the results file is written (or reused from cache).
 */

import chalk from 'chalk';
import { Command } from 'commander';
import ora from 'ora';
import { renderReport } from '../lib/report-renderer';
import {
  type EvaluationConfigOverrides,
  type ResolvedEvaluationConfig,
  resolveEvaluationConfig,
} from '../shared/config';
import {
  DEFAULT_TEXT_FIELD,
  DOCUMENT_ORDERS,
  OVERLAP_STRATEGIES,
  RANK_KEYS,
  SHINGLE_SIZE,
  TOKENIZER_STRATEGIES,
} from '../shared/evaluator-config';
import {
  type EvaluateWorkflowHooks,
  type EvaluateWorkflowResult,
  runEvaluateWorkflow,
} from '../workflows/evaluate-workflow';

interface EvaluateCliOptions extends EvaluationConfigOverrides {
  order?: string;
  output?: string;
  force?: boolean;
  quiet?: boolean;
  color?: boolean;
}

const createCliHooks = (): EvaluateWorkflowHooks => {
  let spinner: ora.Ora | null = null;
  return {
    onStart: (config) => {
      spinner = ora(
        `[evaluate] ${config.candidate.name} vs ${config.baseline.name}: scoring`,
      ).start();
    },
    onComplete: (result: EvaluateWorkflowResult) => {
      if (!spinner) return;
      const { candidate, baseline } = result.results.meta.pair;
      const label = `[evaluate] ${candidate} vs ${baseline}:`;
      if (result.status === 'written') {
        spinner.succeed(`${label} wrote ${result.resultsPath}`);
      } else {
        spinner.succeed(`${label} ${result.detail ?? 'reused cached results'}`);
      }
      spinner = null;
    },
    onError: (message) => {
      spinner?.fail(`[evaluate] ${message}`);
      spinner = null;
    },
  };
};

const quietLogger: Pick<Console, 'log' | 'warn' | 'error'> = {
  log: () => undefined,
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

const evaluateCommand = new Command('evaluate')
  .description('Score candidate and baseline extractions against the ground truth')
  .option('-g, --ground-truth <file>', 'Ground-truth JSON file')
  .option('-c, --candidate <name=file>', 'Predictions of the extractor under test')
  .option('-b, --baseline <name=file>', 'Predictions of the reference extractor')
  .option('--text-field <field>', `Record field holding the article text (default: ${DEFAULT_TEXT_FIELD})`)
  .option('-n, --shingle-size <number>', `Tokens per shingle (default: ${SHINGLE_SIZE})`, (value) =>
    Number(value),
  )
  .option('--tokenizer <strategy>', `Tokenizer strategy (${TOKENIZER_STRATEGIES.join('|')})`)
  .option('--overlap <strategy>', `Overlap strategy (${OVERLAP_STRATEGIES.join('|')})`)
  .option('--order <order>', `Document iteration order (${DOCUMENT_ORDERS.join('|')})`)
  .option('--rank-by <key>', `Ranking key (${RANK_KEYS.join('|')})`)
  .option('--deficit-threshold <number>', 'Metric gap that counts as a deficit', (value) =>
    Number(value),
  )
  .option('--over-extraction-ratio <number>', 'Length factor that counts as over-extraction', (value) =>
    Number(value),
  )
  .option(
    '--min-comparison-length <number>',
    'Baseline token length below which over-extraction is ignored',
    (value) => Number(value),
  )
  .option('-t, --top <number>', 'Rows in the ranked table', (value) => Number(value))
  .option('-o, --output <file>', 'Where to write the results JSON')
  .option('-f, --force', 'Ignore cached results and recompute')
  .option('-q, --quiet', 'Write the results file without printing the report')
  .option('--no-color', 'Disable coloured output')
  .action(async (options: EvaluateCliOptions) => {
    let config: ResolvedEvaluationConfig;
    try {
      config = resolveEvaluationConfig({ ...options, documentOrder: options.order });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`[evaluate] ${message}`));
      process.exitCode = 1;
      return;
    }

    let result: EvaluateWorkflowResult;
    try {
      result = await runEvaluateWorkflow({
        config,
        output: options.output,
        force: options.force,
        hooks: createCliHooks(),
        logger: options.quiet ? quietLogger : undefined,
      });
    } catch {
      // onError already failed the spinner with the message.
      process.exitCode = 1;
      return;
    }

    if (!options.quiet) {
      console.log();
      console.log(
        renderReport(result.results.report, {
          color: options.color !== false,
          thresholds: config.thresholds,
        }),
      );
    }
  });

export default evaluateCommand;
