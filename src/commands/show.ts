/**
 * @file src/commands/show.ts
 * @description Prints a stored results file: the ranked table (optionally re-ranked by another
 *              gap), summary statistics, boilerplate tokens and the worst document sample.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import {
  renderBoilerplate,
  renderRankedTable,
  renderSummary,
  renderWorstDocument,
} from '../lib/report-renderer';
import { parseSourceSpec, pickOption, positiveInteger, readConfig } from '../shared/config';
import { RANK_KEYS } from '../shared/evaluator-config';
import { paths } from '../shared/paths';
import { describeReranking, loadShowContext } from '../workflows/show-workflow';

type ShowCliOptions = {
  results?: string;
  candidate?: string;
  baseline?: string;
  rankBy?: string;
  top?: number;
  color?: boolean;
};

const sourceName = (override: string | undefined, storedName?: string, storedPath?: string) => {
  if (override) return parseSourceSpec(override).name;
  if (storedName) return storedName;
  return storedPath ? parseSourceSpec(storedPath).name : undefined;
};

const resolveResultsPath = (options: ShowCliOptions): string => {
  if (options.results) return options.results;
  const stored = readConfig();
  const candidate = sourceName(options.candidate, stored.candidateName, stored.candidatePath);
  const baseline = sourceName(options.baseline, stored.baselineName, stored.baselinePath);
  if (!candidate || !baseline) {
    throw new Error(
      'Pass --results <file>, or --candidate and --baseline names, or configure them via init.',
    );
  }
  return paths.resultsFileFor(candidate, baseline);
};

const showCommand = new Command('show')
  .description('Display a stored evaluation')
  .option('-r, --results <file>', 'Results JSON written by evaluate')
  .option('-c, --candidate <name>', 'Candidate name used when the results were written')
  .option('-b, --baseline <name>', 'Baseline name used when the results were written')
  .option('--rank-by <key>', `Re-rank by another gap (${RANK_KEYS.join('|')})`)
  .option('-t, --top <number>', 'Rows in the ranked table', (value) => Number(value))
  .option('--no-color', 'Disable coloured output')
  .action((options: ShowCliOptions) => {
    try {
      const context = loadShowContext(resolveResultsPath(options), {
        rankBy: pickOption(RANK_KEYS, options.rankBy, 'rank key'),
        top: positiveInteger(options.top, 'top'),
      });
      const { results } = context;
      const renderOptions = {
        color: options.color !== false,
        thresholds: results.meta.options.thresholds,
      };

      console.log(chalk.gray(`Results: ${context.resultsPath} (generated ${results.meta.generated_at})`));
      const reranking = describeReranking(context);
      if (reranking) {
        console.log(chalk.yellow(reranking));
      }
      console.log();
      console.log(
        [
          renderRankedTable(context.ranked, results.meta.pair, context.rankBy, renderOptions),
          renderSummary(results.report, renderOptions),
          renderBoilerplate(results.report, renderOptions),
          renderWorstDocument(results.report, renderOptions),
        ]
          .map((section) => section.join('\n'))
          .join('\n\n'),
      );
    } catch (error) {
      console.error(chalk.red(`[show] ${error instanceof Error ? error.message : String(error)}`));
      process.exitCode = 1;
    }
  });

export default showCommand;
