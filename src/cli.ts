#!/usr/bin/env node
/**
 * @file src/cli.ts
 * @description Bootstraps the shinglebench CLI, which scores two text extractors against a
 *              ground-truth corpus by word-shingle overlap and reports where the candidate
 *              trails the baseline.
 *
 * Commands exposed by the entry point:
 *   - `init`: capture default input files and scoring options in `.shinglebenchrc.json`.
 *   - `evaluate`: score every document, write the results JSON and print the report.
 *   - `show`: print a stored results file, optionally re-ranked by another gap.
 *
 * @example
 *   shinglebench init
 *   shinglebench evaluate -g truth.json -c mine=out/mine.json -b ref=out/ref.json
 *   shinglebench evaluate --rank-by precision_gap --top 25 --force
 *   shinglebench show -c mine -b ref --rank-by recall_gap
 */

import chalk from 'chalk';
import { Command } from 'commander';
import figlet from 'figlet';
import pkg from '../package.json';
import evaluateCommand from './commands/evaluate';
import initCommand from './commands/init';
import showCommand from './commands/show';

const program = new Command();
program
  .name('shinglebench')
  .description('Benchmark text extractors against a ground truth by shingle overlap')
  .version(pkg.version, '-v, --version', 'Display CLI version');

program.addCommand(initCommand);
program.addCommand(evaluateCommand);
program.addCommand(showCommand);

const args = process.argv.slice(2);

if (!args.length) {
  const banner = figlet.textSync('shinglebench', { font: 'Standard' });
  console.log(chalk.hex('#9be2ff')(banner));
  program.outputHelp();
  process.exit(0);
} else {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exitCode = 1;
  });
}
