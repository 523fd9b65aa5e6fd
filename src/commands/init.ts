/**
 * @file src/commands/init.ts
 * @description Interactive/non-interactive configuration. Captures the default ground-truth file,
 *              the candidate and baseline prediction files, and the scoring options in
 *              `.shinglebenchrc.json`.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import prompts from 'prompts';
import {
  CONFIG_PATH,
  parseSourceSpec,
  pickOption,
  positiveInteger,
  readConfig,
  writeConfig,
} from '../shared/config';
import {
  DEFAULT_OVERLAP,
  DEFAULT_TEXT_FIELD,
  DEFAULT_TOKENIZER,
  OVERLAP_STRATEGIES,
  SHINGLE_SIZE,
  TOKENIZER_STRATEGIES,
} from '../shared/evaluator-config';

type InitOptions = {
  groundTruth?: string;
  candidate?: string;
  baseline?: string;
  textField?: string;
  shingleSize?: number;
  tokenizer?: string;
  overlap?: string;
};

const textAnswer = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim().length ? value.trim() : undefined;

const numberAnswer = (value: unknown): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined;

const required = (label: string) => (value: string) =>
  value && value.trim().length ? true : `${label} is required.`;

const storedSpec = (name?: string, filePath?: string): string =>
  filePath ? `${name ? `${name}=` : ''}${filePath}` : '';

const initCommand = new Command('init')
  .description('Configure default input files and scoring options')
  .option('--ground-truth <file>', 'Ground-truth JSON file')
  .option('--candidate <name=file>', 'Predictions of the extractor under test')
  .option('--baseline <name=file>', 'Predictions of the reference extractor')
  .option('--text-field <field>', `Record field holding the article text (default: ${DEFAULT_TEXT_FIELD})`)
  .option('--shingle-size <number>', 'Tokens per shingle', (value) => Number(value))
  .option('--tokenizer <strategy>', `Tokenizer strategy (${TOKENIZER_STRATEGIES.join('|')})`)
  .option('--overlap <strategy>', `Overlap strategy (${OVERLAP_STRATEGIES.join('|')})`)
  .action(async (options: InitOptions) => {
    const existing = readConfig();
    const onCancel = () => {
      console.log(chalk.yellow('Initialization cancelled.'));
      process.exit(1);
    };

    const responses = await prompts(
      [
        {
          type: options.groundTruth ? null : 'text',
          name: 'groundTruth',
          message: 'Ground-truth JSON file',
          initial: existing.groundTruthPath ?? 'ground-truth.json',
          validate: required('Ground-truth file'),
        },
        {
          type: options.candidate ? null : 'text',
          name: 'candidate',
          message: 'Candidate predictions (name=file)',
          initial: storedSpec(existing.candidateName, existing.candidatePath),
          validate: required('Candidate predictions'),
        },
        {
          type: options.baseline ? null : 'text',
          name: 'baseline',
          message: 'Baseline predictions (name=file)',
          initial: storedSpec(existing.baselineName, existing.baselinePath),
          validate: required('Baseline predictions'),
        },
        {
          type: options.shingleSize !== undefined ? null : 'number',
          name: 'shingleSize',
          message: 'Tokens per shingle',
          initial: existing.shingleSize ?? SHINGLE_SIZE,
          validate: (value: number) =>
            Number.isInteger(value) && value > 0 ? true : 'Shingle size must be a positive integer.',
        },
        {
          type: options.tokenizer ? null : 'select',
          name: 'tokenizer',
          message: 'Tokenizer strategy',
          initial: TOKENIZER_STRATEGIES.indexOf(existing.tokenizer ?? DEFAULT_TOKENIZER),
          choices: TOKENIZER_STRATEGIES.map((value) => ({ title: value, value })),
        },
        {
          type: options.overlap ? null : 'select',
          name: 'overlap',
          message: 'Overlap strategy',
          initial: OVERLAP_STRATEGIES.indexOf(existing.overlap ?? DEFAULT_OVERLAP),
          choices: OVERLAP_STRATEGIES.map((value) => ({ title: value, value })),
        },
      ],
      { onCancel },
    );

    try {
      const groundTruthPath = textAnswer(options.groundTruth) ?? textAnswer(responses.groundTruth);
      const candidateSpec = textAnswer(options.candidate) ?? textAnswer(responses.candidate);
      const baselineSpec = textAnswer(options.baseline) ?? textAnswer(responses.baseline);
      const candidate = candidateSpec ? parseSourceSpec(candidateSpec) : undefined;
      const baseline = baselineSpec ? parseSourceSpec(baselineSpec) : undefined;

      const updated = writeConfig({
        groundTruthPath: groundTruthPath ?? existing.groundTruthPath,
        candidateName: candidate?.name ?? existing.candidateName,
        candidatePath: candidate?.path ?? existing.candidatePath,
        baselineName: baseline?.name ?? existing.baselineName,
        baselinePath: baseline?.path ?? existing.baselinePath,
        textField: textAnswer(options.textField) ?? existing.textField ?? DEFAULT_TEXT_FIELD,
        shingleSize:
          positiveInteger(options.shingleSize, 'shingle size') ??
          numberAnswer(responses.shingleSize) ??
          existing.shingleSize ??
          SHINGLE_SIZE,
        tokenizer:
          pickOption(TOKENIZER_STRATEGIES, options.tokenizer ?? textAnswer(responses.tokenizer), 'tokenizer') ??
          existing.tokenizer ??
          DEFAULT_TOKENIZER,
        overlap:
          pickOption(OVERLAP_STRATEGIES, options.overlap ?? textAnswer(responses.overlap), 'overlap strategy') ??
          existing.overlap ??
          DEFAULT_OVERLAP,
      });

      console.log(chalk.green(`Saved configuration to ${CONFIG_PATH}`));
      console.log(JSON.stringify(updated, null, 2));
    } catch (error) {
      console.error(chalk.red(`[init] ${error instanceof Error ? error.message : String(error)}`));
      process.exitCode = 1;
    }
  });

export default initCommand;
