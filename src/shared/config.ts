/**
 * @file src/shared/config.ts
 * @description Handles persistent shinglebench configuration (.shinglebenchrc.json) and resolves
 *              the effective evaluation settings: CLI override, then stored value, then fallback.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { collidingColumns } from '../lib/result-set';
import {
  DEFAULT_DOCUMENT_ORDER,
  DEFAULT_OVERLAP,
  DEFAULT_RANK_KEY,
  DEFAULT_TEXT_FIELD,
  DEFAULT_TOKENIZER,
  DEFICIT_THRESHOLDS,
  DOCUMENT_ORDERS,
  OVERLAP_STRATEGIES,
  RANK_KEYS,
  REPORT_SIZES,
  SHINGLE_SIZE,
  TOKENIZER_STRATEGIES,
  type DeficitThresholds,
  type DocumentOrder,
  type OverlapStrategy,
  type RankKey,
  type ReportSizes,
  type TokenizerStrategy,
} from './evaluator-config';
import { paths } from './paths';

const ShinglebenchConfigSchema = z
  .object({
    groundTruthPath: z.string(),
    candidateName: z.string(),
    candidatePath: z.string(),
    baselineName: z.string(),
    baselinePath: z.string(),
    textField: z.string(),
    shingleSize: z.number().int().positive(),
    tokenizer: z.enum(TOKENIZER_STRATEGIES),
    overlap: z.enum(OVERLAP_STRATEGIES),
    documentOrder: z.enum(DOCUMENT_ORDERS),
    rankBy: z.enum(RANK_KEYS),
    deficitThreshold: z.number().min(0).max(1),
    overExtractionRatio: z.number().positive(),
    minComparisonLength: z.number().int().min(0),
    rankedRows: z.number().int().positive(),
    boilerplateDocuments: z.number().int().positive(),
    boilerplateTokens: z.number().int().positive(),
    sampleChars: z.number().int().min(0),
  })
  .partial();

export type ShinglebenchConfig = z.infer<typeof ShinglebenchConfigSchema>;

export const CONFIG_PATH = path.join(paths.ROOT, '.shinglebenchrc.json');

const describeIssue = (error: z.ZodError): string => {
  const issue = error.issues[0];
  if (!issue) return 'invalid value';
  return issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
};

export const readConfig = (configPath: string = CONFIG_PATH): ShinglebenchConfig => {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  let payload: unknown;
  try {
    payload = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to read ${configPath} (${message}). Fix or delete the file.`);
  }
  const parsed = ShinglebenchConfigSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Invalid configuration in ${configPath} (${describeIssue(parsed.error)}).`);
  }
  return parsed.data;
};

export const writeConfig = (
  update: Partial<ShinglebenchConfig>,
  configPath: string = CONFIG_PATH,
): ShinglebenchConfig => {
  const current = readConfig(configPath);
  const next = ShinglebenchConfigSchema.parse({
    ...current,
    ...update,
  });
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(next, null, 2), 'utf8');
  return next;
};

export interface SourceSpec {
  name: string;
  path: string;
}

const sourceNameFromPath = (filePath: string): string =>
  path.basename(filePath).replace(/\.json$/i, '');

/**
 * Accepts `name=path/to/output.json` or a bare path; a bare path is named after its file.
 */
export const parseSourceSpec = (spec: string): SourceSpec => {
  const trimmed = spec.trim();
  const separator = trimmed.indexOf('=');
  if (separator > 0) {
    const name = trimmed.slice(0, separator).trim();
    const filePath = trimmed.slice(separator + 1).trim();
    if (!filePath.length) {
      throw new Error(`Source '${spec}' is missing a file path after '='.`);
    }
    return { name, path: filePath };
  }
  if (!trimmed.length) {
    throw new Error('Source specification is empty.');
  }
  return { name: sourceNameFromPath(trimmed), path: trimmed };
};

export interface EvaluationConfigOverrides {
  groundTruth?: string;
  candidate?: string;
  baseline?: string;
  textField?: string;
  shingleSize?: number;
  tokenizer?: string;
  overlap?: string;
  documentOrder?: string;
  rankBy?: string;
  deficitThreshold?: number;
  overExtractionRatio?: number;
  minComparisonLength?: number;
  top?: number;
}

export interface ResolvedEvaluationConfig {
  groundTruthPath: string;
  candidate: SourceSpec;
  baseline: SourceSpec;
  textField: string;
  shingleSize: number;
  tokenizer: TokenizerStrategy;
  overlap: OverlapStrategy;
  documentOrder: DocumentOrder;
  rankBy: RankKey;
  thresholds: DeficitThresholds;
  report: ReportSizes;
}

const normalize = (value?: string | null): string | undefined => {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
};

export const pickOption = <T extends string>(
  allowed: readonly T[],
  value: string | undefined,
  label: string,
): T | undefined => {
  const normalized = normalize(value)?.toLowerCase();
  if (normalized === undefined) return undefined;
  const match = allowed.find((option) => option === normalized);
  if (!match) {
    throw new Error(`Unsupported ${label} '${value}'. Expected one of: ${allowed.join(', ')}.`);
  }
  return match;
};

const checkNumber = (
  value: number | undefined,
  label: string,
  valid: (input: number) => boolean,
  expectation: string,
): number | undefined => {
  if (value === undefined) return undefined;
  if (!Number.isFinite(value) || !valid(value)) {
    throw new Error(`Invalid ${label} '${value}': expected ${expectation}.`);
  }
  return value;
};

export const positiveInteger = (value: number | undefined, label: string): number | undefined =>
  checkNumber(value, label, (input) => Number.isInteger(input) && input >= 1, 'a positive integer');

const resolveSource = (
  override: string | undefined,
  storedName: string | undefined,
  storedPath: string | undefined,
  role: 'candidate' | 'baseline',
): SourceSpec => {
  const spec = normalize(override);
  if (spec) {
    return parseSourceSpec(spec);
  }
  const filePath = normalize(storedPath);
  if (!filePath) {
    throw new Error(
      `No ${role} predictions configured. Run 'shinglebench init' or pass --${role} <name=file>.`,
    );
  }
  return { name: normalize(storedName) ?? sourceNameFromPath(filePath), path: filePath };
};

export const resolveEvaluationConfig = (
  overrides: EvaluationConfigOverrides = {},
  stored: ShinglebenchConfig = readConfig(),
): ResolvedEvaluationConfig => {
  const groundTruthPath = normalize(overrides.groundTruth) ?? normalize(stored.groundTruthPath);
  if (!groundTruthPath) {
    throw new Error(
      "No ground-truth file configured. Run 'shinglebench init' or pass --ground-truth <file>.",
    );
  }

  const candidate = resolveSource(
    overrides.candidate,
    stored.candidateName,
    stored.candidatePath,
    'candidate',
  );
  const baseline = resolveSource(
    overrides.baseline,
    stored.baselineName,
    stored.baselinePath,
    'baseline',
  );
  [candidate, baseline].forEach(({ name }) => {
    const collisions = collidingColumns(name);
    if (collisions.length) {
      throw new Error(
        `Source name '${name}' clashes with the results column ${collisions.join(', ')}. Pick another name with name=file.`,
      );
    }
  });
  if (candidate.name === baseline.name) {
    throw new Error(
      `Candidate and baseline share the name '${candidate.name}'. Name them explicitly with name=file.`,
    );
  }

  const deficit =
    checkNumber(
      overrides.deficitThreshold,
      'deficit threshold',
      (input) => input >= 0 && input <= 1,
      'a number between 0 and 1',
    ) ??
    stored.deficitThreshold ??
    DEFICIT_THRESHOLDS.deficit;
  const overExtractionRatio =
    checkNumber(
      overrides.overExtractionRatio,
      'over-extraction ratio',
      (input) => input > 0,
      'a positive number',
    ) ??
    stored.overExtractionRatio ??
    DEFICIT_THRESHOLDS.overExtractionRatio;
  const minComparisonLength =
    checkNumber(
      overrides.minComparisonLength,
      'minimum comparison length',
      (input) => Number.isInteger(input) && input >= 0,
      'a non-negative integer',
    ) ??
    stored.minComparisonLength ??
    DEFICIT_THRESHOLDS.minComparisonLength;

  return {
    groundTruthPath,
    candidate,
    baseline,
    textField: normalize(overrides.textField) ?? normalize(stored.textField) ?? DEFAULT_TEXT_FIELD,
    shingleSize:
      positiveInteger(overrides.shingleSize, 'shingle size') ?? stored.shingleSize ?? SHINGLE_SIZE,
    tokenizer:
      pickOption(TOKENIZER_STRATEGIES, overrides.tokenizer, 'tokenizer') ??
      stored.tokenizer ??
      DEFAULT_TOKENIZER,
    overlap:
      pickOption(OVERLAP_STRATEGIES, overrides.overlap, 'overlap strategy') ??
      stored.overlap ??
      DEFAULT_OVERLAP,
    documentOrder:
      pickOption(DOCUMENT_ORDERS, overrides.documentOrder, 'document order') ??
      stored.documentOrder ??
      DEFAULT_DOCUMENT_ORDER,
    rankBy: pickOption(RANK_KEYS, overrides.rankBy, 'rank key') ?? stored.rankBy ?? DEFAULT_RANK_KEY,
    thresholds: { deficit, overExtractionRatio, minComparisonLength },
    report: {
      ...REPORT_SIZES,
      rankedRows:
        positiveInteger(overrides.top, 'top') ?? stored.rankedRows ?? REPORT_SIZES.rankedRows,
      boilerplateDocuments: stored.boilerplateDocuments ?? REPORT_SIZES.boilerplateDocuments,
      boilerplateTokens: stored.boilerplateTokens ?? REPORT_SIZES.boilerplateTokens,
      sampleChars: stored.sampleChars ?? REPORT_SIZES.sampleChars,
    },
  };
};
