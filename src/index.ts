/**
 * @file src/index.ts
 * @description Library entry point for embedding the evaluator without the CLI.
 */

export * from './lib/tokenizer';
export * from './lib/shingles';
export * from './lib/overlap-scorer';
export * from './lib/document-evaluator';
export * from './lib/aggregator';
export * from './lib/result-set';
export * from './lib/report-renderer';
export * from './shared/evaluator-config';
export * from './shared/collections';
export {
  parseSourceSpec,
  readConfig,
  resolveEvaluationConfig,
  writeConfig,
  type EvaluationConfigOverrides,
  type ResolvedEvaluationConfig,
  type ShinglebenchConfig,
  type SourceSpec,
} from './shared/config';
export { probeCachedResults, type CacheProbeResult, type CacheStatus } from './shared/results-cache';
export * from './workflows/evaluate-workflow';
export * from './workflows/show-workflow';
