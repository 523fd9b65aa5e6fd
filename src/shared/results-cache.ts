/**
 * @file src/shared/results-cache.ts
 * @description Decides whether a previously written results file can be reused for the current
 *              inputs, based on its content hash and age.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { ResultsFile } from '../lib/result-set';
import { parseResultsFile } from '../lib/result-set';
import { CACHE_TTL_HOURS } from './evaluator-config';

export type CacheStatus = 'missing' | 'fresh' | 'stale' | 'mismatch' | 'invalid';

export interface CacheProbeResult {
  status: CacheStatus;
  results?: ResultsFile;
  reason?: string;
}

const ttlMs = (hours: number): number => hours * 60 * 60 * 1000;

export const probeCachedResults = (
  filePath: string,
  expectedHash: string,
  now: number = Date.now(),
): CacheProbeResult => {
  const absolutePath = path.resolve(filePath);
  if (!fs.existsSync(absolutePath)) {
    return { status: 'missing' };
  }

  let results: ResultsFile;
  try {
    results = parseResultsFile(JSON.parse(fs.readFileSync(absolutePath, 'utf8')), absolutePath);
  } catch (error) {
    return {
      status: 'invalid',
      reason: error instanceof Error ? error.message : 'Unable to parse cached results',
    };
  }

  if (results.meta.content_hash !== expectedHash) {
    return { status: 'mismatch', reason: 'inputs or options changed', results };
  }
  const generatedAt = new Date(results.meta.generated_at).getTime();
  if (Number.isNaN(generatedAt)) {
    return { status: 'invalid', reason: 'missing generation timestamp', results };
  }
  if (now - generatedAt <= ttlMs(results.meta.cache_ttl_hours || CACHE_TTL_HOURS)) {
    return { status: 'fresh', results };
  }
  return { status: 'stale', reason: 'cache expired', results };
};
