/**
 * @file src/shared/paths.ts
 * @description Helper for resolving canonical directories used by the shinglebench CLI.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

const ROOT = path.join(os.homedir(), '.shinglebench');
const RESULTS_DIR = path.join(ROOT, 'results');

const ensureDir = (target: string): void => {
  fs.mkdirSync(target, { recursive: true });
};

const slug = (value: string): string =>
  value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/^-+|-+$/g, '') || 'source';

const resultsFileFor = (candidate: string, baseline: string): string =>
  path.join(RESULTS_DIR, `${slug(candidate)}-vs-${slug(baseline)}.json`);

export const paths = {
  ROOT,
  RESULTS_DIR,
  ensureDir,
  resultsFileFor,
};
