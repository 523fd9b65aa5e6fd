/**
 * @file src/shared/content-hash.ts
 * @description Hashes the raw evaluation inputs together with the resolved options, so a cached
 *              results file is only reused when neither the data nor the scoring setup changed.
 */

import crypto from 'node:crypto';
import { EVALUATOR_VERSION } from './evaluator-config';

export const computeContentHash = (rawInputs: readonly string[], optionsKey: string): string => {
  const hash = crypto.createHash('sha256');
  rawInputs.forEach((raw) => hash.update(raw).update('\u0000'));
  return hash.update(optionsKey).update(EVALUATOR_VERSION).digest('hex');
};
