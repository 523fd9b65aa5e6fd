/**
 * @file src/lib/tokenizer.ts
 * @description Splits article text into lower-case word tokens.
 */

import type { TokenizerStrategy } from '../shared/evaluator-config';
import { DEFAULT_TOKENIZER } from '../shared/evaluator-config';

const WORD_PATTERN = /[\p{L}\p{M}\p{N}\p{Pc}]+/gu;

const splitWhitespace = (text: string): string[] => text.split(/\s+/).filter(Boolean);

const matchWords = (text: string): string[] => text.match(WORD_PATTERN) ?? [];

/**
 * `whitespace` keeps punctuation attached to its word; `word` keeps only runs of
 * word characters. Truth and predictions must go through the same strategy.
 */
export const tokenize = (
  text: string | null | undefined,
  strategy: TokenizerStrategy = DEFAULT_TOKENIZER,
): string[] => {
  if (!text) {
    return [];
  }
  const lowered = text.toLowerCase();
  return strategy === 'whitespace' ? splitWhitespace(lowered) : matchWords(lowered);
};
