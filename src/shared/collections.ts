/**
 * @file src/shared/collections.ts
 * @description Loads ground-truth and prediction JSON files (`{ [documentId]: { articleBody } }`)
 *              into the text collections the evaluator consumes.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { TextCollection } from '../lib/document-evaluator';
import { DEFAULT_TEXT_FIELD } from './evaluator-config';

const CollectionSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

export interface LoadedCollection {
  path: string;
  raw: string;
  texts: TextCollection;
}

/**
 * A record whose text field is missing, null or not a string contributes the empty text.
 */
export const parseTextCollection = (
  payload: unknown,
  textField: string = DEFAULT_TEXT_FIELD,
  label = 'collection',
): TextCollection => {
  const parsed = CollectionSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `entry '${issue.path.join('.')}'` : 'top level';
    throw new Error(
      `Invalid ${label}: ${where} must be an object of document records (${issue?.message ?? 'invalid'}).`,
    );
  }
  const texts = new Map<string, string>();
  Object.entries(parsed.data).forEach(([documentId, record]) => {
    const value = record[textField];
    texts.set(documentId, typeof value === 'string' ? value : '');
  });
  return texts;
};

export const loadTextCollection = (
  filePath: string,
  textField: string = DEFAULT_TEXT_FIELD,
): LoadedCollection => {
  const absolute = path.resolve(filePath);
  if (!fs.existsSync(absolute)) {
    throw new Error(`Collection file not found: ${absolute}`);
  }
  const raw = fs.readFileSync(absolute, 'utf8');
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Collection file ${absolute} is not valid JSON (${message}).`);
  }
  return { path: absolute, raw, texts: parseTextCollection(payload, textField, absolute) };
};
