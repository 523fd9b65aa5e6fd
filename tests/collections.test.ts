/**
 * @file tests/collections.test.ts
 * @description Unit tests for loading ground-truth and prediction collections.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { orderDocumentIds } from '../src/lib/document-evaluator';
import { loadTextCollection, parseTextCollection } from '../src/shared/collections';

describe('parseTextCollection', () => {
  it('reads the text field and treats missing or non-string values as empty', () => {
    const texts = parseTextCollection({
      a: { articleBody: 'First article' },
      b: { articleBody: null },
      c: { title: 'No body' },
      d: { articleBody: 42 },
    });
    expect([...texts.entries()]).toEqual([
      ['a', 'First article'],
      ['b', ''],
      ['c', ''],
      ['d', ''],
    ]);
  });

  it('lists integer-like ids first when keeping input order', () => {
    const texts = parseTextCollection(
      JSON.parse('{"b":{"articleBody":"x"},"10":{"articleBody":"y"},"2":{"articleBody":"z"}}'),
    );
    expect(orderDocumentIds(texts, 'input')).toEqual(['2', '10', 'b']);
    expect(orderDocumentIds(texts, 'lexicographic')).toEqual(['10', '2', 'b']);
  });

  it('reads a custom text field', () => {
    expect(parseTextCollection({ a: { body: 'x', articleBody: 'y' } }, 'body').get('a')).toBe('x');
  });

  it('rejects payloads that are not records of objects', () => {
    expect(() => parseTextCollection([1, 2], 'articleBody', 'truth.json')).toThrow(
      /^Invalid truth\.json: top level must be an object of document records/,
    );
    expect(() => parseTextCollection({ a: 'text' }, 'articleBody', 'truth.json')).toThrow(
      /^Invalid truth\.json: entry 'a' must be an object of document records/,
    );
  });
});

describe('loadTextCollection', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shinglebench-collections-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('keeps the raw file content next to the parsed texts', () => {
    const file = path.join(dir, 'truth.json');
    const raw = JSON.stringify({ doc: { articleBody: 'Hello world' } });
    fs.writeFileSync(file, raw, 'utf8');
    const loaded = loadTextCollection(file);
    expect(loaded.path).toBe(file);
    expect(loaded.raw).toBe(raw);
    expect(loaded.texts.get('doc')).toBe('Hello world');
  });

  it('reports a missing file', () => {
    const file = path.join(dir, 'missing.json');
    expect(() => loadTextCollection(file)).toThrow(`Collection file not found: ${file}`);
  });

  it('reports invalid JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ not json', 'utf8');
    expect(() => loadTextCollection(file)).toThrow(`Collection file ${file} is not valid JSON`);
  });
});
