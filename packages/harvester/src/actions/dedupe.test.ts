import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import { dedupeRows, runDedupeAction } from './dedupe.js';
import { ContentFingerprintIndex } from '../identity/content-index.js';
import { contentFingerprint } from '../identity/identity.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-dedupe-action');
const INPUT = join(TEST_DIR, 'threads.csv');
const INDEX = join(TEST_DIR, 'hashes.json');

function row(url: string, content: string): Record<string, string> {
  return {
    group_url: 'https://groups.example.com/g/soil-carbon',
    title: `Title ${url}`,
    date: 'Mar 4',
    author: 'A. Author',
    url,
    content,
  };
}

function writeInput(rows: Array<Record<string, string>>): void {
  writeFileSync(INPUT, stringify(rows, { header: true }), 'utf-8');
}

function readOutput(path: string): unknown[] {
  return readFileSync(path, 'utf-8')
    .split('\n')
    .filter(Boolean)
    .map((line) => JSON.parse(line));
}

describe('dedupeRows', () => {
  beforeEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('keeps the first row of each distinct content', () => {
    const index = new ContentFingerprintIndex(INDEX);

    const result = dedupeRows(
      [row('u1', 'Biochar works'), row('u2', '  biochar   WORKS '), row('u3', 'Compost too')],
      index,
    );

    expect(result.documents.map((document) => document.url)).toEqual(['u1', 'u3']);
    expect(result.duplicates).toBe(1);
    expect(index.size).toBe(2);
  });

  it('drops failed extractions and malformed rows', () => {
    const result = dedupeRows(
      [row('u1', 'Error extracting text'), row('u2', '   '), { url: 'u3' }, 'not a row'],
      new ContentFingerprintIndex(INDEX),
    );

    expect(result).toEqual({ documents: [], duplicates: 0, failed: 2, invalid: 2 });
  });

  it('shapes documents for ingestion', () => {
    const [document] = dedupeRows([row('u1', 'Biochar works')], new ContentFingerprintIndex(INDEX)).documents;

    expect(document).toEqual({
      id: contentFingerprint('Biochar works'),
      url: 'u1',
      groupUrl: 'https://groups.example.com/g/soil-carbon',
      title: 'Title u1',
      date: 'Mar 4',
      author: 'A. Author',
      content: 'Biochar works',
    });
  });
});

describe('runDedupeAction', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('writes new documents as JSON lines beside the input', async () => {
    writeInput([row('u1', 'Biochar works'), row('u2', 'biochar works'), row('u3', 'Compost, "aged"\nsix months')]);

    const exitCode = await runDedupeAction(INPUT, INDEX);

    expect(exitCode).toBe(0);
    const documents = readOutput(join(TEST_DIR, 'threads.jsonl'));
    expect(documents).toHaveLength(2);
    expect(documents[1]).toMatchObject({ url: 'u3', content: 'Compost, "aged"\nsix months' });
  });

  it('skips content ingested by an earlier run', async () => {
    writeInput([row('u1', 'Biochar works')]);
    await runDedupeAction(INPUT, INDEX, join(TEST_DIR, 'first.jsonl'));

    writeInput([row('u1', 'Biochar works'), row('u9', 'Fresh reply')]);
    await runDedupeAction(INPUT, INDEX, join(TEST_DIR, 'second.jsonl'));

    expect(readOutput(join(TEST_DIR, 'second.jsonl'))).toEqual([
      expect.objectContaining({ url: 'u9' }),
    ]);
    expect(JSON.parse(readFileSync(INDEX, 'utf-8'))).toEqual([
      contentFingerprint('Biochar works'),
      contentFingerprint('Fresh reply'),
    ]);
  });

  it('fails for a missing input file', async () => {
    expect(await runDedupeAction(join(TEST_DIR, 'absent.csv'), INDEX)).toBe(1);
  });
});
