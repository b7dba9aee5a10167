import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'csv-parse/sync';
import { CsvRecordWriter } from './csv-writer.js';
import type { ResultRecord } from './types.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-csv-writer');
const OUTPUT_PATH = join(TEST_DIR, 'threads.csv');

function record(url: string, content: string): ResultRecord {
  return {
    group_url: 'https://groups.example.com/g/soil-carbon',
    title: 'Field trial, round 2',
    date: 'Feb 2',
    author: 'M. Writer',
    url,
    content,
  };
}

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

describe('CsvRecordWriter', () => {
  beforeEach(() => {
    cleanup();
  });

  afterEach(() => {
    cleanup();
  });

  it('writes a header followed by one row per record', async () => {
    const writer = new CsvRecordWriter(OUTPUT_PATH);

    await writer.write([record('u1', 'plain text')]);

    const lines = readFileSync(OUTPUT_PATH, 'utf-8').trim().split('\n');
    expect(lines).toEqual([
      'group_url,title,date,author,url,content',
      'https://groups.example.com/g/soil-carbon,"Field trial, round 2",Feb 2,M. Writer,u1,plain text',
    ]);
  });

  it('writes the header only once across appends', async () => {
    const writer = new CsvRecordWriter(OUTPUT_PATH);

    await writer.write([record('u1', 'one')]);
    await writer.write([record('u2', 'two')]);

    const content = readFileSync(OUTPUT_PATH, 'utf-8');
    expect(content.match(/^group_url,/gm)).toHaveLength(1);

    const rows: Array<Record<string, string>> = parse(content, { columns: true });
    expect(rows.map((row) => row.url)).toEqual(['u1', 'u2']);
  });

  it('round-trips multi-line content and quotes', async () => {
    mkdirSync(TEST_DIR, { recursive: true });
    const writer = new CsvRecordWriter(OUTPUT_PATH);
    const body = 'First line\nSecond "quoted" line';

    await writer.write([record('u1', body)]);

    const rows: Array<Record<string, string>> = parse(readFileSync(OUTPUT_PATH, 'utf-8'), {
      columns: true,
    });
    expect(rows).toHaveLength(1);
    expect(rows[0]?.content).toBe(body);
  });

  it('does not create a file for an empty batch', async () => {
    const writer = new CsvRecordWriter(OUTPUT_PATH);

    await writer.write([]);

    expect(existsSync(OUTPUT_PATH)).toBe(false);
  });
});
