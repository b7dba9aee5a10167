import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { log } from '@workspace/logger';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { pathFromString } from '../config/env.js';
import { FAILED_CONTENT } from '../crawl/crawl-controller.js';
import { errorMessage } from '../errors.js';
import { ContentFingerprintIndex } from '../identity/content-index.js';
import { contentFingerprint } from '../identity/identity.js';

const dedupeArgsSchema = z.object({
  input: pathFromString('Missing required option: --input'),
  index: pathFromString('Invalid --index path').optional(),
  outputFile: pathFromString('Invalid --outputFile path').optional(),
});

type DedupeArgs = z.infer<typeof dedupeArgsSchema>;

const csvRowSchema = z.object({
  group_url: z.string().default(''),
  title: z.string().default(''),
  date: z.string().default(''),
  author: z.string().default(''),
  url: z.string().default(''),
  content: z.string(),
});

type IngestionDocument = {
  id: string;
  url: string;
  groupUrl: string;
  title: string;
  date: string;
  author: string;
  content: string;
};

type DedupeResult = {
  documents: IngestionDocument[];
  duplicates: number;
  failed: number;
  invalid: number;
};

/**
 * Keeps the rows whose content has not been seen before, either earlier in
 * the file or in a previous ingestion recorded by the index. Rows whose
 * extraction failed carry no content worth ingesting and are dropped.
 */
function dedupeRows(rows: readonly unknown[], index: ContentFingerprintIndex): DedupeResult {
  const result: DedupeResult = { documents: [], duplicates: 0, failed: 0, invalid: 0 };

  for (const row of rows) {
    const parsed = csvRowSchema.safeParse(row);
    if (!parsed.success) {
      result.invalid += 1;
      continue;
    }

    const { content } = parsed.data;
    if (!content.trim() || content === FAILED_CONTENT) {
      result.failed += 1;
      continue;
    }

    if (!index.add(content)) {
      result.duplicates += 1;
      continue;
    }

    result.documents.push({
      id: contentFingerprint(content),
      url: parsed.data.url,
      groupUrl: parsed.data.group_url,
      title: parsed.data.title,
      date: parsed.data.date,
      author: parsed.data.author,
      content,
    });
  }

  return result;
}

function defaultOutputFile(input: string): string {
  return input.replace(/\.csv$/i, '') + '.jsonl';
}

/**
 * Writes the new documents as JSON lines and records their fingerprints, so
 * the next ingestion skips them.
 */
export async function runDedupeAction(
  input: string,
  indexFile: string,
  outputFile: string = defaultOutputFile(input),
): Promise<number> {
  if (!existsSync(input)) {
    log.error(`Input file not found: ${input}`);
    return 1;
  }

  let rows: unknown[];
  try {
    rows = parse(readFileSync(input, 'utf-8'), { columns: true, skip_empty_lines: true });
  } catch (error) {
    log.error(`Could not parse ${input}:`, errorMessage(error));
    return 1;
  }

  const index = new ContentFingerprintIndex(indexFile);
  const known = index.load();
  const result = dedupeRows(rows, index);

  const dir = dirname(outputFile);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const lines = result.documents.map((document) => JSON.stringify(document));
  await writeFile(outputFile, lines.length ? `${lines.join('\n')}\n` : '', 'utf-8');
  index.save();

  log.info(
    'Dedupe action finished',
    JSON.stringify({
      rows: rows.length,
      written: result.documents.length,
      duplicates: result.duplicates,
      failed: result.failed,
      invalid: result.invalid,
      previouslyKnown: known,
      outputFile,
    }),
  );

  return 0;
}

export { dedupeArgsSchema, dedupeRows };
export type { DedupeArgs, DedupeResult, IngestionDocument };
