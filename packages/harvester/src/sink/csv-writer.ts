import { existsSync, mkdirSync, statSync } from 'node:fs';
import { appendFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import { RESULT_COLUMNS, type RecordWriter, type ResultRecord } from './types.js';

/**
 * Appends result rows to a CSV file. The header is written once, when the
 * file is new or empty, so resumed runs keep extending the same file.
 */
export class CsvRecordWriter implements RecordWriter {
  private readonly outputPath: string;

  constructor(outputPath: string) {
    this.outputPath = outputPath;
  }

  get path(): string {
    return this.outputPath;
  }

  async write(records: readonly ResultRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const dir = dirname(this.outputPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const needsHeader = !existsSync(this.outputPath) || statSync(this.outputPath).size === 0;
    const csv = stringify([...records], {
      header: needsHeader,
      columns: [...RESULT_COLUMNS],
    });

    await appendFile(this.outputPath, csv, 'utf-8');
  }
}
