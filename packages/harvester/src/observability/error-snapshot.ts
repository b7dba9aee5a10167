import { existsSync, mkdirSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '@workspace/logger';
import { errorMessage } from '../errors.js';

const log = createLogger('error-snapshot');

type ErrorSnapshotData = {
  identity: string;
  collection: string;
  title?: string;
  errorKind: 'extraction-failed' | 'extraction-timeout';
  errorMessage: string;
  timestamp: number;
};

type ErrorSnapshotConfig = {
  directory: string;
  maxSnapshots: number;
};

const DEFAULT_CONFIG: ErrorSnapshotConfig = {
  directory: 'data/errors',
  maxSnapshots: 100,
};

/**
 * One JSON file per failed thread, for inspecting failures after a run.
 * Writing stops silently at `maxSnapshots`; a snapshot that cannot be written
 * is logged and never interrupts the crawl.
 */
export class ErrorSnapshotWriter {
  private readonly config: ErrorSnapshotConfig;
  private snapshotCount: number;

  constructor(config?: Partial<ErrorSnapshotConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.snapshotCount = 0;
  }

  initialize(): void {
    if (!existsSync(this.config.directory)) {
      mkdirSync(this.config.directory, { recursive: true });
    }

    this.snapshotCount = this.countExistingSnapshots();
  }

  write(data: ErrorSnapshotData): boolean {
    if (this.snapshotCount >= this.config.maxSnapshots) {
      return false;
    }

    try {
      if (!existsSync(this.config.directory)) {
        mkdirSync(this.config.directory, { recursive: true });
      }

      const baseName = `${this.sanitizeFilename(data.identity)}-${data.timestamp}`;
      const jsonPath = join(this.config.directory, `${baseName}.json`);
      writeFileSync(jsonPath, JSON.stringify(data, null, 2), 'utf-8');

      this.snapshotCount += 1;
      return true;
    } catch (error) {
      log.warn(`Could not write error snapshot for ${data.identity}:`, errorMessage(error));
      return false;
    }
  }

  getSnapshotCount(): number {
    return this.snapshotCount;
  }

  private countExistingSnapshots(): number {
    return readdirSync(this.config.directory).filter((file) => file.endsWith('.json')).length;
  }

  private sanitizeFilename(value: string): string {
    return value.replace(/^https?:\/\//, '').replace(/[^a-zA-Z0-9_-]/g, '_').slice(-100);
  }
}

export type { ErrorSnapshotData, ErrorSnapshotConfig };
