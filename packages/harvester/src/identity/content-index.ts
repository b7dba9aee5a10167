import { existsSync, readFileSync } from 'node:fs';
import { createLogger } from '@workspace/logger';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { writeFileAtomicSync } from '../utils/atomic-write.js';
import { contentFingerprint } from './identity.js';

const log = createLogger('content-index');

const persistedIndexSchema = z.array(z.string().regex(/^[0-9a-f]{64}$/));

/**
 * Payload-level duplicate detection shared with ingestion. Independent of the
 * crawl checkpoint: two identities with the same text share one fingerprint.
 */
export class ContentFingerprintIndex {
  private readonly indexPath: string;
  private readonly fingerprints: Set<string>;

  constructor(indexPath: string) {
    this.indexPath = indexPath;
    this.fingerprints = new Set();
  }

  load(): number {
    this.fingerprints.clear();

    if (!existsSync(this.indexPath)) {
      return 0;
    }

    try {
      const parsed = persistedIndexSchema.safeParse(
        JSON.parse(readFileSync(this.indexPath, 'utf-8')),
      );

      if (!parsed.success) {
        log.warn(`Ignoring malformed fingerprint index at ${this.indexPath}`);
        return 0;
      }

      for (const fingerprint of parsed.data) {
        this.fingerprints.add(fingerprint);
      }
    } catch (error) {
      log.warn(`Ignoring unreadable fingerprint index at ${this.indexPath}:`, errorMessage(error));
    }

    return this.fingerprints.size;
  }

  has(text: string): boolean {
    return this.fingerprints.has(contentFingerprint(text));
  }

  /** Returns `true` when the text had not been seen before. */
  add(text: string): boolean {
    const fingerprint = contentFingerprint(text);
    if (this.fingerprints.has(fingerprint)) {
      return false;
    }

    this.fingerprints.add(fingerprint);
    return true;
  }

  get size(): number {
    return this.fingerprints.size;
  }

  save(): void {
    writeFileAtomicSync(this.indexPath, JSON.stringify([...this.fingerprints], null, 2));
  }
}
