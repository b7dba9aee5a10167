import { existsSync, readFileSync, rmSync } from 'node:fs';
import { createLogger } from '@workspace/logger';
import {
  CheckpointPersistenceError,
  MalformedCheckpointError,
  errorMessage,
} from '../errors.js';
import { writeFileAtomicSync } from '../utils/atomic-write.js';
import {
  NOTHING_VISITED,
  emptyCheckpointState,
  persistedCheckpointSchema,
  type CheckpointState,
  type PersistedCheckpoint,
  type ProgressRecord,
} from './types.js';

const log = createLogger('checkpoint');

/**
 * Durable record of which collections were walked how far and which thread
 * identities were already processed. Every mutating call writes the whole
 * state before returning.
 */
export class CheckpointStore {
  private readonly statePath: string;
  private state: CheckpointState;

  constructor(statePath: string) {
    this.statePath = statePath;
    this.state = emptyCheckpointState();
  }

  get path(): string {
    return this.statePath;
  }

  /**
   * Replaces the in-memory state with what is on disk. A missing file yields
   * the empty state; so does an unreadable one, after a warning.
   */
  load(): CheckpointState {
    this.state = this.readPersisted();
    return this.snapshot();
  }

  save(): void {
    try {
      writeFileAtomicSync(
        this.statePath,
        JSON.stringify(this.toPersisted(), null, 2),
      );
    } catch (error) {
      throw new CheckpointPersistenceError(this.statePath, { cause: error });
    }
  }

  getLastPosition(collection: string): number {
    return this.state.progress.get(collection)?.lastVisitedPosition ?? NOTHING_VISITED;
  }

  updatePosition(collection: string, position: number): void {
    const record = this.recordFor(collection);
    if (position <= record.lastVisitedPosition) {
      log.debug(
        `Ignoring position ${position} for ${collection}; already at ${record.lastVisitedPosition}`,
      );
      return;
    }

    record.lastVisitedPosition = position;
    this.save();
  }

  isCompleted(collection: string): boolean {
    return this.state.progress.get(collection)?.completed ?? false;
  }

  markCompleted(collection: string): void {
    const record = this.recordFor(collection);
    if (record.completed) {
      return;
    }

    record.completed = true;
    this.save();
  }

  isSeen(identity: string): boolean {
    return this.state.seenIdentities.has(identity);
  }

  markSeen(identity: string): void {
    if (this.state.seenIdentities.has(identity)) {
      return;
    }

    this.state.seenIdentities.add(identity);
    this.save();
  }

  seenCount(): number {
    return this.state.seenIdentities.size;
  }

  snapshot(): CheckpointState {
    const progress = new Map<string, ProgressRecord>();
    for (const [collection, record] of this.state.progress) {
      progress.set(collection, { ...record });
    }

    return { progress, seenIdentities: new Set(this.state.seenIdentities) };
  }

  reset(): void {
    rmSync(this.statePath, { force: true });
    this.state = emptyCheckpointState();
  }

  private recordFor(collection: string): ProgressRecord {
    let record = this.state.progress.get(collection);
    if (!record) {
      record = { lastVisitedPosition: NOTHING_VISITED, completed: false };
      this.state.progress.set(collection, record);
    }

    return record;
  }

  private readPersisted(): CheckpointState {
    if (!existsSync(this.statePath)) {
      return emptyCheckpointState();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.statePath, 'utf-8'));
    } catch (error) {
      return this.recoverFrom(
        new MalformedCheckpointError(this.statePath, errorMessage(error), {
          cause: error,
        }),
      );
    }

    const parsed = persistedCheckpointSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const reason = issue
        ? `${issue.path.join('.') || '<root>'}: ${issue.message}`
        : 'unexpected shape';
      return this.recoverFrom(new MalformedCheckpointError(this.statePath, reason));
    }

    return fromPersisted(parsed.data);
  }

  private recoverFrom(error: MalformedCheckpointError): CheckpointState {
    log.warn('Starting from an empty checkpoint.', error);
    return emptyCheckpointState();
  }

  private toPersisted(): PersistedCheckpoint {
    const groups: PersistedCheckpoint['groups'] = {};
    for (const [collection, record] of this.state.progress) {
      groups[collection] = {
        last_thread_index: record.lastVisitedPosition,
        completed: record.completed,
      };
    }

    return { groups, scraped_urls: [...this.state.seenIdentities] };
  }
}

function fromPersisted(persisted: PersistedCheckpoint): CheckpointState {
  const state = emptyCheckpointState();

  for (const [collection, group] of Object.entries(persisted.groups)) {
    state.progress.set(collection, {
      lastVisitedPosition: group.last_thread_index,
      completed: group.completed,
    });
  }

  for (const identity of persisted.scraped_urls) {
    state.seenIdentities.add(identity);
  }

  return state;
}
