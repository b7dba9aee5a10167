import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { runStatusAction, statusArgsSchema, summarizeCheckpoint } from './status.js';
import { emptyCheckpointState } from '../checkpoint/types.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-status-action');
const CHECKPOINT = join(TEST_DIR, 'checkpoint.json');

describe('summarizeCheckpoint', () => {
  it('lists collections alphabetically with their progress', () => {
    const state = emptyCheckpointState();
    state.progress.set('https://groups.example.com/g/b', { lastVisitedPosition: 4, completed: false });
    state.progress.set('https://groups.example.com/g/a', { lastVisitedPosition: 12, completed: true });
    state.seenIdentities.add('u1');
    state.seenIdentities.add('u2');

    expect(summarizeCheckpoint('state.json', state)).toEqual({
      checkpoint: 'state.json',
      seenThreads: 2,
      collections: [
        { collection: 'https://groups.example.com/g/a', lastVisitedPosition: 12, completed: true },
        { collection: 'https://groups.example.com/g/b', lastVisitedPosition: 4, completed: false },
      ],
    });
  });
});

describe('runStatusAction', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('prints the checkpoint summary as JSON', async () => {
    writeFileSync(
      CHECKPOINT,
      JSON.stringify({
        groups: { 'https://groups.example.com/g/a': { last_thread_index: 3, completed: false } },
        scraped_urls: ['u1', 'u2', 'u3'],
      }),
      'utf-8',
    );
    const print = vi.spyOn(console, 'log').mockImplementation(() => {});

    const exitCode = await runStatusAction(CHECKPOINT, false);

    expect(exitCode).toBe(0);
    expect(print).toHaveBeenCalledWith(
      JSON.stringify({
        checkpoint: CHECKPOINT,
        seenThreads: 3,
        collections: [
          { collection: 'https://groups.example.com/g/a', lastVisitedPosition: 3, completed: false },
        ],
      }),
    );
  });

  it('reports an empty state when there is no checkpoint yet', async () => {
    const print = vi.spyOn(console, 'log').mockImplementation(() => {});

    await runStatusAction(join(TEST_DIR, 'missing.json'), false);

    expect(print).toHaveBeenCalledWith(
      JSON.stringify({ checkpoint: join(TEST_DIR, 'missing.json'), seenThreads: 0, collections: [] }),
    );
  });
});

describe('statusArgsSchema', () => {
  it('reads --pretty as a flag', () => {
    expect(statusArgsSchema.parse({ pretty: 'true' }).pretty).toBe(true);
    expect(statusArgsSchema.parse({ pretty: 'FALSE' }).pretty).toBe(false);
    expect(statusArgsSchema.parse({}).pretty).toBe(false);
  });
});
