import { z } from 'zod';
import { CheckpointStore } from '../checkpoint/checkpoint-store.js';
import type { CheckpointState } from '../checkpoint/types.js';
import { booleanFlagSchema, pathFromString } from '../config/env.js';
import { formatJson } from '../utils/json.js';

const statusArgsSchema = z.object({
  checkpoint: pathFromString('Invalid --checkpoint path').optional(),
  pretty: booleanFlagSchema,
});

type StatusArgs = z.infer<typeof statusArgsSchema>;

type CheckpointSummary = {
  checkpoint: string;
  seenThreads: number;
  collections: Array<{
    collection: string;
    lastVisitedPosition: number;
    completed: boolean;
  }>;
};

function summarizeCheckpoint(path: string, state: CheckpointState): CheckpointSummary {
  return {
    checkpoint: path,
    seenThreads: state.seenIdentities.size,
    collections: [...state.progress.entries()]
      .map(([collection, record]) => ({
        collection,
        lastVisitedPosition: record.lastVisitedPosition,
        completed: record.completed,
      }))
      .sort((left, right) => left.collection.localeCompare(right.collection)),
  };
}

/** Prints where each collection stands without touching the checkpoint. */
export async function runStatusAction(checkpointFile: string, pretty: boolean): Promise<number> {
  const store = new CheckpointStore(checkpointFile);
  const summary = summarizeCheckpoint(checkpointFile, store.load());

  console.log(formatJson(summary, pretty));
  return 0;
}

export { statusArgsSchema, summarizeCheckpoint };
export type { CheckpointSummary, StatusArgs };
