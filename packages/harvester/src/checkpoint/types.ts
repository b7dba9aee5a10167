import { z } from 'zod';

type ProgressRecord = {
  lastVisitedPosition: number;
  completed: boolean;
};

type CheckpointState = {
  progress: Map<string, ProgressRecord>;
  seenIdentities: Set<string>;
};

const NOTHING_VISITED = -1;

const persistedGroupSchema = z.object({
  last_thread_index: z.number().int().min(NOTHING_VISITED).default(NOTHING_VISITED),
  completed: z.boolean().default(false),
});

const persistedCheckpointSchema = z.object({
  groups: z.record(z.string(), persistedGroupSchema).default({}),
  scraped_urls: z.array(z.string()).default([]),
});

type PersistedCheckpoint = z.infer<typeof persistedCheckpointSchema>;

function emptyCheckpointState(): CheckpointState {
  return { progress: new Map(), seenIdentities: new Set() };
}

export {
  NOTHING_VISITED,
  emptyCheckpointState,
  persistedCheckpointSchema,
};
export type { CheckpointState, PersistedCheckpoint, ProgressRecord };
