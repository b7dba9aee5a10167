import { z } from 'zod';

function blankToUndefined(value: unknown): unknown {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length ? trimmed : undefined;
  }

  return value;
}

/** Accepts what a shell or `.env` file hands over: strings holding numbers. */
function numberFromString(message: string, options?: { integer?: boolean }) {
  const base = z.number({ invalid_type_error: message }).min(0, message);

  return z.preprocess(
    (value) => {
      const cleaned = blankToUndefined(value);
      if (typeof cleaned === 'string') {
        const parsedValue = Number(cleaned);
        return Number.isFinite(parsedValue) ? parsedValue : cleaned;
      }

      return cleaned;
    },
    options?.integer ? base.int(message) : base,
  );
}

function pathFromString(message: string) {
  return z.preprocess(
    blankToUndefined,
    z.string({ required_error: message, invalid_type_error: message }).min(1, message),
  );
}

const commaSeparatedSchema = z.preprocess((value) => {
  const cleaned = blankToUndefined(value);
  if (typeof cleaned === 'string') {
    return cleaned
      .split(',')
      .map((entry) => entry.trim())
      .filter(Boolean);
  }

  return cleaned;
}, z.array(z.string()));

/** `--flag`, `--flag=true` and `--flag=false`; absent means false. */
const booleanFlagSchema = z.preprocess(
  (value) => {
    const cleaned = blankToUndefined(value);
    return typeof cleaned === 'string' ? cleaned.toLowerCase() : cleaned ?? 'false';
  },
  z.enum(['true', 'false']).transform((value) => value === 'true'),
);

const envSchema = z.object({
  TARGET_GROUPS: commaSeparatedSchema.default([]),
  MAX_THREADS_PER_GROUP: numberFromString('MAX_THREADS_PER_GROUP must be an integer >= 0', {
    integer: true,
  }).default(100),
  OUTPUT_FILE: pathFromString('OUTPUT_FILE must not be empty').default('data/group_threads.csv'),
  CHECKPOINT_FILE: pathFromString('CHECKPOINT_FILE must not be empty').default(
    'data/scraper_checkpoint.json',
  ),
  CONTENT_HASH_FILE: pathFromString('CONTENT_HASH_FILE must not be empty').default(
    'data/content_hashes.json',
  ),
  ERROR_SNAPSHOT_DIR: pathFromString('ERROR_SNAPSHOT_DIR must not be empty').default(
    'data/errors',
  ),
  MIN_DELAY: numberFromString('MIN_DELAY must be a number of seconds >= 0').default(3),
  MAX_DELAY: numberFromString('MAX_DELAY must be a number of seconds >= 0').default(6),
  PAGE_LOAD_WAIT: numberFromString('PAGE_LOAD_WAIT must be a number of seconds >= 0').default(5),
  MAX_SCROLL_ATTEMPTS: numberFromString('MAX_SCROLL_ATTEMPTS must be an integer >= 0', {
    integer: true,
  }).default(10),
  DETAIL_TIMEOUT: numberFromString('DETAIL_TIMEOUT must be a number of seconds >= 0').default(30),
});

type HarvesterEnv = {
  targetGroups: string[];
  maxThreadsPerGroup: number;
  outputFile: string;
  checkpointFile: string;
  contentHashFile: string;
  errorSnapshotDir: string;
  minDelayMs: number;
  maxDelayMs: number;
  pageLoadWaitMs: number;
  maxScrollAttempts: number;
  detailTimeoutMs: number;
};

const secondsToMs = (seconds: number): number => Math.round(seconds * 1000);

/**
 * Reads the harvester settings. Durations are given in seconds and returned
 * in milliseconds. Blank variables count as unset; invalid ones throw a
 * ZodError.
 */
function loadEnv(source: NodeJS.ProcessEnv = process.env): HarvesterEnv {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = envSchema.parse(present);

  return {
    targetGroups: parsed.TARGET_GROUPS,
    maxThreadsPerGroup: parsed.MAX_THREADS_PER_GROUP,
    outputFile: parsed.OUTPUT_FILE,
    checkpointFile: parsed.CHECKPOINT_FILE,
    contentHashFile: parsed.CONTENT_HASH_FILE,
    errorSnapshotDir: parsed.ERROR_SNAPSHOT_DIR,
    minDelayMs: secondsToMs(parsed.MIN_DELAY),
    maxDelayMs: secondsToMs(parsed.MAX_DELAY),
    pageLoadWaitMs: secondsToMs(parsed.PAGE_LOAD_WAIT),
    maxScrollAttempts: parsed.MAX_SCROLL_ATTEMPTS,
    detailTimeoutMs: secondsToMs(parsed.DETAIL_TIMEOUT),
  };
}

export {
  blankToUndefined,
  booleanFlagSchema,
  commaSeparatedSchema,
  loadEnv,
  numberFromString,
  pathFromString,
};
export type { HarvesterEnv };
