import { log } from '@workspace/logger';
import { z } from 'zod';
import { CheckpointStore } from '../checkpoint/checkpoint-store.js';
import {
  booleanFlagSchema,
  commaSeparatedSchema,
  numberFromString,
  pathFromString,
  type HarvesterEnv,
} from '../config/env.js';
import { CrawlController } from '../crawl/crawl-controller.js';
import type { ExtractionCollaborator, RunSummary } from '../crawl/types.js';
import { errorMessage } from '../errors.js';
import { GroupExtractor } from '../extraction/group-extractor.js';
import { ErrorSnapshotWriter } from '../observability/error-snapshot.js';
import { CrawlMetrics } from '../observability/metrics.js';
import { PaginationTraversal } from '../pagination/pagination-traversal.js';
import { CsvRecordWriter } from '../sink/csv-writer.js';
import { ResultSink } from '../sink/result-sink.js';
import type { Sleep } from '../anti-blocking/politeness.js';
import { HttpWebEngine } from '../web-engine/http-engine.js';

const EXIT_INTERRUPTED = 130;

const crawlArgsSchema = z.object({
  groups: commaSeparatedSchema.optional(),
  maxItems: numberFromString('Invalid --maxItems. Provide an integer >= 0.', {
    integer: true,
  }).optional(),
  minDelay: numberFromString('Invalid --minDelay. Provide seconds >= 0.').optional(),
  maxDelay: numberFromString('Invalid --maxDelay. Provide seconds >= 0.').optional(),
  pageWait: numberFromString('Invalid --pageWait. Provide seconds >= 0.').optional(),
  maxScrolls: numberFromString('Invalid --maxScrolls. Provide an integer >= 0.', {
    integer: true,
  }).optional(),
  timeout: numberFromString('Invalid --timeout. Provide seconds >= 0.').optional(),
  checkpoint: pathFromString('Invalid --checkpoint path').optional(),
  outputFile: pathFromString('Invalid --outputFile path').optional(),
  errorsDir: pathFromString('Invalid --errorsDir path').optional(),
  fresh: booleanFlagSchema,
});

type CrawlArgs = z.infer<typeof crawlArgsSchema>;

type CrawlSettings = {
  groups: string[];
  quota: number;
  minDelayMs: number;
  maxDelayMs: number;
  pageLoadWaitMs: number;
  maxScrollAttempts: number;
  detailTimeoutMs: number;
  checkpointFile: string;
  outputFile: string;
  errorSnapshotDir: string;
  fresh: boolean;
};

type CrawlActionDeps = {
  /** Replaces the HTTP extractor, e.g. with an in-memory source. */
  source?: ExtractionCollaborator;
  sleep?: Sleep;
  /** Exposes the controller so a caller can request a stop. */
  onController?: (controller: CrawlController) => void;
};

const secondsToMs = (seconds: number): number => Math.round(seconds * 1000);

/** Command line options win over the environment. */
function resolveCrawlSettings(args: CrawlArgs, env: HarvesterEnv): CrawlSettings {
  return {
    groups: args.groups ?? env.targetGroups,
    quota: args.maxItems ?? env.maxThreadsPerGroup,
    minDelayMs: args.minDelay !== undefined ? secondsToMs(args.minDelay) : env.minDelayMs,
    maxDelayMs: args.maxDelay !== undefined ? secondsToMs(args.maxDelay) : env.maxDelayMs,
    pageLoadWaitMs: args.pageWait !== undefined ? secondsToMs(args.pageWait) : env.pageLoadWaitMs,
    maxScrollAttempts: args.maxScrolls ?? env.maxScrollAttempts,
    detailTimeoutMs: args.timeout !== undefined ? secondsToMs(args.timeout) : env.detailTimeoutMs,
    checkpointFile: args.checkpoint ?? env.checkpointFile,
    outputFile: args.outputFile ?? env.outputFile,
    errorSnapshotDir: args.errorsDir ?? env.errorSnapshotDir,
    fresh: args.fresh,
  };
}

function logSummary(summary: RunSummary, outputFile: string, flushed: number): void {
  for (const outcome of summary.outcomes) {
    log.info(
      `${outcome.collection}: ${outcome.status}`,
      JSON.stringify({
        processed: outcome.processed,
        failed: outcome.failed,
        skippedByPosition: outcome.skippedByPosition,
        skippedAsSeen: outcome.skippedAsSeen,
        lastPosition: outcome.lastPosition,
      }),
    );
  }

  log.info(
    'Crawl action finished',
    JSON.stringify({
      processed: summary.processed,
      failed: summary.failed,
      written: flushed,
      outputFile,
      durationMs: summary.durationMs,
    }),
  );
}

/**
 * Crawls every configured group, appending rows to the CSV output after each
 * group and once more on the way out. Returns the process exit code.
 */
export async function runCrawlAction(
  settings: CrawlSettings,
  deps?: CrawlActionDeps,
): Promise<number> {
  if (settings.groups.length === 0) {
    log.error('No groups to crawl. Set TARGET_GROUPS or pass --groups.');
    return 1;
  }

  log.info('Starting crawl action', JSON.stringify(settings));

  const store = new CheckpointStore(settings.checkpointFile);
  if (settings.fresh) {
    log.warn(`Discarding checkpoint at ${settings.checkpointFile}`);
    store.reset();
  }

  const source =
    deps?.source ??
    new GroupExtractor({
      engine: new HttpWebEngine({ timeoutMs: settings.detailTimeoutMs }),
      detailTimeoutMs: settings.detailTimeoutMs,
    });

  const errorSnapshots = new ErrorSnapshotWriter({ directory: settings.errorSnapshotDir });

  const sink = new ResultSink();
  const writer = new CsvRecordWriter(settings.outputFile);
  const controller = new CrawlController(
    {
      quota: settings.quota,
      politeness: { minDelayMs: settings.minDelayMs, maxDelayMs: settings.maxDelayMs },
    },
    {
      store,
      source,
      sink,
      traversal: new PaginationTraversal(source, {
        maxScrollAttempts: settings.maxScrollAttempts,
        settleMs: settings.pageLoadWaitMs,
        sleep: deps?.sleep,
      }),
      metrics: new CrawlMetrics(),
      errorSnapshots,
      sleep: deps?.sleep,
    },
  );
  deps?.onController?.(controller);

  const onSignal = (signal: NodeJS.Signals): void => {
    log.warn(`Received ${signal}; stopping after the current thread`);
    controller.requestStop();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  let exitCode = 0;

  try {
    errorSnapshots.initialize();

    const summary = await controller.run(settings.groups, {
      afterCollection: async () => {
        await sink.flush(writer);
      },
    });

    await sink.flush(writer);
    logSummary(summary, settings.outputFile, sink.totalFlushed);

    if (controller.stopping) {
      exitCode = EXIT_INTERRUPTED;
    }
  } catch (error) {
    log.fatal('Crawl aborted:', errorMessage(error));
    exitCode = 1;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);

    if (sink.size > 0) {
      try {
        const written = await sink.flush(writer);
        log.info(`Wrote ${written} pending records to ${settings.outputFile}`);
      } catch (error) {
        log.error(`Could not write ${sink.size} pending records:`, errorMessage(error));
        exitCode = 1;
      }
    }

    await source.cleanup?.();
  }

  return exitCode;
}

export { crawlArgsSchema, resolveCrawlSettings };
export type { CrawlActionDeps, CrawlArgs, CrawlSettings };
