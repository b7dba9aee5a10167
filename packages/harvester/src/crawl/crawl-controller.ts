import { createLogger } from '@workspace/logger';
import { sleep as defaultSleep, waitPolitely, type Sleep } from '../anti-blocking/politeness.js';
import type { CheckpointStore } from '../checkpoint/checkpoint-store.js';
import { ExtractionError } from '../errors.js';
import { CrawlMetrics } from '../observability/metrics.js';
import type { ErrorSnapshotWriter } from '../observability/error-snapshot.js';
import { PaginationTraversal } from '../pagination/pagination-traversal.js';
import type { ResultSink } from '../sink/result-sink.js';
import type {
  CollectionOutcome,
  ControllerConfig,
  ExtractionCollaborator,
  Item,
  RunSummary,
} from './types.js';

const log = createLogger('crawl-controller');

/** Content recorded for a thread whose detail could not be extracted. */
const FAILED_CONTENT = 'Error extracting text';

type CrawlControllerDeps = {
  store: CheckpointStore;
  source: ExtractionCollaborator;
  sink: ResultSink;
  traversal?: PaginationTraversal;
  metrics?: CrawlMetrics;
  errorSnapshots?: ErrorSnapshotWriter;
  sleep?: Sleep;
  random?: () => number;
};

type TerminalStatus = CollectionOutcome['status'];

type RunHooks = {
  afterCollection?: (outcome: CollectionOutcome) => Promise<void>;
};

/**
 * Drives every configured collection through
 * `pending → in-progress → exhausted | quota-reached | interrupted`.
 *
 * Positions are numbered by one counter carried across pages, so a page
 * holding a different number of rows than last run does not shift them.
 * A collection only becomes durably `completed` when its pages ran out.
 */
export class CrawlController {
  private readonly config: ControllerConfig;
  private readonly store: CheckpointStore;
  private readonly source: ExtractionCollaborator;
  private readonly sink: ResultSink;
  private readonly traversal: PaginationTraversal;
  private readonly metrics: CrawlMetrics;
  private readonly errorSnapshots: ErrorSnapshotWriter | undefined;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private stopRequested: boolean;

  constructor(config: ControllerConfig, deps: CrawlControllerDeps) {
    this.config = config;
    this.store = deps.store;
    this.source = deps.source;
    this.sink = deps.sink;
    this.sleep = deps.sleep ?? defaultSleep;
    this.traversal =
      deps.traversal ?? new PaginationTraversal(deps.source, { sleep: this.sleep });
    this.metrics = deps.metrics ?? new CrawlMetrics();
    this.errorSnapshots = deps.errorSnapshots;
    this.random = deps.random ?? Math.random;
    this.stopRequested = false;
  }

  /** Finishes the in-flight thread, then stops without marking anything complete. */
  requestStop(): void {
    this.stopRequested = true;
  }

  get stopping(): boolean {
    return this.stopRequested;
  }

  async run(collections: readonly string[], hooks?: RunHooks): Promise<RunSummary> {
    const startTime = Date.now();
    const state = this.store.load();
    log.info(
      `Loaded checkpoint: ${state.progress.size} collections, ${state.seenIdentities.size} threads seen`,
    );

    const outcomes: CollectionOutcome[] = [];
    const pending = [...new Set(collections)];
    for (const [index, collection] of pending.entries()) {
      if (this.stopRequested) {
        log.warn(`Stop requested; not starting ${pending.length - index} remaining collections`);
        break;
      }

      const outcome = await this.crawlCollection(collection);
      outcomes.push(outcome);
      await hooks?.afterCollection?.(outcome);
    }

    this.metrics.log(log);

    return {
      outcomes,
      processed: outcomes.reduce((sum, outcome) => sum + outcome.processed, 0),
      failed: outcomes.reduce((sum, outcome) => sum + outcome.failed, 0),
      durationMs: Date.now() - startTime,
    };
  }

  async crawlCollection(collection: string): Promise<CollectionOutcome> {
    const lastVisited = this.store.getLastPosition(collection);
    const outcome: CollectionOutcome = {
      collection,
      status: 'already-completed',
      processed: 0,
      failed: 0,
      skippedByPosition: 0,
      skippedAsSeen: 0,
      lastPosition: lastVisited,
    };

    if (this.store.isCompleted(collection)) {
      log.info(`Skipping ${collection}: already completed`);
      this.metrics.increment('collections.skipped');
      return outcome;
    }

    log.info(`Crawling ${collection} from position ${lastVisited} (quota ${this.config.quota})`);

    const status =
      this.config.quota > 0 ? await this.visitPages(collection, lastVisited, outcome) : 'quota-reached';

    if (status === 'exhausted') {
      this.store.markCompleted(collection);
      this.metrics.increment('collections.completed');
    }

    outcome.status = status;
    outcome.lastPosition = this.store.getLastPosition(collection);

    log.info(
      `Finished ${collection}: ${status}, ${outcome.processed} new (${outcome.failed} failed), ` +
        `${outcome.skippedByPosition + outcome.skippedAsSeen} skipped`,
    );

    return outcome;
  }

  private async visitPages(
    collection: string,
    lastVisited: number,
    outcome: CollectionOutcome,
  ): Promise<TerminalStatus> {
    let position = 0;

    for await (const batch of this.traversal.pages(collection)) {
      this.metrics.increment('pages.visited');

      for (const summary of batch.items) {
        if (this.stopRequested) {
          return 'interrupted';
        }

        position += 1;

        if (position <= lastVisited) {
          outcome.skippedByPosition += 1;
          this.metrics.increment('items.skipped.position');
          continue;
        }

        if (this.store.isSeen(summary.identity)) {
          log.debug(`Already seen at position ${position}: ${summary.identity}`);
          this.store.updatePosition(collection, position);
          outcome.skippedAsSeen += 1;
          this.metrics.increment('items.skipped.seen');
          continue;
        }

        const succeeded = await this.processItem({ ...summary, collectionRef: collection });
        this.store.markSeen(summary.identity);
        this.store.updatePosition(collection, position);

        outcome.processed += 1;
        this.metrics.increment('items.processed');
        if (!succeeded) {
          outcome.failed += 1;
          this.metrics.increment('items.failed');
        }

        if (outcome.processed >= this.config.quota) {
          return 'quota-reached';
        }

        await waitPolitely(this.config.politeness, this.sleep, this.random);
      }
    }

    return 'exhausted';
  }

  /** Returns whether real content was extracted; failures are still recorded. */
  private async processItem(item: Item): Promise<boolean> {
    const startTime = performance.now();

    try {
      const content = await this.source.fetchDetail(item.identity);
      this.metrics.recordDetailFetch(performance.now() - startTime);
      this.sink.add(item, content);
      log.debug(`Extracted ${content.length} chars from ${item.identity}`);
      return true;
    } catch (error) {
      if (!(error instanceof ExtractionError)) {
        throw error;
      }

      log.warn(`Recording failed thread ${item.identity} (${error.code}):`, error.message);
      this.errorSnapshots?.write({
        identity: item.identity,
        collection: item.collectionRef,
        title: item.title,
        errorKind: error.code,
        errorMessage: error.message,
        timestamp: Date.now(),
      });
      this.sink.add(item, FAILED_CONTENT);
      return false;
    }
  }
}

export { FAILED_CONTENT };
export type { CrawlControllerDeps, RunHooks };
