import { createLogger } from '@workspace/logger';
import { sleep as defaultSleep, type Sleep } from '../anti-blocking/politeness.js';
import type {
  CandidateBatch,
  ExtractionCollaborator,
  ItemSummary,
} from '../crawl/types.js';

const log = createLogger('pagination');

type PaginationOptions = {
  maxScrollAttempts: number;
  settleMs: number;
  sleep?: Sleep;
};

const DEFAULT_OPTIONS: PaginationOptions = {
  maxScrollAttempts: 10,
  settleMs: 5000,
};

/**
 * Walks one collection page by page. Within a page, in-place loading is
 * driven until the listing stops growing; then the candidates are read and
 * the source is asked for the next page.
 */
export class PaginationTraversal {
  private readonly source: ExtractionCollaborator;
  private readonly options: PaginationOptions;
  private readonly sleep: Sleep;

  constructor(source: ExtractionCollaborator, options?: Partial<PaginationOptions>) {
    this.source = source;
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.sleep = this.options.sleep ?? defaultSleep;
  }

  /**
   * Ends by itself once the source reports no further page. A consumer that
   * stops early (quota, interrupt) never triggers another page load.
   */
  async *pages(collection: string): AsyncGenerator<CandidateBatch, void, undefined> {
    let pageNumber = 1;

    while (true) {
      const attempts = await this.loadWholePage(collection);
      const items = await this.collectCandidates(collection, pageNumber);

      log.debug(
        `Page ${pageNumber} of ${collection}: ${items.length} candidates after ${attempts} load attempts`,
      );

      yield { pageNumber, items };

      const advanced = await this.source.advancePage(collection);
      if (!advanced) {
        log.info(`No further pages in ${collection} after page ${pageNumber}`);
        return;
      }

      pageNumber += 1;
    }
  }

  /** Returns how many load attempts were made. */
  async loadWholePage(collection: string): Promise<number> {
    const { loadMore, measureListing } = this.source;
    if (!loadMore || !measureListing) {
      return 0;
    }

    let previousSize = await measureListing.call(this.source, collection);
    let attempts = 0;
    let settled = false;

    while (attempts < this.options.maxScrollAttempts) {
      await loadMore.call(this.source, collection);
      await this.sleep(this.options.settleMs);
      attempts += 1;

      const size = await measureListing.call(this.source, collection);
      if (size === previousSize) {
        settled = true;
        break;
      }

      previousSize = size;
    }

    if (!settled) {
      log.debug(`Stopped loading ${collection} after ${attempts} attempts; listing may be longer`);
    }

    return attempts;
  }

  private async collectCandidates(
    collection: string,
    pageNumber: number,
  ): Promise<ItemSummary[]> {
    const items: ItemSummary[] = [];
    const identities = new Set<string>();

    for await (const summary of this.source.listCandidates(collection, { pageNumber })) {
      if (identities.has(summary.identity)) {
        continue;
      }

      identities.add(summary.identity);
      items.push(summary);
    }

    return items;
  }
}

export type { PaginationOptions };
