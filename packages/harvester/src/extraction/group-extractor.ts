import { createLogger } from '@workspace/logger';
import type { ExtractionCollaborator, ItemSummary, PageState } from '../crawl/types.js';
import { ExtractionError, ExtractionTimeoutError, ListingFetchError } from '../errors.js';
import { canonicalizeUrl } from '../identity/identity.js';
import { GroupListParser, type GroupListPage } from '../parsers/group-list-parser.js';
import { ThreadDetailParser } from '../parsers/thread-detail-parser.js';
import { domainMatches } from '../utils/url.js';
import type { ContentParserPlugin, WebEngine } from '../web-engine/types.js';

const log = createLogger('group-extractor');

type GroupExtractorOptions = {
  engine: WebEngine;
  detailTimeoutMs?: number;
  /** Site-specific parsers tried before the generic listing parser. */
  listPlugins?: ContentParserPlugin<string, GroupListPage>[];
  /** Site-specific parsers tried before the generic thread parser. */
  detailPlugins?: ContentParserPlugin<string, string>[];
  /** Drop thread and next-page links that leave the group's site. Defaults to true. */
  sameSiteOnly?: boolean;
};

type ListingCursor = {
  url: string;
  nextPageUrl?: string;
  visited: Set<string>;
};

/**
 * Reads group listings and thread pages over a `WebEngine`. Pages are
 * followed through their next-page links; a link back to a page already
 * seen for the collection ends the listing.
 */
export class GroupExtractor implements ExtractionCollaborator {
  private readonly engine: WebEngine;
  private readonly detailTimeoutMs: number;
  private readonly listPlugins: ContentParserPlugin<string, GroupListPage>[];
  private readonly detailPlugins: ContentParserPlugin<string, string>[];
  private readonly sameSiteOnly: boolean;
  private readonly listParser = new GroupListParser();
  private readonly detailParser = new ThreadDetailParser();
  private readonly cursors = new Map<string, ListingCursor>();

  constructor(options: GroupExtractorOptions) {
    this.engine = options.engine;
    this.detailTimeoutMs = options.detailTimeoutMs ?? 30000;
    this.listPlugins = options.listPlugins ?? [];
    this.detailPlugins = options.detailPlugins ?? [];
    this.sameSiteOnly = options.sameSiteOnly ?? true;
  }

  async *listCandidates(collection: string, pageState: PageState): AsyncIterable<ItemSummary> {
    const cursor = this.cursorFor(collection);
    const response = await this.engine.fetchContent(cursor.url, {
      htmlParser: this.listParser,
      plugins: this.listPlugins,
    });

    if (!response.success) {
      throw new ListingFetchError(collection, cursor.url, response.error);
    }

    const page = response.content;
    cursor.nextPageUrl = page.nextPageHref
      ? canonicalizeUrl(page.nextPageHref, response.finalUrl)
      : undefined;

    log.debug(`Page ${pageState.pageNumber} of ${collection} lists ${page.threads.length} threads`);

    for (const thread of page.threads) {
      const identity = canonicalizeUrl(thread.href, response.finalUrl);
      if (!identity) {
        log.debug(`Skipping unusable thread link "${thread.href}" on ${cursor.url}`);
        continue;
      }

      if (this.sameSiteOnly && !domainMatches(identity, collection)) {
        log.debug(`Skipping off-site thread link ${identity}`);
        continue;
      }

      yield {
        identity,
        title: thread.title,
        timestampLabel: thread.timestampLabel,
        author: thread.author,
      };
    }
  }

  async advancePage(collection: string): Promise<boolean> {
    const cursor = this.cursors.get(collection);
    const next = cursor?.nextPageUrl;
    if (!cursor || !next) {
      return false;
    }

    if (cursor.visited.has(next)) {
      log.warn(`Next page of ${collection} points back to ${next}; treating the listing as finished`);
      return false;
    }

    if (this.sameSiteOnly && !domainMatches(next, collection)) {
      log.warn(`Next page of ${collection} leaves the site (${next}); treating the listing as finished`);
      return false;
    }

    cursor.visited.add(next);
    cursor.url = next;
    cursor.nextPageUrl = undefined;
    return true;
  }

  async fetchDetail(identity: string): Promise<string> {
    const response = await this.engine.fetchContent(identity, {
      htmlParser: this.detailParser,
      plugins: this.detailPlugins,
      timeoutMs: this.detailTimeoutMs,
    });

    if (response.success) {
      return response.content;
    }

    if (response.errorCode === 'timeout') {
      throw new ExtractionTimeoutError(identity, this.detailTimeoutMs);
    }

    throw new ExtractionError(identity, `${response.errorCode}: ${response.error}`);
  }

  async cleanup(): Promise<void> {
    this.cursors.clear();
    await this.engine.cleanup();
  }

  private cursorFor(collection: string): ListingCursor {
    let cursor = this.cursors.get(collection);
    if (!cursor) {
      cursor = { url: collection, visited: new Set([collection]) };
      this.cursors.set(collection, cursor);
    }

    return cursor;
  }
}

export type { GroupExtractorOptions };
