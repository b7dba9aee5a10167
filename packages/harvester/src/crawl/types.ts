type ItemSummary = {
  identity: string;
  title: string;
  timestampLabel: string;
  author: string;
};

type Item = ItemSummary & {
  collectionRef: string;
};

type PageState = {
  pageNumber: number;
};

/**
 * What the crawl engine needs from whatever renders or fetches the remote
 * source. `loadMore` and `measureListing` are only implemented by sources
 * whose listing grows in place (infinite scroll); both or neither.
 */
interface ExtractionCollaborator {
  listCandidates(collection: string, pageState: PageState): AsyncIterable<ItemSummary>;
  advancePage(collection: string): Promise<boolean>;
  fetchDetail(identity: string): Promise<string>;
  loadMore?(collection: string): Promise<void>;
  measureListing?(collection: string): Promise<number>;
  cleanup?(): Promise<void>;
}

type CandidateBatch = {
  pageNumber: number;
  items: ItemSummary[];
};

type CollectionStatus =
  | 'pending'
  | 'in-progress'
  | 'already-completed'
  | 'exhausted'
  | 'quota-reached'
  | 'interrupted';

type CollectionOutcome = {
  collection: string;
  status: Exclude<CollectionStatus, 'pending' | 'in-progress'>;
  processed: number;
  failed: number;
  skippedByPosition: number;
  skippedAsSeen: number;
  lastPosition: number;
};

type RunSummary = {
  outcomes: CollectionOutcome[];
  processed: number;
  failed: number;
  durationMs: number;
};

type PolitenessConfig = {
  minDelayMs: number;
  maxDelayMs: number;
};

type ControllerConfig = {
  quota: number;
  politeness: PolitenessConfig;
};

export type {
  CandidateBatch,
  CollectionOutcome,
  CollectionStatus,
  ControllerConfig,
  ExtractionCollaborator,
  Item,
  ItemSummary,
  PageState,
  PolitenessConfig,
  RunSummary,
};
