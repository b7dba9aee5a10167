export { CheckpointStore } from './checkpoint/checkpoint-store.js';
export {
  NOTHING_VISITED,
  emptyCheckpointState,
  type CheckpointState,
  type PersistedCheckpoint,
  type ProgressRecord,
} from './checkpoint/types.js';
export { canonicalizeUrl, contentFingerprint, normalizeContent } from './identity/identity.js';
export { ContentFingerprintIndex } from './identity/content-index.js';
export { PaginationTraversal, type PaginationOptions } from './pagination/pagination-traversal.js';
export {
  CrawlController,
  FAILED_CONTENT,
  type CrawlControllerDeps,
  type RunHooks,
} from './crawl/crawl-controller.js';
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
} from './crawl/types.js';
export { ResultSink } from './sink/result-sink.js';
export { CsvRecordWriter } from './sink/csv-writer.js';
export { RESULT_COLUMNS, type RecordWriter, type ResultRecord } from './sink/types.js';
export { GroupExtractor, type GroupExtractorOptions } from './extraction/group-extractor.js';
export {
  GroupListParser,
  LISTING_SELECTORS,
  type GroupListPage,
  type ListedThread,
} from './parsers/group-list-parser.js';
export {
  THREAD_BODY_SELECTORS,
  ThreadContentMissingError,
  ThreadDetailParser,
} from './parsers/thread-detail-parser.js';
export { HttpWebEngine, type HttpWebEngineOptions } from './web-engine/http-engine.js';
export {
  ContentParserPlugin,
  WebContentParser,
  WebEngine,
  type FetchContentOptions,
  type FetchResponse,
  type ParseContext,
  type WebContent,
} from './web-engine/types.js';
export { resolveParserWithPlugins, type ResolveParserResult } from './web-engine/parser-resolver.js';
export { randomDelayMs, sleep, waitPolitely, type Sleep } from './anti-blocking/politeness.js';
export { CrawlMetrics } from './observability/metrics.js';
export { ErrorSnapshotWriter, type ErrorSnapshotData } from './observability/error-snapshot.js';
export { loadEnv, type HarvesterEnv } from './config/env.js';
export {
  CheckpointPersistenceError,
  ContentParseError,
  ExtractionError,
  ExtractionTimeoutError,
  ListingFetchError,
  MalformedCheckpointError,
} from './errors.js';
