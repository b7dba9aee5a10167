class ExtractionError extends Error {
  readonly code: 'extraction-failed' | 'extraction-timeout' = 'extraction-failed';
  readonly identity: string;

  constructor(identity: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExtractionError';
    this.identity = identity;
  }
}

class ExtractionTimeoutError extends ExtractionError {
  override readonly code = 'extraction-timeout' as const;
  readonly timeoutMs: number;

  constructor(identity: string, timeoutMs: number, options?: ErrorOptions) {
    super(
      identity,
      `Timed out after ${timeoutMs}ms waiting for thread content`,
      options,
    );
    this.name = 'ExtractionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

class MalformedCheckpointError extends Error {
  readonly code = 'malformed-checkpoint' as const;
  readonly path: string;

  constructor(path: string, reason: string, options?: ErrorOptions) {
    super(`Checkpoint at "${path}" is unreadable: ${reason}`, options);
    this.name = 'MalformedCheckpointError';
    this.path = path;
  }
}

class CheckpointPersistenceError extends Error {
  readonly code = 'checkpoint-persistence' as const;
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    const reason =
      options?.cause instanceof Error ? options.cause.message : 'unknown error';
    super(`Failed to persist checkpoint to "${path}": ${reason}`, options);
    this.name = 'CheckpointPersistenceError';
    this.path = path;
  }
}

class ListingFetchError extends Error {
  readonly code = 'listing-fetch-failed' as const;
  readonly collection: string;
  readonly url: string;

  constructor(collection: string, url: string, reason: string) {
    super(`Could not load listing page ${url} of ${collection}: ${reason}`);
    this.name = 'ListingFetchError';
    this.collection = collection;
    this.url = url;
  }
}

/** Raised by a parser when the page carries nothing it can extract. */
class ContentParseError extends Error {
  readonly code: 'parse-failed' = 'parse-failed';

  constructor(message: string) {
    super(message);
    this.name = 'ContentParseError';
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export {
  CheckpointPersistenceError,
  ContentParseError,
  ExtractionError,
  ExtractionTimeoutError,
  ListingFetchError,
  MalformedCheckpointError,
  errorMessage,
};
