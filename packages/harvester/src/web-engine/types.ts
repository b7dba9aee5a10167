type FetchContentOptions<T> = {
  htmlParser: WebContentParser<string, T>;
  plugins?: ContentParserPlugin<string, T>[];
  timeoutMs?: number;
};

type DefaultMetadata = {
  duration: number;
  method: string;
};

type Metadata = DefaultMetadata & Record<string, unknown>;

type FetchSuccess<T> = {
  success: true;
  content: T;
  finalUrl: string;
  metadata: Metadata;
};

type FetchErrorCode = 'blocked' | 'timeout' | 'not-found' | 'parse-failed' | 'unexpected';

type FetchError = {
  success: false;
  error: string;
  errorCode: FetchErrorCode;
  metadata: Metadata;
};

type FetchResponse<T> = FetchSuccess<T> | FetchError;

type WebContent<T> = {
  url: string;
  data: T;
};

type ParseContext = {
  engine: string;
  requestUrl: string;
  finalUrl?: string;
  response?: {
    statusCode?: number;
    headers?: Record<string, unknown>;
  };
};

type PluginEvaluation<InputType> = {
  content: WebContent<InputType>;
  context: ParseContext;
};

abstract class WebEngine {
  abstract fetchContent<T>(url: string, options: FetchContentOptions<T>): Promise<FetchResponse<T>>;
  abstract cleanup(): Promise<void>;
}

abstract class WebContentParser<InputType, OutputType> {
  abstract extract(content: WebContent<InputType>, context: ParseContext): Promise<OutputType>;
}

/** A parser that only takes over for the pages it recognizes. */
abstract class ContentParserPlugin<InputType, OutputType> extends WebContentParser<
  InputType,
  OutputType
> {
  abstract readonly name: string;
  abstract applies(input: PluginEvaluation<InputType>): boolean | Promise<boolean>;
}

export type {
  FetchContentOptions,
  FetchError,
  FetchErrorCode,
  FetchResponse,
  FetchSuccess,
  ParseContext,
  PluginEvaluation,
  WebContent,
};

export { ContentParserPlugin, WebEngine, WebContentParser };
