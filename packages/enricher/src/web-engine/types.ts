import type { CheerioAPI } from 'cheerio';
import type { ErrorClass } from '../retry/types.js';

type DefaultMetadata = {
  duration: number;
  method: string;
  attempts: number;
};

type Metadata = DefaultMetadata & {
  responseStatus?: number;
  finalUrl?: string;
};

type FetchSuccess<T> = {
  success: true;
  content: T;
  metadata: Metadata;
};

type FetchError = {
  success: false;
  error: string;
  errorClass: ErrorClass;
  metadata: Metadata;
};

type FetchResponse<T> = FetchSuccess<T> | FetchError;

type ResolvedUrl = {
  success: true;
  url: string;
  /** false when the input already carried a scheme and was trusted as-is */
  probed: boolean;
};

type UnresolvableUrl = {
  success: false;
  input: string;
  error: string;
};

type UrlResolution = ResolvedUrl | UnresolvableUrl;

/**
 * Network boundary of the enrichment engine. Implementations must never
 * throw for per-URL failures: both operations report them as values.
 */
abstract class WebEngine {
  /** Turn a bare or scheme-qualified URL into a working absolute URL. */
  abstract resolveUrl(input: string): Promise<UrlResolution>;

  /** Fetch a page and parse it. Every call performs its own request. */
  abstract fetchDocument(url: string): Promise<FetchResponse<CheerioAPI>>;

  /** Release sockets and other resources held by the engine. */
  abstract cleanup(): Promise<void>;
}

export type {
  FetchError,
  FetchResponse,
  FetchSuccess,
  Metadata,
  ResolvedUrl,
  UnresolvableUrl,
  UrlResolution,
};

export { WebEngine };
