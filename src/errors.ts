/**
 * Crawl Error Handling
 * Error taxonomy for the crawl loop. Everything except CONFIGURATION is
 * recoverable: the crawler logs it and moves on to the next URL.
 */

export enum CrawlErrorType {
  MALFORMED_URL = 'MALFORMED_URL',
  FETCH_FAILURE = 'FETCH_FAILURE',
  UNSUPPORTED_CONTENT_TYPE = 'UNSUPPORTED_CONTENT_TYPE',
  PARSE_FAILURE = 'PARSE_FAILURE',
  POLICY_DENIED = 'POLICY_DENIED',
  CONFIGURATION = 'CONFIGURATION',
}

export class CrawlError extends Error {
  readonly type: CrawlErrorType;
  readonly url?: string;
  readonly statusCode?: number;

  constructor(
    type: CrawlErrorType,
    message: string,
    options: { url?: string; statusCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'CrawlError';
    this.type = type;
    this.url = options.url;
    this.statusCode = options.statusCode;
  }

  get recoverable(): boolean {
    return this.type !== CrawlErrorType.CONFIGURATION;
  }
}

export function isCrawlError(error: unknown): error is CrawlError {
  return error instanceof CrawlError;
}

/**
 * Wrap anything thrown while handling a URL into a CrawlError.
 * Unknown errors are treated as fetch failures.
 */
export function toCrawlError(error: unknown, url?: string): CrawlError {
  if (isCrawlError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CrawlError(CrawlErrorType.FETCH_FAILURE, message, { url, cause: error });
}

export function describeError(error: unknown): string {
  if (isCrawlError(error)) {
    const status = error.statusCode !== undefined ? ` (status ${error.statusCode})` : '';
    return `${error.type}: ${error.message}${status}`;
  }
  return error instanceof Error ? error.message : String(error);
}
