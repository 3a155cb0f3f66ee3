/**
 * NewsPulse — Error Types
 */

/**
 * Any failure retrieving or parsing one source's feed.
 * Recovered by the fetcher; never reaches query callers.
 */
export class FeedFetchError extends Error {
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FeedFetchError';
  }
}

export class FeedHttpError extends FeedFetchError {
  constructor(source: string, readonly status: number, statusText: string) {
    super(source, `HTTP ${status}${statusText ? ` ${statusText}` : ''}`);
    this.name = 'FeedHttpError';
  }
}

export class FeedTimeoutError extends FeedFetchError {
  constructor(source: string, readonly timeoutMs: number) {
    super(source, `Timeout after ${timeoutMs}ms`);
    this.name = 'FeedTimeoutError';
  }
}

/**
 * Invalid configuration; raised once at startup.
 */
export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}
