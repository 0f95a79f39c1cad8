/**
 * Error taxonomy for the crawl pipeline and the cache.
 * Every error carries a stable `code` so boundary handlers can map it.
 */

export type CrawlerErrorCode =
  | 'TRANSIENT_FETCH'
  | 'EMPTY_CONTENT'
  | 'PERSISTENCE'
  | 'CACHE_STATE'
  | 'SESSION_UNAVAILABLE'
  | 'ARTICLE_VALIDATION'
  | 'CONFIGURATION';

export class CrawlerError extends Error {
  constructor(
    readonly code: CrawlerErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Navigation or selector wait failed; retried, then the article is skipped */
export class TransientFetchError extends CrawlerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSIENT_FETCH', message, options);
  }
}

/** Extraction produced no blocks; treated like a transient failure */
export class EmptyContentError extends CrawlerError {
  constructor(readonly url: string) {
    super('EMPTY_CONTENT', `No content blocks extracted from ${url}`);
  }
}

/** Durable read or write failed; a failed batch stays pending and is retried with the next flush */
export class PersistenceError extends CrawlerError {
  constructor(
    readonly operation: 'read' | 'write',
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super('PERSISTENCE', `Failed to ${operation} ${filePath}: ${describeError(options?.cause)}`, options);
  }
}

export class CacheStateError extends CrawlerError {
  constructor(message: string) {
    super('CACHE_STATE', message);
  }
}

/** The browsing session could not be acquired; aborts the whole run */
export class SessionUnavailableError extends CrawlerError {
  constructor(options?: { cause?: unknown }) {
    super('SESSION_UNAVAILABLE', `Document session unavailable: ${describeError(options?.cause)}`, options);
  }
}

export class ArticleValidationError extends CrawlerError {
  constructor(readonly url: string, readonly issues: string[]) {
    super('ARTICLE_VALIDATION', `Invalid article ${url}: ${issues.join('; ')}`);
  }
}

export class ConfigurationError extends CrawlerError {
  constructor(readonly issues: string[]) {
    super('CONFIGURATION', `Invalid configuration: ${issues.join(', ')}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'Unknown error';
  return String(error);
}
