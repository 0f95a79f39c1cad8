/**
 * Article fetching with bounded retries
 *
 * Each attempt opens an isolated page, waits for the article body, reads
 * metadata and extracts content. Timeouts and empty extractions are retried;
 * an invalid record is not. The outcome is always a Result, never a throw.
 */

import pRetry from 'p-retry';
import { Article, CrawlCandidate } from '../../types/article';
import { err, ok, Result } from '../../types/result';
import { DocumentPage, DocumentSession } from '../../types/session';
import { SourceProfile } from '../../types/source';
import {
  ArticleValidationError,
  describeError,
  EmptyContentError,
  TransientFetchError
} from '../../utils/errors';
import { randomDelay } from '../../utils/delay';
import { logger } from '../../utils/logger';
import { formatArticle } from './article-formatter';
import { extractContentBlocks } from './content-extractor';

const log = logger.child('fetcher');

export type FetchErrorKind = 'transient' | 'empty-content' | 'invalid-article' | 'interrupted' | 'unexpected';

export interface FetchError {
  kind: FetchErrorKind;
  url: string;
  title: string;
  attempts: number;
  message: string;
}

export type RetryState =
  | { status: 'attempting'; attempt: number }
  | { status: 'succeeded'; attempt: number }
  | { status: 'exhausted'; attempts: number; error: FetchError };

export interface FetchOptions {
  source: SourceProfile;
  attempts: number;
  navigationTimeoutMs: number;
  contentTimeoutMs: number;
  retryDelayMs: number;
  minTextLength: number;
  now?: () => Date;
  /** Stops further attempts and cuts the wait between them short */
  signal?: AbortSignal;
  onStateChange?: (state: RetryState) => void;
}

function classify(error: unknown, signal?: AbortSignal): FetchErrorKind {
  if (signal?.aborted) return 'interrupted';
  if (error instanceof TransientFetchError) return 'transient';
  if (error instanceof EmptyContentError) return 'empty-content';
  if (error instanceof ArticleValidationError) return 'invalid-article';
  return 'unexpected';
}

/** First non-empty text among `selectors`, in priority order */
async function firstText(page: DocumentPage, selectors: string[]): Promise<string | null> {
  try {
    return await page.evaluate(document => {
      for (const selector of selectors) {
        const text = document.querySelector(selector)?.textContent?.trim();
        if (text) return text;
      }
      return null;
    });
  } catch (error) {
    log.debug(`Metadata lookup failed for ${selectors.join(', ')}`, describeError(error));
    return null;
  }
}

async function closeQuietly(page: DocumentPage): Promise<void> {
  try {
    await page.close();
  } catch (error) {
    log.warn('Failed to close article page', error);
  }
}

async function attemptFetch(
  session: DocumentSession,
  candidate: CrawlCandidate,
  options: FetchOptions
): Promise<Article> {
  const { source } = options;
  const page = await session.newPage();

  try {
    await page.navigate(candidate.url, options.navigationTimeoutMs);
    const container = await page.waitForSelector(source.selectors.content, options.contentTimeoutMs);

    const author = await firstText(page, source.selectors.author);
    const publishTime = await firstText(page, source.selectors.publishTime);

    const content = extractContentBlocks(container, { minTextLength: options.minTextLength });
    if (content.length === 0) {
      throw new EmptyContentError(candidate.url);
    }

    try {
      return formatArticle(
        { url: candidate.url, title: candidate.title, author, publishTime, content },
        { category: source.category, source: source.name, now: options.now?.() }
      );
    } catch (error) {
      // Retrying cannot repair a malformed record
      if (error instanceof ArticleValidationError) throw new pRetry.AbortError(error);
      throw error;
    }
  } finally {
    await closeQuietly(page);
  }
}

/**
 * Fetch one article: attempting(1) → succeeded | attempting(n+1) | exhausted.
 */
export async function fetchArticle(
  session: DocumentSession,
  candidate: CrawlCandidate,
  options: FetchOptions
): Promise<Result<Article, FetchError>> {
  const attempts = Math.max(1, options.attempts);
  let attempt = 0;
  const transition = (state: RetryState) => options.onStateChange?.(state);

  try {
    const article = await pRetry(
      async (attemptNumber) => {
        if (options.signal?.aborted) {
          throw new pRetry.AbortError(`Interrupted before fetching ${candidate.url}`);
        }
        attempt = attemptNumber;
        transition({ status: 'attempting', attempt });
        if (attemptNumber > 1) {
          log.warn(`Retry attempt ${attemptNumber}/${attempts} for: ${candidate.title}`);
        }
        return attemptFetch(session, candidate, options);
      },
      {
        retries: attempts - 1,
        // The backoff happens in onFailedAttempt so an abort can cut it short
        minTimeout: 0,
        maxTimeout: 0,
        onFailedAttempt: async (error) => {
          log.warn(`Attempt ${error.attemptNumber}/${attempts} failed for "${candidate.title}": ${error.message}`);
          if (error.retriesLeft > 0) {
            await randomDelay(options.retryDelayMs, options.retryDelayMs * 1.5, options.signal);
          }
        }
      }
    );

    transition({ status: 'succeeded', attempt });
    log.info(`✅ Crawled "${article.title}" (${article.content.length} blocks)`);
    return ok(article);
  } catch (error) {
    const failure: FetchError = {
      kind: classify(error, options.signal),
      url: candidate.url,
      title: candidate.title,
      attempts: attempt,
      message: describeError(error)
    };
    transition({ status: 'exhausted', attempts: attempt, error: failure });
    return err(failure);
  }
}
