/**
 * Crawl pipeline that coordinates the following workflow:
 * 1. Seeds the dedup ledger from the article store
 * 2. Opens a document session and loads the first listing page
 * 3. For each listing page, drops old and already crawled candidates
 * 4. Fetches the remaining articles one at a time, with retries
 * 5. Persists them in batches and hands each batch to the caller
 * 6. Turns the page until a stop condition fires
 *
 * Whatever way the run ends, the partial batch is flushed before returning.
 */

import type { EnvironmentConfig } from '../config/environment';
import { Article } from '../types/article';
import { DocumentSession, SessionFactory } from '../types/session';
import { SourceProfile } from '../types/source';
import { randomDelay } from '../utils/delay';
import { describeError, SessionUnavailableError } from '../utils/errors';
import { logger } from '../utils/logger';
import { ArticleStore } from './article-store';
import { BatchCallback, BatchPersister } from './batch-persister';
import { CrawlState } from './crawl-state';
import { fetchArticle, FetchError } from './tools/article-fetcher';
import { goToNextPage, readListingPage } from './tools/listing';

const log = logger.child('crawl');

/** Pages in a row that list only old articles before the walk gives up */
export const MAX_CONSECUTIVE_OLD_PAGES = 3;

export type StopReason =
  | 'max-pages'
  | 'no-next-page'
  | 'all-old-pages'
  | 'interrupted'
  | 'session-unavailable'
  | 'failed';

export type CrawlSettings = Pick<EnvironmentConfig, 'crawler' | 'timeouts' | 'pacing'>;

export interface CrawlRunOptions {
  settings: CrawlSettings;
  source: SourceProfile;
  openSession: SessionFactory;
  store: ArticleStore;
  ledger?: CrawlState;         // Defaults to the URLs already in the store
  maxPages?: number;           // Overrides settings.crawler.maxPages
  onBatch?: BatchCallback;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface CrawlRunResult {
  articles: Article[];
  pagesVisited: number;
  skipped: FetchError[];
  stopReason: StopReason;
  error?: string;
}

interface RunProgress {
  articles: Article[];
  skipped: FetchError[];
  pagesVisited: number;
}

async function seedLedger(store: ArticleStore): Promise<CrawlState> {
  try {
    const existing = await store.load();
    const ledger = CrawlState.fromArticles(existing);
    log.info(`✅ Loaded ${existing.length} existing articles, ${ledger.size} URLs in history`);
    return ledger;
  } catch (error) {
    log.warn('⚠️ Failed to load existing data, starting with an empty history', error);
    return new CrawlState();
  }
}

async function walkPages(
  session: DocumentSession,
  ledger: CrawlState,
  persister: BatchPersister,
  progress: RunProgress,
  options: CrawlRunOptions
): Promise<StopReason> {
  const { settings, source, signal } = options;
  const { crawler, timeouts, pacing } = settings;
  const maxPages = options.maxPages ?? crawler.maxPages;
  const page = session.page;
  const pace = () => randomDelay(pacing.minMs, pacing.maxMs, signal);

  log.info(`Visiting list page: ${source.listUrl}`);
  try {
    await page.navigate(source.listUrl, timeouts.navigationMs);
  } catch (error) {
    log.error('Failed to load the list page', error);
  }
  await pace();

  let pageNumber = 1;
  let consecutiveOldPages = 0;

  for (;;) {
    if (signal?.aborted) return 'interrupted';

    progress.pagesVisited = pageNumber;
    log.info(`Crawling page ${pageNumber}`);

    const listing = await readListingPage(page, source, {
      minArticleId: crawler.minArticleId,
      timeoutMs: timeouts.listMs,
      ledger
    });

    if (listing.allOld) {
      consecutiveOldPages++;
      log.warn(`All old articles on this page (${consecutiveOldPages}/${MAX_CONSECUTIVE_OLD_PAGES})`);
      if (consecutiveOldPages >= MAX_CONSECUTIVE_OLD_PAGES) {
        log.info(`Stop: ${MAX_CONSECUTIVE_OLD_PAGES} consecutive pages with old articles`);
        return 'all-old-pages';
      }
    } else {
      consecutiveOldPages = 0;
    }

    for (const [index, candidate] of listing.candidates.entries()) {
      if (signal?.aborted) return 'interrupted';

      log.info(`[${index + 1}/${listing.candidates.length}] ${candidate.title}`);
      const result = await fetchArticle(session, candidate, {
        source,
        attempts: crawler.fetchAttempts,
        navigationTimeoutMs: timeouts.navigationMs,
        contentTimeoutMs: timeouts.contentMs,
        retryDelayMs: pacing.retryDelayMs,
        minTextLength: crawler.minTextLength,
        now: options.now,
        signal
      });

      if (result.ok) {
        progress.articles.push(result.value);
        ledger.add(result.value.url);
        await persister.add(result.value);
      } else if (result.error.kind === 'interrupted') {
        return 'interrupted';
      } else {
        progress.skipped.push(result.error);
        log.warn(`⏭️  Skipped "${candidate.title}" after ${result.error.attempts} attempts: ${result.error.message}`);
      }

      if (index < listing.candidates.length - 1) await pace();
    }

    if (maxPages !== undefined && pageNumber >= maxPages) {
      log.warn(`⚠️ Reached max pages limit: ${maxPages}`);
      return 'max-pages';
    }

    if (signal?.aborted) return 'interrupted';
    await pace();

    if (!(await goToNextPage(page, source, timeouts.navigationMs))) {
      log.info('No more pages');
      return 'no-next-page';
    }
    pageNumber++;
  }
}

/**
 * Run one crawl. Never throws: failures are reported in the result.
 * Only a session that cannot be opened ends the run before any page is read.
 */
export async function runCrawl(options: CrawlRunOptions): Promise<CrawlRunResult> {
  const startTime = Date.now();
  const progress: RunProgress = { articles: [], skipped: [], pagesVisited: 0 };
  const ledger = options.ledger ?? await seedLedger(options.store);
  const persister = new BatchPersister(options.store, {
    batchSize: options.settings.crawler.batchSize,
    onBatch: options.onBatch
  });

  let session: DocumentSession;
  try {
    session = await options.openSession();
  } catch (error) {
    const failure = error instanceof SessionUnavailableError ? error : new SessionUnavailableError({ cause: error });
    log.error('❌ Could not open a document session', failure);
    return { ...progress, stopReason: 'session-unavailable', error: failure.message };
  }

  let stopReason: StopReason;
  let runError: string | undefined;
  try {
    stopReason = await walkPages(session, ledger, persister, progress, options);
  } catch (error) {
    stopReason = 'failed';
    runError = describeError(error);
    log.error('❌ Crawling error', error);
  }

  if (persister.pendingCount > 0) {
    log.info(`💾 Saving ${persister.pendingCount} remaining articles before exit...`);
  }
  const flushed = await persister.flush();
  if (flushed.pendingWrites > 0) {
    log.error(`❌ ${flushed.pendingWrites} articles could not be written to ${options.store.filePath}`);
  }

  try {
    await session.close();
  } catch (error) {
    log.warn('Failed to close document session', error);
  }

  log.info('📊 Final Statistics', {
    stopReason,
    pagesVisited: progress.pagesVisited,
    crawled: progress.articles.length,
    skipped: progress.skipped.length,
    urlsInHistory: ledger.size,
    duration: `${Date.now() - startTime}ms`
  });

  return { ...progress, stopReason, ...(runError ? { error: runError } : {}) };
}
