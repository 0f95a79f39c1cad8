/**
 * Background crawl scheduling
 * Runs crawls on a small bounded pool so triggering one never blocks callers
 */

import pLimit from 'p-limit';
import type { EnvironmentConfig } from '../config/environment';
import { NewsCache } from '../cache/news-cache';
import { ArticleStore } from '../crawler/article-store';
import { CrawlState } from '../crawler/crawl-state';
import { runCrawl } from '../crawler/run-crawl';
import { SessionFactory } from '../types/session';
import { SourceProfile } from '../types/source';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child('scheduler');

export type CrawlTaskKind = 'crawl' | 'refresh';

export interface CrawlTask {
  taskId: string;
  kind: CrawlTaskKind;
  maxPages?: number;
}

export interface SchedulerDeps {
  config: EnvironmentConfig;
  cache: NewsCache;
  store: ArticleStore;
  source: SourceProfile;
  openSession: SessionFactory;
  now?: () => Date;
}

export class TaskScheduler {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly controllers = new Set<AbortController>();
  private nextTaskId = 1;
  private shuttingDown = false;

  constructor(private readonly deps: SchedulerDeps) {
    this.limit = pLimit(deps.config.scheduler.workerCount);
  }

  /** Tasks running or queued */
  get activeTasks(): number {
    return this.inFlight.size;
  }

  /**
   * Serve what is already on disk, then crawl for anything newer in the background.
   */
  async initialLoad(): Promise<CrawlTask | null> {
    const { cache, store, config } = this.deps;
    log.info('🔄 Starting initial cache load...');

    try {
      const existing = await store.load();
      if (existing.length > 0) {
        cache.replace(existing);
        log.info(`✅ Loaded ${existing.length} articles from ${store.filePath}`);
      } else {
        log.info('📝 No existing articles on disk');
      }
    } catch (error) {
      log.warn('⚠️ Failed to load existing data', error);
    }

    if (!config.scheduler.initialCrawl) return null;
    return this.submit('crawl');
  }

  /** Incremental crawl whose batches are appended to the cache as they land */
  triggerCrawl(maxPages?: number): CrawlTask {
    return this.submit('crawl', maxPages);
  }

  /** Full re-crawl ignoring the ledger, then a snapshot swap from disk */
  refresh(): CrawlTask {
    return this.submit('refresh');
  }

  /** Resolves once every submitted task has settled */
  async idle(): Promise<void> {
    await Promise.allSettled(Array.from(this.inFlight));
  }

  /** Interrupt running crawls (they flush what they have) and wait for them */
  async shutdown(): Promise<void> {
    log.info('Shutting down scheduler...');
    this.shuttingDown = true;
    this.controllers.forEach(controller => controller.abort());
    await this.idle();
    log.info('Scheduler shutdown complete');
  }

  private submit(kind: CrawlTaskKind, maxPages?: number): CrawlTask {
    const task: CrawlTask = {
      taskId: `${kind}-${this.nextTaskId++}`,
      kind,
      ...(maxPages !== undefined ? { maxPages } : {})
    };

    const run: Promise<void> = this.limit(() => this.execute(task))
      .finally(() => this.inFlight.delete(run));
    this.inFlight.add(run);

    log.info(`✅ ${task.taskId} submitted to background worker`);
    return task;
  }

  private async execute(task: CrawlTask): Promise<void> {
    if (this.shuttingDown) {
      log.info(`${task.taskId} dropped, scheduler is shutting down`);
      return;
    }

    const { config, cache, store, source, openSession, now } = this.deps;
    const controller = new AbortController();
    this.controllers.add(controller);
    log.info(`🚀 Starting ${task.taskId}...`);

    try {
      const result = await runCrawl({
        settings: config,
        source,
        openSession,
        store,
        maxPages: task.maxPages,
        ledger: task.kind === 'refresh' ? new CrawlState() : undefined,
        onBatch: task.kind === 'crawl'
          ? articles => {
            cache.append(articles);
            log.info(`📝 [${task.taskId}] Saved ${articles.length} articles to cache and file`);
          }
          : undefined,
        signal: controller.signal,
        now
      });

      if (result.stopReason === 'session-unavailable' || result.stopReason === 'failed') {
        log.error(`❌ ${task.taskId} ended with ${result.stopReason}: ${result.error ?? 'unknown error'}`);
        cache.markError(result.error ?? `Crawl ${result.stopReason}`);
        return;
      }

      if (task.kind === 'refresh') {
        cache.replace(await store.load());
      }
      log.info(`✅ ${task.taskId} completed: ${result.articles.length} articles (${result.stopReason})`);
    } catch (error) {
      log.error(`❌ ${task.taskId} failed: ${describeError(error)}`);
      cache.markError(describeError(error));
    } finally {
      this.controllers.delete(controller);
    }
  }
}
