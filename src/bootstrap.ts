/**
 * Composition root: wires config, storage, cache, scheduler and API handlers
 */

import path from 'path';
import { createNewsApi, NewsApi } from './api/news-api';
import { NewsCache } from './cache/news-cache';
import { EnvironmentConfig, loadEnvironmentConfig } from './config/environment';
import { OST_51CTO_SOURCE } from './adapters/ost-51cto';
import { ArticleStore } from './crawler/article-store';
import { TaskScheduler } from './scheduler/task-scheduler';
import { createJsdomSession } from './session/jsdom-session';
import { SessionFactory } from './types/session';
import { SourceProfile } from './types/source';
import { logger } from './utils/logger';

export interface NewsBackend {
  config: EnvironmentConfig;
  source: SourceProfile;
  cache: NewsCache;
  store: ArticleStore;
  scheduler: TaskScheduler;
  api: NewsApi;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface BackendOverrides {
  source?: SourceProfile;
  openSession?: SessionFactory;
  clock?: () => Date;
}

export function createNewsBackend(
  config: EnvironmentConfig = loadEnvironmentConfig(),
  overrides: BackendOverrides = {}
): NewsBackend {
  logger.setLevel(config.logging.level);

  const source = overrides.source ?? OST_51CTO_SOURCE;
  const clock = overrides.clock ?? (() => new Date());
  const cache = new NewsCache(clock);
  const store = new ArticleStore(path.resolve(config.storage.dataFile));
  const openSession = overrides.openSession ?? createJsdomSession({ userAgent: config.session.userAgent });
  const scheduler = new TaskScheduler({ config, cache, store, source, openSession, now: clock });
  const api = createNewsApi({ cache, scheduler, source, defaultMaxPages: config.crawler.maxPages, clock });

  return {
    config,
    source,
    cache,
    store,
    scheduler,
    api,
    async start() {
      logger.info(`🚀 Starting news backend for ${source.name} (${store.filePath})`);
      await scheduler.initialLoad();
    },
    async stop() {
      await scheduler.shutdown();
      logger.info('News backend stopped');
    }
  };
}
