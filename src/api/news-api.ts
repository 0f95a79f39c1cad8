/**
 * News API handlers
 *
 * Plain functions returning `{ statusCode, body }` so any HTTP layer (or a
 * cron trigger) can mount them without this module knowing about it.
 */

import { z } from 'zod';
import { NewsCache, NewsPage } from '../cache/news-cache';
import { TaskScheduler } from '../scheduler/task-scheduler';
import { Article } from '../types/article';
import { SourceProfile } from '../types/source';
import { CacheStateError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child('api');

export interface ApiResponse<T = unknown> {
  statusCode: number;
  body: T;
}

export interface ErrorBody {
  error: string;
  message: string;
}

const queryFlag = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1')
]);

const ListQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(20),
  category: z.string().trim().min(1).optional(),
  search: z.string().trim().min(1).optional(),
  all: queryFlag.default(false)
});

const TriggerSchema = z.object({
  max_pages: z.coerce.number().int().positive().optional()
});

/** Raw query parameters, as strings from a URL or already typed */
export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface NewsApiDeps {
  cache: NewsCache;
  scheduler: TaskScheduler;
  source: SourceProfile;
  defaultMaxPages?: number;
  clock?: () => Date;
}

function badRequest(issues: z.ZodIssue[]): ApiResponse<ErrorBody> {
  return {
    statusCode: 400,
    body: {
      error: 'Invalid request',
      message: issues.map(issue => `${issue.path.join('.') || 'query'}: ${issue.message}`).join('; ')
    }
  };
}

function internalError(error: unknown): ApiResponse<ErrorBody> {
  log.error('Request failed', error);
  return {
    statusCode: 500,
    body: {
      error: error instanceof CacheStateError ? 'Service unavailable' : 'Internal server error',
      message: describeError(error)
    }
  };
}

export function createNewsApi(deps: NewsApiDeps) {
  const { cache, scheduler, source } = deps;
  const clock = deps.clock ?? (() => new Date());

  return {
    listNews(query: QueryParams = {}): ApiResponse<NewsPage | ErrorBody> {
      const parsed = ListQuerySchema.safeParse(query);
      if (!parsed.success) return badRequest(parsed.error.issues);

      const { page, page_size, category, search, all } = parsed.data;
      try {
        if (!all) {
          return { statusCode: 200, body: cache.query({ page, pageSize: page_size, category, search }) };
        }
        const result = cache.query({ page: 1, pageSize: Math.max(cache.status().count, 1), category, search });
        return { statusCode: 200, body: { ...result, pageSize: result.total } };
      } catch (error) {
        return internalError(error);
      }
    },

    getNews(id: string): ApiResponse<Article | ErrorBody> {
      try {
        const article = cache.getArticle(id);
        if (!article) {
          return { statusCode: 404, body: { error: 'Not found', message: `Article ${id} not found` } };
        }
        return { statusCode: 200, body: article };
      } catch (error) {
        return internalError(error);
      }
    },

    getStatus() {
      return {
        statusCode: 200,
        body: {
          service: cache.status(),
          source: { name: source.name, category: source.category, listUrl: source.listUrl },
          activeTasks: scheduler.activeTasks,
          timestamp: clock().toISOString()
        }
      };
    },

    triggerCrawl(params: QueryParams = {}) {
      const parsed = TriggerSchema.safeParse(params);
      if (!parsed.success) return badRequest(parsed.error.issues);

      try {
        const maxPages = parsed.data.max_pages ?? deps.defaultMaxPages;
        const task = scheduler.triggerCrawl(maxPages);
        return {
          statusCode: 202,
          body: {
            message: 'Crawl task started',
            taskId: task.taskId,
            maxPages: maxPages ?? null,
            timestamp: clock().toISOString(),
            note: 'The crawl runs in the background; new articles appear in the cache batch by batch'
          }
        };
      } catch (error) {
        return internalError(error);
      }
    },

    refreshCache() {
      try {
        const task = scheduler.refresh();
        return {
          statusCode: 202,
          body: {
            message: 'Cache refresh started',
            taskId: task.taskId,
            timestamp: clock().toISOString()
          }
        };
      } catch (error) {
        return internalError(error);
      }
    }
  };
}

export type NewsApi = ReturnType<typeof createNewsApi>;
