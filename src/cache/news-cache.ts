/**
 * In-memory article snapshot served to API callers.
 *
 * Every operation is synchronous and runs to completion on the event loop,
 * so readers never observe a half-applied update and nothing is held across
 * network I/O.
 */

import { Article } from '../types/article';
import { CacheStateError } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child('cache');

export type ServiceStatus = 'preparing' | 'ready' | 'error';

const TRANSITIONS: Record<ServiceStatus, ServiceStatus[]> = {
  preparing: ['ready', 'error'],
  ready: ['preparing', 'error'],
  error: ['preparing', 'error'],
};

export interface CacheStatus {
  status: ServiceStatus;
  lastUpdate: string | null;
  count: number;
  errorMessage: string | null;
}

export interface NewsQuery {
  page?: number;
  pageSize?: number;
  category?: string;
  search?: string;
}

export interface NewsPage {
  articles: Article[];
  total: number;
  page: number;
  pageSize: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export class NewsCache {
  private articles: Article[] = [];
  private urls = new Set<string>();
  private currentStatus: ServiceStatus = 'preparing';
  private lastUpdate: string | null = null;
  private errorMessage: string | null = null;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  private transition(next: ServiceStatus, errorMessage: string | null = null) {
    if (next !== this.currentStatus && !TRANSITIONS[this.currentStatus].includes(next)) {
      throw new CacheStateError(`Invalid cache transition ${this.currentStatus} → ${next}`);
    }
    if (next !== this.currentStatus) {
      log.info(`Cache status updated: ${next}`);
    }
    this.currentStatus = next;
    this.errorMessage = errorMessage;
  }

  private assertServing() {
    if (this.currentStatus === 'error') {
      throw new CacheStateError(`Service error: ${this.errorMessage ?? 'unknown'}`);
    }
  }

  private touch() {
    this.lastUpdate = this.clock().toISOString();
  }

  status(): CacheStatus {
    return {
      status: this.currentStatus,
      lastUpdate: this.lastUpdate,
      count: this.articles.length,
      errorMessage: this.errorMessage
    };
  }

  /**
   * Filter, sort newest first and paginate.
   * @throws CacheStateError while the cache is in the error state
   */
  query({ page = 1, pageSize = 20, category, search }: NewsQuery = {}): NewsPage {
    this.assertServing();

    const safePage = Math.max(1, Math.floor(page));
    const safePageSize = Math.max(1, Math.floor(pageSize));
    const needle = search?.toLowerCase();

    const filtered = this.articles.filter(article => {
      if (category && article.category !== category) return false;
      if (needle) {
        return article.title.toLowerCase().includes(needle)
          || article.summary.toLowerCase().includes(needle);
      }
      return true;
    });

    // Stable sort; YYYY-MM-DD strings order correctly, anything else lands arbitrarily
    filtered.sort((a, b) => (a.publishedDate < b.publishedDate ? 1 : a.publishedDate > b.publishedDate ? -1 : 0));

    const total = filtered.length;
    const start = (safePage - 1) * safePageSize;
    const end = start + safePageSize;

    return {
      articles: filtered.slice(start, end),
      total,
      page: safePage,
      pageSize: safePageSize,
      hasNext: end < total,
      hasPrev: safePage > 1
    };
  }

  /** @throws CacheStateError while the cache is in the error state */
  getArticle(id: string): Article | undefined {
    this.assertServing();
    return this.articles.find(article => article.id === id);
  }

  all(): Article[] {
    return [...this.articles];
  }

  /** Insert articles whose URL is unseen; returns how many were inserted */
  append(newArticles: Article[]): number {
    const unique: Article[] = [];
    for (const article of newArticles) {
      if (this.urls.has(article.url)) continue;
      this.urls.add(article.url);
      unique.push(article);
    }

    if (unique.length > 0) {
      this.articles.push(...unique);
      this.touch();
      log.info(`Appended ${unique.length} new articles to cache`);
    }

    if (this.articles.length > 0 && this.currentStatus === 'preparing') {
      this.transition('ready');
    }
    return unique.length;
  }

  /** Swap the whole snapshot (used for full reloads) */
  replace(allArticles: Article[]): void {
    this.transition('preparing');

    const articles: Article[] = [];
    const urls = new Set<string>();
    for (const article of allArticles) {
      if (urls.has(article.url)) continue;
      urls.add(article.url);
      articles.push(article);
    }

    this.articles = articles;
    this.urls = urls;
    this.touch();
    this.transition('ready');
    log.info(`Cache updated successfully, ${articles.length} articles`);
  }

  markError(message: string): void {
    this.transition('error', message);
    log.error(`Cache marked as failed: ${message}`);
  }

  clear(): void {
    this.articles = [];
    this.urls = new Set();
    this.lastUpdate = null;
    this.transition('preparing');
    log.info('Cache cleared');
  }
}
