/**
 * Shared fixtures: an in-process site served through a fake fetch,
 * canned listing/article HTML, articles and settings.
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { EnvironmentConfig } from '../../config/environment';
import type { CrawlSettings } from '../../crawler/run-crawl';
import { generateArticleId } from '../../crawler/tools/article-formatter';
import { Article } from '../../types/article';

export const NOW = new Date('2024-06-01T08:00:00.000Z');
export const BASE_URL = 'https://ost.51cto.com';
export const LIST_URL = `${BASE_URL}/postlist`;

export const postUrl = (id: number) => `${BASE_URL}/posts/${id}`;
export const listPageUrl = (page: number) => (page === 1 ? LIST_URL : `${LIST_URL}?page=${page}`);

export function listingHtml(ids: number[], nextPage?: number): string {
  const items = ids
    .map(id => `<li><a href="/posts/${id}"><h3 class="title-h3">Post ${id}</h3></a></li>`)
    .join('\n');
  const next = nextPage ? `<a class="pager-next" href="/postlist?page=${nextPage}">下一页</a>` : '';
  return `<html><body><ul class="infinite-list">${items}</ul><div class="pager">${next}</div></body></html>`;
}

export function articleHtml(
  body: string,
  meta: { author?: string; time?: string } = {}
): string {
  return `<html><body>
    <div class="post-header">
      <span class="name">${meta.author ?? 'Test Author'}</span>
      <time>${meta.time ?? '2024-05-06 10:00'}</time>
    </div>
    <div class="posts-content">${body}</div>
  </body></html>`;
}

export const paragraph = (id: number) => `<p>Body paragraph for post ${id}</p>`;

export interface FakeSite {
  fetchImpl: jest.Mock<Promise<Response>, [string, RequestInit?]>;
  calls: string[];
  callsTo(url: string): number;
}

/**
 * Serves canned HTML by exact URL, 404 for anything else.
 * `onRequest` runs before each response, e.g. to abort a run mid-crawl.
 */
export function createFakeSite(
  pages: Record<string, string> = {},
  onRequest?: (url: string) => void
): FakeSite {
  const routes = new Map(Object.entries(pages));
  const calls: string[] = [];

  const fetchImpl = jest.fn(async (url: string, _init?: RequestInit) => {
    calls.push(url);
    onRequest?.(url);
    const html = routes.get(url);
    if (html === undefined) {
      return new Response('Not found', { status: 404 });
    }
    return new Response(html, { status: 200, headers: { 'Content-Type': 'text/html; charset=utf-8' } });
  });

  return {
    fetchImpl,
    calls,
    callsTo: url => calls.filter(call => call === url).length
  };
}

export function buildArticle(overrides: Partial<Article> & { url: string }): Article {
  const timestamp = NOW.toISOString();
  return {
    id: generateArticleId(overrides.url),
    title: 'Test article',
    publishedDate: '2024-05-06',
    content: [{ kind: 'text', value: 'Body paragraph of the test article' }],
    category: '技术文章',
    summary: 'Body paragraph of the test article',
    source: '51CTO',
    createdAt: timestamp,
    updatedAt: timestamp,
    ...overrides
  };
}

export function testSettings(crawler: Partial<CrawlSettings['crawler']> = {}): CrawlSettings {
  return {
    crawler: {
      minArticleId: 33500,
      maxPages: undefined,
      batchSize: 5,
      fetchAttempts: 2,
      minTextLength: 10,
      ...crawler
    },
    timeouts: { listMs: 1000, navigationMs: 1000, contentMs: 1000 },
    pacing: { minMs: 0, maxMs: 0, retryDelayMs: 0 }
  };
}

export function testConfig(dataFile: string, crawler: Partial<CrawlSettings['crawler']> = {}): EnvironmentConfig {
  return {
    ...testSettings(crawler),
    storage: { dataFile },
    scheduler: { workerCount: 2, initialCrawl: false },
    session: { userAgent: 'test-agent' },
    logging: { level: 'error' }
  };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'news-harvester-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
