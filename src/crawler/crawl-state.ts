import { Article } from '../types/article';

/**
 * Dedup ledger: URLs already ingested.
 * Seeded once from durable storage when a run starts and only grows afterwards.
 */
export class CrawlState {
  private readonly scrapedUrls: Set<string>;

  constructor(urls: Iterable<string> = []) {
    this.scrapedUrls = new Set(urls);
  }

  static fromArticles(articles: Iterable<Pick<Article, 'url'>>): CrawlState {
    const state = new CrawlState();
    for (const article of articles) {
      state.add(article.url);
    }
    return state;
  }

  has(url: string): boolean {
    return this.scrapedUrls.has(url);
  }

  add(url: string): void {
    this.scrapedUrls.add(url);
  }

  get size(): number {
    return this.scrapedUrls.size;
  }
}
