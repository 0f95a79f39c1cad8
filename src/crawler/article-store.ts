/**
 * Durable article storage
 * A single pretty-printed JSON array, rewritten wholesale on every merge
 */

import { promises as fs } from 'fs';
import path from 'path';
import pLimit from 'p-limit';
import { Article, ArticleSchema } from '../types/article';
import { PersistenceError } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child('store');

export interface MergeResult {
  added: Article[];
  total: number;
}

// fs errors raised in another realm (e.g. a vm context) are not `instanceof Error`
function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function urlOf(record: unknown): string | null {
  if (typeof record !== 'object' || record === null || !('url' in record)) return null;
  return typeof record.url === 'string' ? record.url : null;
}

export class ArticleStore {
  // Merges are load-modify-write, so they must not interleave
  private readonly writeQueue = pLimit(1);

  constructor(readonly filePath: string) {}

  private async readRecords(): Promise<unknown[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new PersistenceError('read', this.filePath, { cause: error });
    }

    if (!raw.trim()) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError('read', this.filePath, { cause: error });
    }

    if (!Array.isArray(parsed)) {
      throw new PersistenceError('read', this.filePath, { cause: new Error('expected a JSON array') });
    }
    return parsed;
  }

  /** All valid articles on disk; malformed records are skipped */
  async load(): Promise<Article[]> {
    const records = await this.readRecords();
    const articles: Article[] = [];

    records.forEach((record, index) => {
      const parsed = ArticleSchema.safeParse(record);
      if (parsed.success) {
        articles.push(parsed.data);
      } else {
        log.warn(`Skipping malformed record #${index} in ${this.filePath}`, parsed.error.issues[0]?.message);
      }
    });

    return articles;
  }

  /**
   * Append articles whose URL is not stored yet.
   * Re-submitting stored articles is a no-op, so overlapping batches are safe.
   * @throws PersistenceError when the file cannot be read or written
   */
  merge(batch: Article[]): Promise<MergeResult> {
    return this.writeQueue(() => this.mergeNow(batch));
  }

  private async mergeNow(batch: Article[]): Promise<MergeResult> {
    // Unrecognised records are written back untouched
    const records = await this.readRecords();
    const knownUrls = new Set(records.map(urlOf).filter((url): url is string => url !== null));

    const added: Article[] = [];
    for (const article of batch) {
      if (knownUrls.has(article.url)) continue;
      knownUrls.add(article.url);
      added.push(article);
    }

    if (added.length === 0) {
      log.info('📝 No new articles to save');
      return { added, total: records.length };
    }

    const merged = [...records, ...added];
    await this.write(merged);
    log.info(`💾 Saved ${added.length} new articles to ${this.filePath} (${merged.length} total)`);
    return { added, total: merged.length };
  }

  private async write(records: unknown[]): Promise<void> {
    const tempFile = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempFile, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
      await fs.rename(tempFile, this.filePath);
    } catch (error) {
      throw new PersistenceError('write', this.filePath, { cause: error });
    }
  }
}
