import { Article } from '../types/article';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { ArticleStore } from './article-store';

const log = logger.child('batch');

export type BatchCallback = (articles: Article[]) => void | Promise<void>;

export interface FlushResult {
  delivered: number;      // Articles handed to the batch callback
  persisted: number;      // Articles newly written to the store
  pendingWrites: number;  // Articles still waiting for a successful write
}

/**
 * Groups fetched articles into batches of `batchSize`.
 * Each flush merges into the store first, then hands the batch to `onBatch`.
 * A failed write keeps its articles and retries them on the next flush.
 */
export class BatchPersister {
  private pending: Article[] = [];
  private unpersisted: Article[] = [];

  constructor(
    private readonly store: ArticleStore,
    private readonly options: { batchSize: number; onBatch?: BatchCallback }
  ) {}

  get pendingCount(): number {
    return this.pending.length;
  }

  get unpersistedCount(): number {
    return this.unpersisted.length;
  }

  async add(article: Article): Promise<FlushResult | null> {
    this.pending.push(article);
    if (this.pending.length >= this.options.batchSize) {
      return this.flush();
    }
    return null;
  }

  async flush(): Promise<FlushResult> {
    const batch = this.pending;
    this.pending = [];
    const toWrite = [...this.unpersisted, ...batch];
    let persisted = 0;

    if (toWrite.length > 0) {
      try {
        const { added } = await this.store.merge(toWrite);
        persisted = added.length;
        this.unpersisted = [];
      } catch (error) {
        this.unpersisted = toWrite;
        log.error(`❌ Failed to persist ${toWrite.length} articles, will retry with the next batch`, error);
      }
    }

    if (batch.length > 0 && this.options.onBatch) {
      try {
        log.info(`[Batch] Processing ${batch.length} articles`);
        await this.options.onBatch([...batch]);
      } catch (error) {
        log.error(`[Batch] Callback failed: ${describeError(error)}`);
      }
    }

    return { delivered: batch.length, persisted, pendingWrites: this.unpersisted.length };
  }
}
