/**
 * Article formatting
 * Maps scraped fields and extracted blocks onto the canonical Article record
 */

import CryptoJS from 'crypto-js';
import { Article, ArticleSchema, ContentBlock, RawArticle } from '../../types/article';
import { ArticleValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';

const log = logger.child('formatter');

const SUMMARY_LENGTH = 200;
const UNTITLED = 'Untitled';

const YEAR_FIRST = /(\d{4})[.\-/年](\d{1,2})[.\-/月](\d{1,2})/;
const YEAR_LAST = /(\d{1,2})[.\-/](\d{1,2})[.\-/](\d{4})/;

export interface FormatOptions {
  category: string;
  source: string;
  now?: Date;
}

/**
 * Stable article id: first 16 hex chars of md5(url).
 * Depends on the URL only, so re-ingesting a URL yields the same id.
 */
export function generateArticleId(url: string): string {
  return CryptoJS.MD5(url).toString().slice(0, 16);
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

function toIsoDay(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function validDay(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= 31 && year > 1900;
}

/**
 * Normalize a scraped publish time to YYYY-MM-DD.
 * Accepts `2024-05-06`, `2024.5.6`, `2024年5月6日`, `06/05/2024` and the
 * same embedded in longer text. Anything else becomes today's date.
 */
export function standardizeDate(value: string | null | undefined, now: Date = new Date()): string {
  if (!value) return toIsoDay(now);

  for (const pattern of [YEAR_FIRST, YEAR_LAST]) {
    const match = value.match(pattern);
    if (!match) continue;

    const [first, second, third] = [match[1], match[2], match[3]].map(Number);
    const [year, month, day] = first > 1900 ? [first, second, third] : [third, second, first];
    if (validDay(year, month, day)) {
      return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
    }
  }

  log.warn(`Cannot parse date "${value}", using current date`);
  return toIsoDay(now);
}

/** First text block, cut to 200 chars with a trailing "..." when longer */
export function buildSummary(content: ContentBlock[]): string {
  for (const block of content) {
    if (block.kind === 'text' && block.value) {
      return block.value.length > SUMMARY_LENGTH
        ? `${block.value.slice(0, SUMMARY_LENGTH)}...`
        : block.value;
    }
  }
  return '';
}

/**
 * Build and validate an Article.
 * @throws ArticleValidationError when the record does not satisfy the schema
 */
export function formatArticle(raw: RawArticle, options: FormatOptions): Article {
  const now = options.now ?? new Date();
  const timestamp = now.toISOString();
  const title = raw.title.replace(/\s+/g, ' ').trim() || UNTITLED;
  const author = raw.author?.trim();

  const candidate = {
    id: generateArticleId(raw.url),
    title,
    publishedDate: standardizeDate(raw.publishTime, now),
    url: raw.url,
    content: raw.content,
    category: options.category,
    summary: buildSummary(raw.content),
    source: options.source,
    ...(author ? { author } : {}),
    createdAt: timestamp,
    updatedAt: timestamp
  };

  const parsed = ArticleSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ArticleValidationError(
      raw.url,
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'article'}: ${issue.message}`)
    );
  }
  return parsed.data;
}
