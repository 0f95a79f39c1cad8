/**
 * Environment configuration for the crawler, cache and scheduler
 * Loads and validates environment variables, falling back to defaults
 */

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import type { LogLevel } from '../utils/logger';

export interface EnvironmentConfig {
  crawler: {
    minArticleId: number;
    maxPages: number | undefined;   // undefined = walk until another stop condition fires
    batchSize: number;
    fetchAttempts: number;
    minTextLength: number;
  };
  timeouts: {
    listMs: number;
    navigationMs: number;
    contentMs: number;
  };
  pacing: {
    minMs: number;
    maxMs: number;
    retryDelayMs: number;
  };
  storage: {
    dataFile: string;
  };
  scheduler: {
    workerCount: number;
    initialCrawl: boolean;
  };
  session: {
    userAgent: string;
  };
  logging: {
    level: LogLevel;
  };
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();
const flag = z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
  MIN_ARTICLE_ID: nonNegativeInt.default(33500),
  MAX_PAGES: positiveInt.optional(),
  BATCH_SIZE: positiveInt.default(5),
  FETCH_ATTEMPTS: positiveInt.default(2),
  MIN_TEXT_LENGTH: nonNegativeInt.default(10),
  LIST_TIMEOUT_MS: positiveInt.default(10_000),
  NAVIGATION_TIMEOUT_MS: positiveInt.default(30_000),
  CONTENT_TIMEOUT_MS: positiveInt.default(20_000),
  PACING_MIN_MS: nonNegativeInt.default(1_000),
  PACING_MAX_MS: nonNegativeInt.default(3_000),
  RETRY_DELAY_MS: nonNegativeInt.default(2_000),
  DATA_FILE: z.string().min(1).default('data/51cto_articles.json'),
  WORKER_COUNT: positiveInt.default(2),
  INITIAL_CRAWL: flag.default('true'),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Load and validate environment configuration
 * @throws ConfigurationError naming every variable that failed validation
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  // Blank variables count as unset so defaults still apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')} (${issue.message})`)
    );
  }

  const vars = parsed.data;
  if (vars.PACING_MIN_MS > vars.PACING_MAX_MS) {
    throw new ConfigurationError(['PACING_MIN_MS (must not exceed PACING_MAX_MS)']);
  }

  return {
    crawler: {
      minArticleId: vars.MIN_ARTICLE_ID,
      maxPages: vars.MAX_PAGES,
      batchSize: vars.BATCH_SIZE,
      fetchAttempts: vars.FETCH_ATTEMPTS,
      minTextLength: vars.MIN_TEXT_LENGTH
    },
    timeouts: {
      listMs: vars.LIST_TIMEOUT_MS,
      navigationMs: vars.NAVIGATION_TIMEOUT_MS,
      contentMs: vars.CONTENT_TIMEOUT_MS
    },
    pacing: {
      minMs: vars.PACING_MIN_MS,
      maxMs: vars.PACING_MAX_MS,
      retryDelayMs: vars.RETRY_DELAY_MS
    },
    storage: {
      dataFile: vars.DATA_FILE
    },
    scheduler: {
      workerCount: vars.WORKER_COUNT,
      initialCrawl: vars.INITIAL_CRAWL
    },
    session: {
      userAgent: vars.USER_AGENT
    },
    logging: {
      level: vars.LOG_LEVEL
    }
  };
}
