import { ConfigurationError } from '../../utils/errors';
import { loadEnvironmentConfig } from '../environment';

describe('loadEnvironmentConfig', () => {
  it('should apply defaults when nothing is set', () => {
    const config = loadEnvironmentConfig({});

    expect(config).toEqual({
      crawler: { minArticleId: 33500, maxPages: undefined, batchSize: 5, fetchAttempts: 2, minTextLength: 10 },
      timeouts: { listMs: 10000, navigationMs: 30000, contentMs: 20000 },
      pacing: { minMs: 1000, maxMs: 3000, retryDelayMs: 2000 },
      storage: { dataFile: 'data/51cto_articles.json' },
      scheduler: { workerCount: 2, initialCrawl: true },
      session: { userAgent: expect.stringContaining('Mozilla/5.0') },
      logging: { level: 'info' }
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadEnvironmentConfig({
      MIN_ARTICLE_ID: '40000',
      MAX_PAGES: '3',
      BATCH_SIZE: '10',
      INITIAL_CRAWL: 'false',
      DATA_FILE: '/tmp/articles.json',
      USER_AGENT: 'test-agent',
      LOG_LEVEL: 'debug'
    });

    expect(config.crawler).toMatchObject({ minArticleId: 40000, maxPages: 3, batchSize: 10 });
    expect(config.scheduler.initialCrawl).toBe(false);
    expect(config.storage.dataFile).toBe('/tmp/articles.json');
    expect(config.session.userAgent).toBe('test-agent');
    expect(config.logging.level).toBe('debug');
  });

  it('should treat blank variables as unset', () => {
    const config = loadEnvironmentConfig({ BATCH_SIZE: '  ', MAX_PAGES: '' });

    expect(config.crawler.batchSize).toBe(5);
    expect(config.crawler.maxPages).toBeUndefined();
  });

  it('should name every invalid variable', () => {
    let caught: unknown;
    try {
      loadEnvironmentConfig({ BATCH_SIZE: 'many', MAX_PAGES: '0', LOG_LEVEL: 'verbose' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.issues.map(issue => issue.split(' ')[0]).sort()).toEqual(['BATCH_SIZE', 'LOG_LEVEL', 'MAX_PAGES']);
  });

  it('should reject a pacing range that is upside down', () => {
    expect(() => loadEnvironmentConfig({ PACING_MIN_MS: '5000', PACING_MAX_MS: '1000' }))
      .toThrow('Invalid configuration: PACING_MIN_MS (must not exceed PACING_MAX_MS)');
  });
});
