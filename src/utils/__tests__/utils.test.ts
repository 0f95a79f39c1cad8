import { randomDelay, sleep } from '../delay';
import { CrawlerError, describeError, PersistenceError, SessionUnavailableError } from '../errors';
import { logger } from '../logger';

describe('logger', () => {
  afterEach(() => {
    logger.setLevel('error');
  });

  it('should tag child output with its scope', () => {
    logger.setLevel('info');
    logger.child('crawl').info('Crawling page 1');

    expect(console.info).toHaveBeenCalledWith(
      expect.stringMatching(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] \[crawl\]$/),
      'Crawling page 1',
      ''
    );
  });

  it('should apply level changes to existing children', () => {
    const child = logger.child('store');
    logger.setLevel('warn');

    child.info('hidden');
    child.warn('shown', { count: 1 });

    expect(console.info).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('[WARN] [store]'), 'shown', { count: 1 });
  });
});

describe('errors', () => {
  it('should carry a code and the subclass name', () => {
    const error = new PersistenceError('write', '/data/articles.json', { cause: new Error('disk full') });

    expect(error).toBeInstanceOf(CrawlerError);
    expect(error.name).toBe('PersistenceError');
    expect(error.code).toBe('PERSISTENCE');
    expect(error.message).toBe('Failed to write /data/articles.json: disk full');
  });

  it('should describe unknown values', () => {
    expect(describeError(new SessionUnavailableError())).toBe('Document session unavailable: Unknown error');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(undefined)).toBe('Unknown error');
  });
});

describe('delay', () => {
  it('should resolve early once the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeUndefined();
  });

  it('should not wait at all for an empty range', async () => {
    const started = Date.now();
    await randomDelay(0, 0);
    expect(Date.now() - started).toBeLessThan(50);
  });
});
