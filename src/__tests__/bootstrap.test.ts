import path from 'path';
import { createNewsBackend } from '../bootstrap';
import { ArticleStore } from '../crawler/article-store';
import { createJsdomSession } from '../session/jsdom-session';
import { logger } from '../utils/logger';
import {
  articleHtml,
  buildArticle,
  createFakeSite,
  LIST_URL,
  listingHtml,
  makeTempDir,
  NOW,
  paragraph,
  postUrl,
  removeTempDir,
  testConfig
} from './helpers/fixtures';

describe('createNewsBackend', () => {
  let dir: string;
  let dataFile: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    dataFile = path.join(dir, 'articles.json');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should serve stored articles once started', async () => {
    await new ArticleStore(dataFile).merge([buildArticle({ url: postUrl(1) })]);
    const backend = createNewsBackend(testConfig(dataFile), {
      openSession: () => Promise.reject(new Error('offline')),
      clock: () => NOW
    });

    await backend.start();

    expect(backend.store.filePath).toBe(dataFile);
    expect(logger.level).toBe('error');
    expect(backend.api.listNews()).toMatchObject({ statusCode: 200, body: { total: 1 } });
    await backend.stop();
  });

  it('should crawl in the background when the initial crawl is enabled', async () => {
    const site = createFakeSite({
      [LIST_URL]: listingHtml([33601]),
      [postUrl(33601)]: articleHtml(paragraph(33601))
    });
    const config = testConfig(dataFile);
    config.scheduler.initialCrawl = true;
    const backend = createNewsBackend(config, {
      openSession: createJsdomSession({ userAgent: config.session.userAgent, fetchImpl: site.fetchImpl }),
      clock: () => NOW
    });

    await backend.start();
    await backend.scheduler.idle();

    expect(backend.cache.status()).toMatchObject({ status: 'ready', count: 1 });
    await backend.stop();
  });
});
