/**
 * Tests for article fetching with retries
 */

import { JSDOM } from 'jsdom';
import { OST_51CTO_SOURCE } from '../../../adapters/ost-51cto';
import { JsdomDocumentSession } from '../../../session/jsdom-session';
import { CrawlCandidate } from '../../../types/article';
import { DocumentPage, DocumentSession } from '../../../types/session';
import { TransientFetchError } from '../../../utils/errors';
import { fetchArticle, FetchOptions, RetryState } from '../article-fetcher';
import { generateArticleId } from '../article-formatter';
import { articleHtml, createFakeSite, NOW, paragraph, postUrl } from '../../../__tests__/helpers/fixtures';

const options = (overrides: Partial<FetchOptions> = {}): FetchOptions => ({
  source: OST_51CTO_SOURCE,
  attempts: 2,
  navigationTimeoutMs: 1000,
  contentTimeoutMs: 1000,
  retryDelayMs: 0,
  minTextLength: 10,
  now: () => NOW,
  ...overrides
});

const candidateFor = (id: number): CrawlCandidate => ({
  url: postUrl(id),
  title: `Post ${id}`,
  articleId: id
});

/** Single static document that ignores navigation */
function staticSession(html: string): { session: DocumentSession; navigations: string[] } {
  const dom = new JSDOM(html, { url: 'https://ost.51cto.com/' });
  const document = dom.window.document;
  const navigations: string[] = [];

  const page: DocumentPage = {
    url: () => dom.window.location.href,
    navigate: async url => {
      navigations.push(url);
    },
    waitForSelector: async selector => {
      const element = document.querySelector(selector);
      if (!element) throw new TransientFetchError(`"${selector}" not found`);
      return element;
    },
    query: async selector => document.querySelector(selector),
    queryAll: async selector => Array.from(document.querySelectorAll(selector)),
    evaluate: async fn => fn(document),
    click: async () => false,
    close: async () => undefined
  };

  return {
    session: { page, newPage: async () => page, close: async () => undefined },
    navigations
  };
}

describe('fetchArticle', () => {
  it('should fetch, extract and format an article', async () => {
    const site = createFakeSite({
      [postUrl(33601)]: articleHtml(paragraph(33601), { author: 'Jane Doe', time: '2024年5月6日' })
    });
    const session = new JsdomDocumentSession({ userAgent: 'test-agent', fetchImpl: site.fetchImpl });
    const states: RetryState[] = [];

    const result = await fetchArticle(session, candidateFor(33601), options({ onStateChange: s => states.push(s) }));

    expect(result).toEqual({
      ok: true,
      value: {
        id: generateArticleId(postUrl(33601)),
        title: 'Post 33601',
        publishedDate: '2024-05-06',
        url: postUrl(33601),
        content: [{ kind: 'text', value: 'Body paragraph for post 33601' }],
        category: '技术文章',
        summary: 'Body paragraph for post 33601',
        source: '51CTO',
        author: 'Jane Doe',
        createdAt: NOW.toISOString(),
        updatedAt: NOW.toISOString()
      }
    });
    expect(states).toEqual([
      { status: 'attempting', attempt: 1 },
      { status: 'succeeded', attempt: 1 }
    ]);
    // Only the session's main page stays open
    expect(session.openPageCount).toBe(1);
  });

  it('should retry a content timeout exactly once more, then give up', async () => {
    const site = createFakeSite({
      [postUrl(33601)]: '<html><body><div class="loading">Loading...</div></body></html>'
    });
    const session = new JsdomDocumentSession({ userAgent: 'test-agent', fetchImpl: site.fetchImpl });
    const states: RetryState[] = [];

    const result = await fetchArticle(session, candidateFor(33601), options({ onStateChange: s => states.push(s) }));

    expect(site.callsTo(postUrl(33601))).toBe(2);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ kind: 'transient', url: postUrl(33601), title: 'Post 33601', attempts: 2 });
    expect(states.map(state => state.status)).toEqual(['attempting', 'attempting', 'exhausted']);
    expect(session.openPageCount).toBe(1);
  });

  it('should retry HTTP failures', async () => {
    const site = createFakeSite({});
    const session = new JsdomDocumentSession({ userAgent: 'test-agent', fetchImpl: site.fetchImpl });

    const result = await fetchArticle(session, candidateFor(33601), options({ attempts: 3 }));

    expect(site.callsTo(postUrl(33601))).toBe(3);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('transient');
    expect(result.error.message).toBe(`HTTP 404 for ${postUrl(33601)}`);
  });

  it('should succeed on a later attempt', async () => {
    const site = createFakeSite({});
    site.fetchImpl
      .mockResolvedValueOnce(new Response('Bad gateway', { status: 502 }))
      .mockResolvedValueOnce(new Response(articleHtml(paragraph(33601)), { status: 200 }));
    const session = new JsdomDocumentSession({ userAgent: 'test-agent', fetchImpl: site.fetchImpl });

    const result = await fetchArticle(session, candidateFor(33601), options());

    expect(site.fetchImpl).toHaveBeenCalledTimes(2);
    expect(result.ok).toBe(true);
  });

  it('should report empty content after retrying', async () => {
    const site = createFakeSite({ [postUrl(33601)]: articleHtml('<p>   </p>') });
    const session = new JsdomDocumentSession({ userAgent: 'test-agent', fetchImpl: site.fetchImpl });

    const result = await fetchArticle(session, candidateFor(33601), options());

    expect(site.callsTo(postUrl(33601))).toBe(2);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('empty-content');
    expect(result.error.message).toBe(`No content blocks extracted from ${postUrl(33601)}`);
  });

  it('should not retry an article that fails validation', async () => {
    const { session, navigations } = staticSession(articleHtml(paragraph(1)));
    const candidate: CrawlCandidate = { url: 'not a url', title: 'Broken', articleId: null };

    const result = await fetchArticle(session, candidate, options({ attempts: 3 }));

    expect(navigations).toEqual(['not a url']);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ kind: 'invalid-article', attempts: 1 });
  });

  it('should stop retrying as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const site = createFakeSite({}, () => controller.abort());
    const session = new JsdomDocumentSession({ userAgent: 'test-agent', fetchImpl: site.fetchImpl });
    const states: RetryState[] = [];

    const result = await fetchArticle(
      session,
      candidateFor(33601),
      options({ retryDelayMs: 60_000, signal: controller.signal, onStateChange: s => states.push(s) })
    );

    expect(site.callsTo(postUrl(33601))).toBe(1);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ kind: 'interrupted', attempts: 1 });
    expect(states.map(state => state.status)).toEqual(['attempting', 'exhausted']);
  });

  it('should attempt at least once when attempts is below one', async () => {
    const site = createFakeSite({});
    const session = new JsdomDocumentSession({ userAgent: 'test-agent', fetchImpl: site.fetchImpl });

    await fetchArticle(session, candidateFor(33601), options({ attempts: 0 }));

    expect(site.callsTo(postUrl(33601))).toBe(1);
  });
});
