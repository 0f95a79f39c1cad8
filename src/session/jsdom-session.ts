/**
 * Document session backed by fetch + jsdom
 *
 * Pages are fetched over HTTP and parsed without running their scripts, so
 * a selector that is absent after load will never appear: waits resolve or
 * fail immediately. Clicking follows the control's link.
 */

import { JSDOM, VirtualConsole } from 'jsdom';
import { DocumentPage, DocumentSession, SessionFactory } from '../types/session';
import { TransientFetchError } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child('session');

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface JsdomSessionOptions {
  userAgent: string;
  fetchImpl?: FetchLike;
}

async function fetchHtml(
  url: string,
  timeoutMs: number,
  options: JsdomSessionOptions
): Promise<{ html: string; finalUrl: string }> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, {
      signal: controller.signal,
      headers: {
        'User-Agent': options.userAgent,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8'
      }
    });

    if (!response.ok) {
      throw new TransientFetchError(`HTTP ${response.status} for ${url}`);
    }

    const html = await response.text();
    return { html, finalUrl: response.url || url };
  } catch (error) {
    if (error instanceof TransientFetchError) throw error;
    const timedOut = error instanceof Error && error.name === 'AbortError';
    throw new TransientFetchError(
      timedOut ? `Navigation timeout after ${timeoutMs}ms: ${url}` : `Navigation failed: ${url}`,
      { cause: error }
    );
  } finally {
    clearTimeout(timeout);
  }
}

class JsdomPage implements DocumentPage {
  private dom: JSDOM | null = null;

  constructor(
    private readonly options: JsdomSessionOptions,
    private readonly onClose: (page: JsdomPage) => void
  ) {}

  url(): string {
    return this.dom?.window.location.href ?? '';
  }

  private document(): Document {
    if (!this.dom) {
      throw new TransientFetchError('No document loaded');
    }
    return this.dom.window.document;
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    const { html, finalUrl } = await fetchHtml(url, timeoutMs, this.options);

    const virtualConsole = new VirtualConsole();
    virtualConsole.on('jsdomError', error => log.debug(`jsdom: ${error.message}`));

    this.dom?.window.close();
    this.dom = new JSDOM(html, { url: finalUrl, virtualConsole });
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<Element> {
    const element = this.document().querySelector(selector);
    if (!element) {
      throw new TransientFetchError(`"${selector}" not loaded within ${timeoutMs}ms on ${this.url()}`);
    }
    return element;
  }

  async query(selector: string): Promise<Element | null> {
    return this.document().querySelector(selector);
  }

  async queryAll(selector: string): Promise<Element[]> {
    return Array.from(this.document().querySelectorAll(selector));
  }

  async evaluate<T>(fn: (document: Document) => T): Promise<T> {
    return fn(this.document());
  }

  async click(element: Element, timeoutMs: number): Promise<boolean> {
    const href = element.closest('a')?.getAttribute('href')?.trim();
    if (!href || href.startsWith('#') || href.toLowerCase().startsWith('javascript:')) {
      return false;
    }

    const target = new URL(href, this.url()).href;
    if (target === this.url()) return false;

    await this.navigate(target, timeoutMs);
    return true;
  }

  async close(): Promise<void> {
    this.dom?.window.close();
    this.dom = null;
    this.onClose(this);
  }
}

export class JsdomDocumentSession implements DocumentSession {
  private readonly openPages = new Set<JsdomPage>();
  readonly page: DocumentPage;

  constructor(private readonly options: JsdomSessionOptions) {
    this.page = this.createPage();
  }

  private createPage(): JsdomPage {
    const page = new JsdomPage(this.options, closed => this.openPages.delete(closed));
    this.openPages.add(page);
    return page;
  }

  async newPage(): Promise<DocumentPage> {
    return this.createPage();
  }

  get openPageCount(): number {
    return this.openPages.size;
  }

  async close(): Promise<void> {
    await Promise.all(Array.from(this.openPages, page => page.close()));
    log.info('Session closed');
  }
}

export function createJsdomSession(options: JsdomSessionOptions): SessionFactory {
  return async () => {
    log.info('Starting jsdom document session');
    return new JsdomDocumentSession(options);
  };
}
