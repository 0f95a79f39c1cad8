/**
 * Document session capability consumed by the crawler.
 *
 * Implementations own navigation and DOM access. Elements handed back are
 * standard DOM nodes, so extraction and listing logic work against any
 * engine that can surface them (jsdom here, a fake in tests).
 */

export interface DocumentPage {
  /** URL of the currently loaded document, '' before the first navigation */
  url(): string;

  /** Load `url`; rejects with TransientFetchError on timeout or HTTP failure */
  navigate(url: string, timeoutMs: number): Promise<void>;

  /** Resolve the first match; rejects with TransientFetchError when it never appears */
  waitForSelector(selector: string, timeoutMs: number): Promise<Element>;

  query(selector: string): Promise<Element | null>;

  queryAll(selector: string): Promise<Element[]>;

  /** Run `fn` against the loaded document and return its result */
  evaluate<T>(fn: (document: Document) => T): Promise<T>;

  /** Activate a control; resolves false when it leads nowhere */
  click(element: Element, timeoutMs: number): Promise<boolean>;

  close(): Promise<void>;
}

export interface DocumentSession {
  /** Main page that drives the listing traversal */
  readonly page: DocumentPage;

  /** Isolated browsing context for a single article */
  newPage(): Promise<DocumentPage>;

  close(): Promise<void>;
}

export type SessionFactory = () => Promise<DocumentSession>;
