/**
 * Listing page helpers
 * Reads candidate articles off the current listing page and turns the page
 */

import { CrawlCandidate } from '../../types/article';
import { DocumentPage } from '../../types/session';
import { SourceProfile } from '../../types/source';
import { logger } from '../../utils/logger';
import { CrawlState } from '../crawl-state';

const log = logger.child('listing');

export interface ListingPage {
  candidates: CrawlCandidate[];  // Eligible and not yet crawled, in page order
  total: number;                 // Items that carried an article link
  oldCount: number;              // Items at or below the floor id
  eligibleCount: number;
  alreadyCrawled: number;        // Eligible items dropped by the ledger
  allOld: boolean;               // Something was listed and all of it was old
}

const EMPTY_LISTING: ListingPage = {
  candidates: [],
  total: 0,
  oldCount: 0,
  eligibleCount: 0,
  alreadyCrawled: 0,
  allOld: false
};

/** Numeric id from an article URL, or null when it has none */
export function parseArticleId(url: string, pattern: RegExp): number | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }
  const match = pathname.match(pattern);
  if (!match) return null;
  const id = Number(match[1]);
  return Number.isSafeInteger(id) ? id : null;
}

/**
 * Split listed items into old, already crawled and fetchable.
 * Items whose id cannot be parsed are never counted as old.
 */
export function partitionCandidates(
  items: CrawlCandidate[],
  minArticleId: number,
  ledger: CrawlState
): ListingPage {
  const candidates: CrawlCandidate[] = [];
  const seenOnPage = new Set<string>();
  let oldCount = 0;
  let eligibleCount = 0;
  let alreadyCrawled = 0;

  for (const item of items) {
    if (item.articleId !== null && item.articleId <= minArticleId) {
      oldCount++;
      continue;
    }

    eligibleCount++;
    if (ledger.has(item.url) || seenOnPage.has(item.url)) {
      alreadyCrawled++;
      continue;
    }

    seenOnPage.add(item.url);
    candidates.push(item);
  }

  return {
    candidates,
    total: items.length,
    oldCount,
    eligibleCount,
    alreadyCrawled,
    allOld: eligibleCount === 0 && oldCount > 0
  };
}

function readItem(item: Element, baseUrl: string, source: SourceProfile): CrawlCandidate | null {
  const link = item.querySelector(source.selectors.itemLink);
  const href = link?.getAttribute('href')?.trim();
  if (!link || !href) return null;

  const url = new URL(href, baseUrl).href;
  const heading = item.querySelector(source.selectors.itemTitle)?.textContent?.trim();
  const linkText = (link.textContent ?? '').trim().split('\n')[0].trim();

  return {
    url,
    title: heading || linkText || 'Untitled',
    articleId: parseArticleId(url, source.articleIdPattern)
  };
}

/**
 * Read the listing currently loaded in `page`.
 * Failures are contained: a page that cannot be read yields no work.
 */
export async function readListingPage(
  page: DocumentPage,
  source: SourceProfile,
  options: { minArticleId: number; timeoutMs: number; ledger: CrawlState }
): Promise<ListingPage> {
  try {
    await page.waitForSelector(source.selectors.list, options.timeoutMs);
    const elements = await page.queryAll(source.selectors.listItem);
    const baseUrl = page.url() || source.listUrl;
    log.info(`Found ${elements.length} article items`);

    const items: CrawlCandidate[] = [];
    elements.forEach((element, index) => {
      try {
        const item = readItem(element, baseUrl, source);
        if (item) items.push(item);
      } catch (error) {
        log.warn(`[${index + 1}] Failed to parse listing item`, error);
      }
    });

    const listing = partitionCandidates(items, options.minArticleId, options.ledger);
    log.info(
      `Got ${listing.candidates.length} new articles to crawl ` +
      `(${listing.oldCount} old, ${listing.alreadyCrawled} already crawled)`
    );
    return listing;
  } catch (error) {
    log.error('Failed to read listing page', error);
    return { ...EMPTY_LISTING, candidates: [] };
  }
}

function isDisabled(control: Element): boolean {
  return control.hasAttribute('disabled')
    || control.getAttribute('aria-disabled') === 'true'
    || /(?:^|\s)disabled(?:\s|$)/.test(control.getAttribute('class') ?? '');
}

/** Click the next-page control; false when there is none or it leads nowhere */
export async function goToNextPage(
  page: DocumentPage,
  source: SourceProfile,
  timeoutMs: number
): Promise<boolean> {
  try {
    const controls = await page.queryAll(source.selectors.nextPage);
    const next = controls.find(control =>
      (control.textContent ?? '').includes(source.nextPageLabel) && !isDisabled(control)
    );

    if (!next) {
      log.info('Next page button not found');
      return false;
    }

    const moved = await page.click(next, timeoutMs);
    if (moved) log.info('Clicked next page');
    return moved;
  } catch (error) {
    log.error('Click next page failed', error);
    return false;
  }
}
