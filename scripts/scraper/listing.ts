import { processWithConcurrency } from './concurrency';
import { cleanDateFormat } from './dates';
import { errorMessage } from './errors';
import { type Doc, extractAttributes, extractField, loadDoc, selectText } from './extract';
import { fetchHtml } from './http';
import { log, error as logError } from './logger';
import { resolveWantTo } from './query';
import type { ListedSinceSelectors, ListingRecord, ScrapeOutcome, ScraperOptions, SearchQuery } from './types';
import { NA, jitter, normalizeText } from './utils';

export const LISTED_SINCE = 'listed_since';
export const PHOTOS = 'photos';

// The site appends the unit on a second line after a carriage return.
const FIRST_LINE_ONLY = new Set(['last_ask_price_m2']);

export function resolveListedSinceSelector(
  selectors: ListedSinceSelectors,
  query: Pick<SearchQuery, 'wantTo' | 'findPast'>
): string {
  if (resolveWantTo(query.wantTo) === 'buy') {
    return query.findPast ? selectors.buyPast : selectors.buy;
  }
  return query.findPast ? selectors.rentPast : selectors.rent;
}

/**
 * Tries the positional fallback selectors in ascending order and returns the
 * first value that parses as a date, or "na".
 */
export function scanListedSince($: Doc, selectors: ListedSinceSelectors, now?: Date): string {
  for (let i = selectors.fallbackFrom; i <= selectors.fallbackTo; i++) {
    const value = extractField($, selectors.fallbackTemplate.replaceAll('{n}', String(i)));
    if (cleanDateFormat(value, now) !== NA) return value;
  }
  return NA;
}

export function extractPhotos($: Doc, selector: string, attribute: string): string {
  return extractAttributes($, selector, attribute).map(normalizeText).join(', ');
}

export function parseListingPage(
  html: string,
  link: string,
  query: SearchQuery,
  opts: Pick<ScraperOptions, 'site'>,
  now?: Date
): ListingRecord {
  const { site } = opts;
  const $ = loadDoc(html);
  const record: ListingRecord = { url: link };

  for (const [name, selector] of site.fields) {
    if (name === LISTED_SINCE) {
      const value = extractField($, resolveListedSinceSelector(site.listedSince, query));
      if (cleanDateFormat(value, now) !== NA) {
        record[name] = value;
      } else {
        const scanned = scanListedSince($, site.listedSince, now);
        record[name] = scanned !== NA ? scanned : value;
      }
    } else if (FIRST_LINE_ONLY.has(name)) {
      const raw = selectText($, selector);
      record[name] = raw === null ? NA : normalizeText(raw.split('\r')[0]);
    } else {
      record[name] = extractField($, selector);
    }
  }

  record[PHOTOS] = extractPhotos($, site.photo.selector, site.photo.attribute);
  return record;
}

export async function scrapeListing(
  link: string,
  query: SearchQuery,
  opts: ScraperOptions
): Promise<ScrapeOutcome> {
  try {
    const html = await fetchHtml(link, { headers: opts.site.headers, timeoutMs: opts.requestTimeoutMs });
    await jitter(opts.jitter);
    return { ok: true, link, record: parseListingPage(html, link, query, opts) };
  } catch (err) {
    const cause = errorMessage(err);
    logError(`Error scraping ${link}: ${cause}`);
    return { ok: false, link, cause };
  }
}

/** Outcomes come back in the order of `links`. */
export async function scrapeListings(
  links: readonly string[],
  query: SearchQuery,
  opts: ScraperOptions
): Promise<ScrapeOutcome[]> {
  log('*** Phase 2: Start scraping from individual links ***');
  let done = 0;
  const settled = await processWithConcurrency(links, (link) => scrapeListing(link, query, opts), {
    concurrency: opts.concurrency,
    onSettled: () => {
      done += 1;
      if (done % 10 === 0 || done === links.length) log(`Scraped ${done}/${links.length} listings.`);
    },
  });
  return settled.map((s, i): ScrapeOutcome =>
    s.ok ? s.value : { ok: false, link: links[i], cause: errorMessage(s.error) }
  );
}
