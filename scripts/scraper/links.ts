import { processWithConcurrency } from './concurrency';
import { errorMessage } from './errors';
import { fetchHtml } from './http';
import { extractListingUrls } from './extract';
import { log, warn, error as logError } from './logger';
import { buildPageUrl, buildSearchUrl } from './query';
import type { LinkDiscovery, ScraperOptions, SearchQuery } from './types';
import { jitter } from './utils';

/** Every listing URL on one search-results page. Failures yield an empty list. */
export async function getLinksFromPage(url: string, opts: ScraperOptions): Promise<string[]> {
  let html: string;
  try {
    html = await fetchHtml(url, { headers: opts.site.headers, timeoutMs: opts.requestTimeoutMs });
  } catch (err) {
    logError(`Failed to fetch ${url}: ${errorMessage(err)}`);
    return [];
  }
  await jitter(opts.jitter);

  const urls = extractListingUrls(html);
  if (urls === null) {
    warn(`No listing data found in ${url}`);
    return [];
  }
  return urls;
}

export async function discoverLinks(
  query: SearchQuery,
  opts: ScraperOptions,
  pageStart: number = query.pageStart,
  nPages: number = query.nPages
): Promise<LinkDiscovery> {
  log('*** Phase 1: Fetch all the available links from all pages ***');
  const searchUrl = buildSearchUrl(opts.site.baseUrl, query);
  log(`*** Main URL: ${searchUrl} ***`);

  const pages = Array.from({ length: nPages }, (_, i) => pageStart + i);
  const links = new Set<string>();
  const pagesWithLinks: number[] = [];
  const emptyPages: number[] = [];

  await processWithConcurrency(pages, (page) => getLinksFromPage(buildPageUrl(searchUrl, page), opts), {
    concurrency: opts.concurrency,
    onSettled: (result, idx) => {
      const page = pages[idx];
      const found = result.ok ? result.value : [];
      for (const link of found) links.add(link);
      (found.length ? pagesWithLinks : emptyPages).push(page);
      log(`Page ${page}: ${found.length} links (${links.size} unique so far).`);
    },
  });

  pagesWithLinks.sort((a, b) => a - b);
  emptyPages.sort((a, b) => a - b);
  const lastPage = pagesWithLinks.length ? pagesWithLinks[pagesWithLinks.length - 1] : null;
  log(`*** Got all the urls. ${links.size} houses found from page ${pageStart} to ${pageStart + nPages - 1} ***`);
  if (emptyPages.length) warn(`Pages without listings: ${emptyPages.join(', ')}`);

  return { links, pagesWithLinks, emptyPages, lastPage };
}
