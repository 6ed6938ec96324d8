import { vi } from 'vitest';
import type { ScraperOptions, SiteConfig } from '../scripts/scraper/types';

export const BASE_URL = 'https://example.test';

export const testSite: SiteConfig = {
  baseUrl: BASE_URL,
  headers: { 'user-agent': 'test-agent' },
  fields: [
    ['price', '.price'],
    ['address', '.address'],
    ['listed_since', '.since-buy'],
    ['date_sold', '.sold-date'],
    ['term', '.term'],
    ['price_sold', '.sold-price'],
    ['last_ask_price_m2', '.m2'],
  ],
  listedSince: {
    buy: '.since-buy',
    buyPast: '.since-buy-past',
    rent: '.since-rent',
    rentPast: '.since-rent-past',
    fallbackTemplate: '.kenmerk:nth-child({n}) span',
    fallbackFrom: 6,
    fallbackTo: 15,
  },
  photo: { selector: '.photo img', attribute: 'data-lazy-srcset' },
};

export const testOptions: ScraperOptions = {
  site: testSite,
  concurrency: 3,
  requestTimeoutMs: 1000,
  jitter: { minMs: 0, maxMs: 0 },
};

export type Route = string | number | Error;

/** Replaces global fetch: strings are 200 bodies, numbers are statuses, errors are thrown. */
export function stubFetch(routes: Record<string, Route>) {
  const fetchMock = vi.fn(async (input: unknown, _init?: { method?: string; headers?: Record<string, string> }) => {
    const route = routes[String(input)];
    if (route === undefined) return new Response('not found', { status: 404 });
    if (route instanceof Error) throw route;
    if (typeof route === 'number') return new Response('', { status: route });
    return new Response(route, { status: 200 });
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export const searchPage = (urls: string[]): string => `<html><head>
<script type="application/ld+json">${JSON.stringify({
  '@type': 'ItemList',
  itemListElement: urls.map((url, i) => ({ '@type': 'ListItem', position: i + 1, url })),
})}</script>
</head><body></body></html>`;

export const listingUrl = (id: number, city = 'amsterdam') =>
  `${BASE_URL}/huur/${city}/appartement-${id}/`;

export const listingPage = (opts: { price?: string; address?: string; sinceRent?: string } = {}): string => `<html><body>
${opts.price === undefined ? '' : `<div class="price">${opts.price}</div>`}
<h1 class="address">
  ${opts.address ?? 'Keizersgracht 1'}
</h1>
${opts.sinceRent === undefined ? '' : `<span class="since-rent">${opts.sinceRent}</span>`}
<ul class="photo">
  <li><img data-lazy-srcset="https://img.test/1.jpg 720w"></li>
  <li><img src="placeholder.gif"></li>
  <li><img data-lazy-srcset="https://img.test/2.jpg 720w"></li>
</ul>
</body></html>`;
