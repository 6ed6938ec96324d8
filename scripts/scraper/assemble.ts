import { log } from './logger';
import { PHOTOS } from './listing';
import type { FailedListing, ListingRecord, ResultTable, ScrapeOutcome, SearchQuery, SiteConfig } from './types';
import { NA, pad } from './utils';

export const HISTORICAL_ONLY = ['term', 'date_sold', 'price_sold'];

/** Batch id shared by every row of a run, e.g. `202410-1915-3022`. */
export const formatLogId = (d: Date): string =>
  `${d.getFullYear()}${pad(d.getMonth() + 1)}-${pad(d.getDate())}${pad(d.getHours())}-${pad(d.getMinutes())}${pad(d.getSeconds())}`;

export const cityFromLink = (link: string): string => link.split('/')[4] || NA;

export function tableColumns(site: Pick<SiteConfig, 'fields'>, findPast: boolean): string[] {
  const fields = site.fields
    .map(([name]) => name)
    .filter((name) => findPast || !HISTORICAL_ONLY.includes(name));
  return ['url', ...fields, 'city', 'log_id', PHOTOS];
}

export function assembleTable(
  outcomes: readonly ScrapeOutcome[],
  query: Pick<SearchQuery, 'findPast'>,
  site: Pick<SiteConfig, 'fields'>,
  now: Date = new Date()
): ResultTable {
  const columns = tableColumns(site, query.findPast);
  const logId = formatLogId(now);
  const rows: ListingRecord[] = [];
  const failures: FailedListing[] = [];

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      failures.push({ link: outcome.link, cause: outcome.cause });
      continue;
    }
    const derived: ListingRecord = { city: cityFromLink(outcome.link), log_id: logId };
    const row: ListingRecord = {};
    for (const col of columns) {
      row[col] = derived[col] ?? outcome.record[col] ?? NA;
    }
    rows.push(row);
  }

  log(`*** All scraping done: ${rows.length} results, ${failures.length} failed ***`);
  return { columns, rows, failures, logId };
}
