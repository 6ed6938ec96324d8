import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { QueryError } from '../scripts/scraper/errors';
import { ListingScraper } from '../scripts/scraper/session';
import { BASE_URL, listingPage, listingUrl, searchPage, stubFetch, testOptions } from './helpers';

const RENT_URL = `${BASE_URL}/zoeken/huur?selected_area=%5B%22amsterdam%22%5D`;
const BUY_UTRECHT_URL = `${BASE_URL}/zoeken/koop?selected_area=%5B%22utrecht%22%5D`;

describe('ListingScraper', () => {
  it('collects the union of links across pages', async () => {
    stubFetch({
      [`${RENT_URL}&search_result=1`]: searchPage(['A', 'B']),
      [`${RENT_URL}&search_result=2`]: searchPage(['B', 'C']),
    });
    const scraper = new ListingScraper({ area: 'Amsterdam', wantTo: 'rent', pageStart: 1, nPages: 2 }, testOptions);
    const links = await scraper.fetchAllLinks();
    expect([...links].sort()).toEqual(['A', 'B', 'C']);
    expect(scraper.discovery?.lastPage).toBe(2);
  });

  it('completes a run when one listing fails', async () => {
    const links = [listingUrl(1), listingUrl(2), listingUrl(3)];
    stubFetch({
      [`${RENT_URL}&search_result=1`]: searchPage(links),
      [listingUrl(1)]: listingPage({ price: '€ 1.100', sinceRent: 'Vandaag' }),
      [listingUrl(2)]: new Error('ECONNRESET'),
      [listingUrl(3)]: listingPage({ price: '€ 1.300', sinceRent: '2 weken' }),
    });
    const scraper = new ListingScraper({ area: 'amsterdam', wantTo: 'rent' }, testOptions);
    const table = await scraper.run();

    expect(table.rows).toHaveLength(2);
    expect(table.rows.map((r) => r.url).sort()).toEqual([listingUrl(1), listingUrl(3)]);
    for (const row of table.rows) {
      expect(row.price).not.toBe('na');
      expect(row.address).toBe('Keizersgracht 1');
      expect(row.city).toBe('amsterdam');
      expect(row.log_id).toBe(table.logId);
      expect(row.photos).toBe('https://img.test/1.jpg 720w, https://img.test/2.jpg 720w');
    }
    expect(table.failures).toEqual([{ link: listingUrl(2), cause: 'ECONNRESET' }]);
    expect(table.columns).not.toContain('term');
  });

  it('searches with the reset query', async () => {
    const fetchMock = stubFetch({ [`${BUY_UTRECHT_URL}&search_result=4`]: searchPage(['U']) });
    const scraper = new ListingScraper({ area: 'amsterdam', wantTo: 'rent' }, testOptions);
    scraper.reset({ area: 'Utrecht', wantTo: 'buy', pageStart: 4 });
    expect(await scraper.fetchAllLinks()).toEqual(['U']);
    expect(fetchMock.mock.calls[0][0]).toBe(`${BUY_UTRECHT_URL}&search_result=4`);
    expect(scraper.query.wantTo).toBe('buy');
  });

  it('rejects an invalid query before any request', async () => {
    const fetchMock = stubFetch({});
    const scraper = new ListingScraper({ area: 'amsterdam', wantTo: 'lease' }, testOptions);
    await expect(scraper.run()).rejects.toThrow(QueryError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('saves the table when asked', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'houseprice-'));
    try {
      stubFetch({
        [`${RENT_URL}&search_result=1`]: searchPage([listingUrl(1)]),
        [listingUrl(1)]: listingPage({ price: '€ 900' }),
      });
      const scraper = new ListingScraper({ area: 'amsterdam', wantTo: 'rent' }, testOptions);
      await scraper.run({ save: true, zip: true, outputDir: dir, fileName: 'run.csv' });
      const csv = await fs.readFile(path.join(dir, 'run.csv'), 'utf8');
      expect(csv.split('\n')[0]).toBe('url,price,address,listed_since,last_ask_price_m2,city,log_id,photos');
      await expect(fs.stat(path.join(dir, 'run.zip'))).resolves.toBeTruthy();
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
