import { assembleTable } from './assemble';
import { discoverLinks } from './links';
import { scrapeListings } from './listing';
import { log } from './logger';
import { createSearchQuery, resetQuery, validateQuery } from './query';
import { buildOutputFileName, saveCsv, zipFile } from './storage';
import type { LinkDiscovery, QueryPatch, ResultTable, ScrapeOutcome, ScraperOptions, SearchQuery, SearchQueryInput } from './types';

export type RunOptions = {
  save?: boolean;
  zip?: boolean;
  outputDir?: string;
  fileName?: string;
};

/**
 * One scraping run: link discovery, then detail scraping, then assembly.
 * The query can be adjusted between runs with `reset`.
 */
export class ListingScraper {
  private _query: SearchQuery;
  links: string[] = [];
  discovery: LinkDiscovery | null = null;
  outcomes: ScrapeOutcome[] = [];

  constructor(input: SearchQueryInput, private readonly opts: ScraperOptions) {
    this._query = createSearchQuery(input);
  }

  get query(): SearchQuery {
    return this._query;
  }

  reset(patch: QueryPatch): void {
    this._query = resetQuery(this._query, patch);
  }

  async fetchAllLinks(pageStart?: number, nPages?: number): Promise<string[]> {
    validateQuery(this._query);
    this.discovery = await discoverLinks(this._query, this.opts, pageStart, nPages);
    this.links = [...this.discovery.links];
    return this.links;
  }

  async scrapePages(now?: Date): Promise<ResultTable> {
    this.outcomes = await scrapeListings(this.links, this._query, this.opts);
    return assembleTable(this.outcomes, this._query, this.opts.site, now);
  }

  async run(runOpts: RunOptions = {}): Promise<ResultTable> {
    log(`Starting run for ${JSON.stringify(this._query)}`);
    validateQuery(this._query);
    await this.fetchAllLinks();
    const table = await this.scrapePages();

    if (runOpts.save) {
      const outDir = runOpts.outputDir ?? 'data';
      const fileName = runOpts.fileName ?? buildOutputFileName(this._query, this.links.length);
      const csvPath = await saveCsv(table, outDir, fileName);
      if (runOpts.zip) {
        const zipPath = await zipFile(csvPath, outDir, fileName.replace(/\.csv$/, '.zip'));
        log(`ZIP:  ${zipPath}`);
      }
    }
    log('*** Done! ***');
    return table;
  }
}
