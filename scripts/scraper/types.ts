// scripts/scraper/types.ts

export type WantTo = 'buy' | 'rent';

export type DaysSince = 1 | 3 | 5 | 10 | 30;

export type SearchQuery = {
  area: string;
  wantTo: string;
  propertyType: string | null;
  minPrice: number | null;
  maxPrice: number | null;
  daysSince: number | null;
  findPast: boolean;
  pageStart: number;
  nPages: number;
};

export type SearchQueryInput = {
  area: string;
  wantTo: string;
  propertyType?: string | null;
  minPrice?: number | null;
  maxPrice?: number | null;
  daysSince?: number | null;
  findPast?: boolean;
  pageStart?: number;
  nPages?: number;
};

export type QueryPatch = Partial<SearchQueryInput>;

export type JitterPolicy = {
  minMs: number;
  maxMs: number;
};

export type ListedSinceSelectors = {
  buy: string;
  buyPast: string;
  rent: string;
  rentPast: string;
  fallbackTemplate: string;
  fallbackFrom: number;
  fallbackTo: number;
};

export type SiteConfig = {
  baseUrl: string;
  headers: Record<string, string>;
  fields: Array<[name: string, selector: string]>;
  listedSince: ListedSinceSelectors;
  photo: { selector: string; attribute: string };
};

export type ScraperOptions = {
  site: SiteConfig;
  concurrency: number;
  requestTimeoutMs: number;
  jitter: JitterPolicy;
};

export type ListingRecord = Record<string, string>;

export type ScrapeOutcome =
  | { ok: true; link: string; record: ListingRecord }
  | { ok: false; link: string; cause: string };

export type FailedListing = {
  link: string;
  cause: string;
};

export type ResultTable = {
  columns: string[];
  rows: ListingRecord[];
  failures: FailedListing[];
  logId: string;
};

export type LinkDiscovery = {
  links: Set<string>;
  pagesWithLinks: number[];
  emptyPages: number[];
  lastPage: number | null;
};

export type ScraperConfig = {
  query: SearchQueryInput;
  concurrency: number;
  requestTimeoutMs: number;
  jitter: JitterPolicy;
  selectorsFile: string | null;
  outputDir: string;
  save: boolean;
  zip: boolean;
};
