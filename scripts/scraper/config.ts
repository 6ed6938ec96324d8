import * as fs from 'fs/promises';
import { z } from 'zod';
import defaultSite from './selectors.json';
import { ConfigError, errorMessage } from './errors';
import { LISTED_SINCE } from './listing';
import type { ScraperConfig, ScraperOptions, SiteConfig } from './types';

export const envInt = (v: string | undefined, fallback: number): number => {
  if (v === undefined || v === null || v === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
};

export const envOptInt = (v: string | undefined): number | null => {
  if (v === undefined || v === '') return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
};

export const envBool = (v: string | undefined, fallback: boolean): boolean => {
  if (v === undefined || v === '') return fallback;
  return ['1', 'true', 'yes'].includes(v.toLowerCase());
};

export const CONFIG: ScraperConfig = {
  query: {
    area: process.env.SCRAPER_AREA || 'amsterdam',
    wantTo: process.env.SCRAPER_WANT_TO || 'rent',
    propertyType: process.env.SCRAPER_PROPERTY_TYPE || null,
    minPrice: envOptInt(process.env.SCRAPER_MIN_PRICE),
    maxPrice: envOptInt(process.env.SCRAPER_MAX_PRICE),
    daysSince: envOptInt(process.env.SCRAPER_DAYS_SINCE),
    findPast: envBool(process.env.SCRAPER_FIND_PAST, false),
    pageStart: envInt(process.env.SCRAPER_PAGE_START, 1),
    nPages: envInt(process.env.SCRAPER_N_PAGES, 1),
  },
  concurrency: envInt(process.env.SCRAPER_CONCURRENCY, 5),
  requestTimeoutMs: envInt(process.env.REQUEST_TIMEOUT_MS, 30000),
  jitter: {
    minMs: envInt(process.env.JITTER_MIN_MS, 500),
    maxMs: envInt(process.env.JITTER_MAX_MS, 2000),
  },
  selectorsFile: process.env.SCRAPER_SELECTORS_FILE || null,
  outputDir: process.env.SCRAPER_OUTPUT_DIR || 'data',
  save: envBool(process.env.SCRAPER_SAVE, true),
  zip: envBool(process.env.SCRAPER_ZIP, false),
};

export const REQUIRED_FIELDS = [
  'price',
  'address',
  'descrip',
  'listed_since',
  'zip_code',
  'size',
  'year',
  'living_area',
  'kind_of_house',
  'building_type',
  'num_of_rooms',
  'num_of_bathrooms',
  'layout',
  'energy_label',
  'insulation',
  'heating',
  'ownership',
  'exteriors',
  'parking',
  'neighborhood_name',
  'date_list',
  'date_sold',
  'term',
  'price_sold',
  'last_ask_price',
  'last_ask_price_m2',
] as const;

const selector = z.string().min(1);

const siteSchema = z
  .object({
    baseUrl: z.string().url().transform((u) => u.replace(/\/+$/, '')),
    headers: z.record(z.string()).refine((h) => Object.keys(h).some((k) => k.toLowerCase() === 'user-agent'), {
      message: 'headers must include a user-agent',
    }),
    fields: z.record(selector),
    listedSince: z.object({
      // Defaults to `fields.listed_since`.
      buy: selector.optional(),
      buyPast: selector,
      rent: selector,
      rentPast: selector,
      fallbackTemplate: selector.includes('{n}'),
      fallbackFrom: z.number().int().nonnegative(),
      fallbackTo: z.number().int().nonnegative(),
    }),
    photo: z.object({ selector, attribute: z.string().min(1) }),
  })
  .superRefine((site, ctx) => {
    for (const name of REQUIRED_FIELDS) {
      if (!(name in site.fields)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fields', name], message: 'missing selector' });
      }
    }
  });

export function parseSiteConfig(raw: unknown): SiteConfig {
  const parsed = siteSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid selector configuration: ${parsed.error.message}`);
  }
  const { fields, listedSince, ...rest } = parsed.data;
  return {
    ...rest,
    fields: Object.entries(fields),
    listedSince: { ...listedSince, buy: listedSince.buy ?? fields[LISTED_SINCE] },
  };
}

export async function loadSiteConfig(file: string | null): Promise<SiteConfig> {
  if (!file) return parseSiteConfig(defaultSite);
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(file, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot read selector file ${file}: ${errorMessage(err)}`);
  }
  return parseSiteConfig(raw);
}

export async function loadScraperOptions(config: ScraperConfig = CONFIG): Promise<ScraperOptions> {
  return {
    site: await loadSiteConfig(config.selectorsFile),
    concurrency: config.concurrency,
    requestTimeoutMs: config.requestTimeoutMs,
    jitter: config.jitter,
  };
}
