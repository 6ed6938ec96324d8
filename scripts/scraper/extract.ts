import * as cheerio from 'cheerio';
import { NA, normalizeText } from './utils';

export type Doc = cheerio.CheerioAPI;

export const loadDoc = (html: string): Doc => cheerio.load(html);

/** Raw text of the first element matching `selector`, or null when nothing matches. */
export function selectText($: Doc, selector: string): string | null {
  const first = $(selector).first();
  return first.length ? first.text() : null;
}

export function extractField($: Doc, selector: string): string {
  const text = selectText($, selector);
  return text === null ? NA : normalizeText(text);
}

export function extractAttributes($: Doc, selector: string, attribute: string): string[] {
  const values: string[] = [];
  $(selector).each((_, el) => {
    const v = $(el).attr(attribute);
    if (v) values.push(v);
  });
  return values;
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null;

/**
 * Listing URLs from the first JSON-LD block exposing `itemListElement`.
 * Blocks that fail to parse are skipped.
 */
export function extractListingUrls(html: string): string[] | null {
  const $ = cheerio.load(html);
  const blocks = $('script[type="application/ld+json"]');
  if (!blocks.length) return null;

  for (const el of blocks.toArray()) {
    let data: unknown;
    try {
      data = JSON.parse($(el).text());
    } catch {
      continue;
    }
    if (!isRecord(data) || !Array.isArray(data.itemListElement)) continue;

    const urls = new Set<string>();
    for (const item of data.itemListElement) {
      if (isRecord(item) && typeof item.url === 'string') urls.add(item.url);
    }
    return [...urls];
  }
  return null;
}
