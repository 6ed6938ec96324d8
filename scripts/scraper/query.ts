import { QueryError } from './errors';
import type { DaysSince, QueryPatch, SearchQuery, SearchQueryInput, WantTo } from './types';

const BUY_ALIASES = ['buy', 'koop', 'b', 'k'];
const RENT_ALIASES = ['rent', 'huur', 'r', 'h'];
const DAYS_SINCE: readonly DaysSince[] = [1, 3, 5, 10, 30];

export const normalizeArea = (area: string): string => area.toLowerCase().replace(/ /g, '-');

export function createSearchQuery(input: SearchQueryInput): SearchQuery {
  return {
    area: normalizeArea(input.area),
    wantTo: input.wantTo,
    propertyType: input.propertyType ?? null,
    minPrice: input.minPrice ?? null,
    maxPrice: input.maxPrice ?? null,
    daysSince: input.daysSince ?? null,
    findPast: input.findPast ?? false,
    pageStart: Math.max(input.pageStart ?? 1, 1),
    nPages: Math.max(input.nPages ?? 1, 1),
  };
}

/**
 * Overwrites only the fields present in `patch`. Page bounds are clamped
 * the same way construction clamps them.
 */
export function resetQuery(query: SearchQuery, patch: QueryPatch): SearchQuery {
  const next = { ...query };
  if (patch.area !== undefined) next.area = normalizeArea(patch.area);
  if (patch.wantTo !== undefined) next.wantTo = patch.wantTo;
  if (patch.propertyType !== undefined) next.propertyType = patch.propertyType;
  if (patch.minPrice !== undefined) next.minPrice = patch.minPrice;
  if (patch.maxPrice !== undefined) next.maxPrice = patch.maxPrice;
  if (patch.daysSince !== undefined) next.daysSince = patch.daysSince;
  if (patch.findPast !== undefined) next.findPast = patch.findPast;
  if (patch.pageStart !== undefined) next.pageStart = Math.max(patch.pageStart, 1);
  if (patch.nPages !== undefined) next.nPages = Math.max(patch.nPages, 1);
  return next;
}

export function resolveWantTo(wantTo: string): WantTo {
  const v = wantTo.toLowerCase();
  if (BUY_ALIASES.includes(v)) return 'buy';
  if (RENT_ALIASES.includes(v)) return 'rent';
  throw new QueryError(`'wantTo' must be either 'buy' or 'rent', got '${wantTo}'.`);
}

const isDaysSince = (n: number): n is DaysSince => DAYS_SINCE.some((d) => d === n);

export function checkDaysSince(query: SearchQuery): DaysSince | null {
  if (query.daysSince === null) return null;
  if (query.findPast) {
    throw new QueryError("'daysSince' can only be specified when findPast is false.");
  }
  if (!isDaysSince(query.daysSince)) {
    throw new QueryError(`'daysSince' must be one of ${DAYS_SINCE.join(', ')}, got ${query.daysSince}.`);
  }
  return query.daysSince;
}

export function validateQuery(query: SearchQuery): void {
  resolveWantTo(query.wantTo);
  checkDaysSince(query);
}

export function buildSearchUrl(baseUrl: string, query: SearchQuery): string {
  const segment = resolveWantTo(query.wantTo) === 'buy' ? 'koop' : 'huur';
  let url = `${baseUrl}/zoeken/${segment}?selected_area=%5B%22${query.area}%22%5D`;

  if (query.propertyType) {
    const types = query.propertyType.split(',').map((t) => `%22${t}%22`);
    url += `&object_type=%5B${types.join(',')}%5D`;
  }

  if (query.findPast) {
    url += '&availability=%22unavailable%22';
  }

  if (query.minPrice !== null || query.maxPrice !== null) {
    url += `&price=%22${query.minPrice ?? ''}-${query.maxPrice ?? ''}%22`;
  }

  const daysSince = checkDaysSince(query);
  if (daysSince !== null) {
    url += `&publication_date=${daysSince}`;
  }
  return url;
}

export const buildPageUrl = (searchUrl: string, page: number): string =>
  `${searchUrl}&search_result=${page}`;
