import { NA, formatYmd, normalizeText } from './utils';

const MONTHS: Record<string, number> = {
  januari: 0,
  februari: 1,
  maart: 2,
  april: 3,
  mei: 4,
  juni: 5,
  juli: 6,
  augustus: 7,
  september: 8,
  oktober: 9,
  november: 10,
  december: 11,
};

const RELATIVE = /^(\d+)\+?\s*(weken|week|maanden|maand)\+?$/;
const ABSOLUTE = /^(?:[a-z]+\s+)?(\d{1,2})\s+([a-z]+)\s+(\d{4})$/;

// Clamps to the last day of the target month (31 May - 3 months = 29 Feb).
function monthsBefore(now: Date, n: number): Date {
  const lastDay = new Date(now.getFullYear(), now.getMonth() - n + 1, 0).getDate();
  return new Date(now.getFullYear(), now.getMonth() - n, Math.min(now.getDate(), lastDay));
}

/**
 * Turns the site's listing-date text ("Vandaag", "3 weken", "6+ maanden",
 * "12 januari 2024") into YYYY-MM-DD. Unrecognized text yields "na".
 */
export function cleanDateFormat(text: string, now: Date = new Date()): string {
  const t = normalizeText(text)
    .toLowerCase()
    .replace(/^aangeboden sinds\s+/, '')
    .replace(/\s+/g, ' ');

  if (t === 'vandaag') return formatYmd(now, '-');

  const rel = RELATIVE.exec(t);
  if (rel) {
    const n = Number(rel[1]);
    if (rel[2].startsWith('week')) {
      return formatYmd(new Date(now.getFullYear(), now.getMonth(), now.getDate() - 7 * n), '-');
    }
    return formatYmd(monthsBefore(now, n), '-');
  }

  const abs = ABSOLUTE.exec(t);
  if (abs) {
    const month = MONTHS[abs[2]];
    if (month === undefined) return NA;
    const day = Number(abs[1]);
    const d = new Date(Number(abs[3]), month, day);
    if (d.getDate() !== day || d.getMonth() !== month) return NA;
    return formatYmd(d, '-');
  }

  return NA;
}
