import type { JitterPolicy } from './types';

export const NA = 'na';

export const sleep = (ms: number) => new Promise<void>((res) => setTimeout(res, ms));

export function jitterMs({ minMs, maxMs }: JitterPolicy): number {
  if (maxMs <= minMs) return Math.max(minMs, 0);
  return Math.floor(minMs + Math.random() * (maxMs - minMs));
}

export async function jitter(policy: JitterPolicy): Promise<void> {
  const ms = jitterMs(policy);
  if (ms > 0) await sleep(ms);
}

// Strips embedded line breaks and surrounding whitespace.
export const normalizeText = (text: string): string =>
  text.replace(/[\r\n]/g, '').trim();

export const pad = (n: number) => String(n).padStart(2, '0');

export const formatYmd = (d: Date, sep = ''): string =>
  [d.getFullYear(), pad(d.getMonth() + 1), pad(d.getDate())].join(sep);
