import { HttpError } from './errors';

export type FetchOptions = {
  headers: Record<string, string>;
  timeoutMs: number;
};

export async function fetchHtml(url: string, opts: FetchOptions): Promise<string> {
  const res = await fetch(url, {
    method: 'GET',
    headers: opts.headers,
    signal: AbortSignal.timeout(opts.timeoutMs),
  });
  if (!res.ok) {
    // Release the connection; undici holds it until the body is consumed.
    await res.body?.cancel();
    throw new HttpError(url, res.status);
  }
  return res.text();
}
