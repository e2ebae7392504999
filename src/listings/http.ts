import fetch, { RequestInit, Response } from 'node-fetch';
import { gerr } from '../log';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type FetchFailure =
  | { ok: false; reason: 'network'; message: string }
  | { ok: false; reason: 'status'; status: number; message: string }
  | { ok: false; reason: 'decode'; message: string };

export type FetchResult<T> = { ok: true; value: T } | FetchFailure;

export type HttpOptions = {
  userAgent: string;
  fetchImpl?: FetchLike;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Single attempt, transport defaults for timeout and redirects.
export async function getJson(url: string, opts: HttpOptions): Promise<FetchResult<unknown>> {
  const doFetch = opts.fetchImpl || fetch;
  let body: string;
  try {
    const res = await doFetch(url, { headers: { 'User-Agent': opts.userAgent } });
    if (!res.ok) {
      const message = `HTTP ${res.status} ${res.statusText}`.trim();
      gerr(`fetching ${url}: ${message}`);
      return { ok: false, reason: 'status', status: res.status, message };
    }
    body = await res.text();
  } catch (e) {
    const message = errorMessage(e);
    gerr(`fetching ${url}: ${message}`);
    return { ok: false, reason: 'network', message };
  }
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch (e) {
    const message = errorMessage(e);
    gerr(`decoding JSON from ${url}: ${message}`);
    return { ok: false, reason: 'decode', message };
  }
}
