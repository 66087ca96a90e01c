export type FetchLike = typeof fetch;

export type QueryValue = string | number | boolean | undefined;

export interface RetryInfo {
  url: string;
  /** The attempt that failed, from 1. */
  attempt: number;
  waitMs: number;
  /** HTTP status, absent for network failures. */
  status?: number;
  error?: unknown;
}

export interface JsonRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  headers?: Record<string, string>;
  query?: Record<string, QueryValue>;
  body?: unknown;
  /** Retries for transient errors (default: 3). */
  retries?: number;
  /** Base delay for exponential backoff in ms (default: 200). */
  backoffMs?: number;
  /** Request-per-second cap per origin (best-effort). */
  rps?: number;
  /** Called before each retry sleep. */
  onRetry?: (retry: RetryInfo) => void;
}

export class HttpError extends Error {
  override readonly name = 'HttpError';

  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string,
    public readonly responseText?: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
  }
}

function withQuery(url: string, query?: JsonRequestOptions['query']) {
  if (!query) return url;
  const u = new URL(url);
  for (const [k, v] of Object.entries(query)) {
    if (v === undefined) continue;
    u.searchParams.set(k, String(v));
  }
  return u.toString();
}

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

// Keyed by origin so both services get their own budget.
const lastRequestAt = new Map<string, number>();

function originOf(url: string) {
  try {
    return new URL(url).origin;
  } catch {
    return 'unknown';
  }
}

async function throttle(url: string, rps?: number) {
  if (!rps || rps <= 0) return;
  const minGap = 1000 / rps;
  const key = originOf(url);
  const last = lastRequestAt.get(key) ?? 0;
  const wait = last + minGap - Date.now();
  if (wait > 0) await sleep(wait);
  lastRequestAt.set(key, Date.now());
}

function parseRetryAfterMs(v: string | null): number | undefined {
  if (!v) return undefined;
  const sec = Number(v);
  if (Number.isFinite(sec) && sec >= 0) return sec * 1000;
  const at = Date.parse(v);
  if (Number.isFinite(at)) return Math.max(0, at - Date.now());
  return undefined;
}

export function isTransientStatus(status: number) {
  return status === 429 || status >= 500;
}

/**
 * JSON over fetch with retry on 429/5xx and network failures.
 * Resolves `undefined` for empty bodies (204, DELETE).
 */
export async function requestJson<T>(
  url: string,
  opts: JsonRequestOptions = {},
  fetcher: FetchLike = fetch,
): Promise<T | undefined> {
  const finalUrl = withQuery(url, opts.query);
  const retries = opts.retries ?? 3;
  const backoffMs = opts.backoffMs ?? 200;
  const hasBody = opts.body !== undefined;

  for (let attempt = 1; ; attempt++) {
    let res: Response;
    try {
      await throttle(finalUrl, opts.rps);
      res = await fetcher(finalUrl, {
        method: opts.method ?? 'GET',
        headers: {
          accept: 'application/json',
          ...(hasBody ? { 'content-type': 'application/json' } : {}),
          ...(opts.headers ?? {}),
        },
        body: hasBody ? JSON.stringify(opts.body) : undefined,
      });
    } catch (e) {
      // network failure
      if (attempt <= retries) {
        const waitMs = backoffMs * 2 ** (attempt - 1);
        opts.onRetry?.({ url: finalUrl, attempt, waitMs, error: e });
        await sleep(waitMs);
        continue;
      }
      throw e;
    }

    if (!res.ok) {
      const txt = await res.text().catch(() => undefined);
      const retryAfterMs = parseRetryAfterMs(res.headers.get('retry-after'));
      if (attempt <= retries && isTransientStatus(res.status)) {
        const waitMs = retryAfterMs ?? backoffMs * 2 ** (attempt - 1);
        opts.onRetry?.({ url: finalUrl, attempt, waitMs, status: res.status });
        await sleep(waitMs);
        continue;
      }
      throw new HttpError(`HTTP ${res.status} for ${finalUrl}`, res.status, finalUrl, txt, retryAfterMs);
    }

    if (res.status === 204) return undefined;
    const text = await res.text();
    if (!text) return undefined;
    const parsed: T = JSON.parse(text);
    return parsed;
  }
}

/** requestJson for endpoints that always answer with a body. */
export async function requestJsonBody<T>(url: string, opts: JsonRequestOptions = {}, fetcher: FetchLike = fetch): Promise<T> {
  const res = await requestJson<T>(url, opts, fetcher);
  if (res === undefined) throw new HttpError(`Empty response body for ${url}`, 502, url);
  return res;
}
