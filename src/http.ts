export type FetchLike = typeof fetch;

export interface JsonRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Form-encoded body. */
  form?: Record<string, string>;
  /** Retries for transient errors (default: 3). */
  retries?: number;
  /** Base delay for exponential backoff in ms (default: 200). */
  backoffMs?: number;
  /** Optional request-per-second cap for this call (best-effort). */
  rps?: number;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string,
    public readonly responseText?: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

// Simple global limiter keyed by origin.
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

function isTransientStatus(status: number) {
  return status === 429 || status >= 500;
}

function encodeBody(opts: JsonRequestOptions): { body?: string; contentType?: string } {
  if (opts.form) return { body: new URLSearchParams(opts.form).toString(), contentType: 'application/x-www-form-urlencoded' };
  return {};
}

/**
 * Request a JSON document. Transient failures (429, 5xx, network) are retried
 * with exponential backoff, honoring `Retry-After`. The result is unvalidated;
 * callers parse it against a schema.
 */
export async function requestJson(url: string, opts: JsonRequestOptions = {}, fetcher: FetchLike = fetch): Promise<unknown> {
  const retries = opts.retries ?? 3;
  const backoffMs = opts.backoffMs ?? 200;
  const { body, contentType } = encodeBody(opts);

  let attempt = 0;
  for (;;) {
    attempt++;
    let res: Response;
    try {
      const envRps = process.env.TODOIST_SYNC_HTTP_RPS ? Number(process.env.TODOIST_SYNC_HTTP_RPS) : undefined;
      await throttle(url, opts.rps ?? envRps);

      res = await fetcher(url, {
        method: opts.method ?? 'GET',
        headers: {
          accept: 'application/json',
          ...(contentType ? { 'content-type': contentType } : {}),
          ...(opts.headers ?? {}),
        },
        body,
      });
    } catch (e) {
      // network errors
      if (attempt <= retries) {
        await sleep(backoffMs * 2 ** (attempt - 1));
        continue;
      }
      throw e;
    }

    if (!res.ok) {
      const txt = await res.text().catch(() => undefined);
      const retryAfterMs = parseRetryAfterMs(res.headers.get('retry-after'));
      if (attempt <= retries && isTransientStatus(res.status)) {
        await sleep(retryAfterMs ?? backoffMs * 2 ** (attempt - 1));
        continue;
      }
      throw new HttpError(`HTTP ${res.status} for ${url}`, res.status, url, txt, retryAfterMs);
    }

    if (res.status === 204) return undefined;
    const text = await res.text();
    if (!text) return undefined;
    return JSON.parse(text);
  }
}
