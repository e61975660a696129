/**
 * Thin fetch helpers shared by the quote sources. Connection pooling is left
 * to Node's global fetch (undici keeps sockets alive per origin).
 */

export const BROWSER_HEADERS = {
  Accept: "application/json,text/plain,*/*",
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36",
} as const;

export interface FetchWithTimeoutOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  /** Caller-side cancellation, combined with the timeout */
  signal?: AbortSignal;
}

export class HttpTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = "HttpTimeoutError";
  }
}

/**
 * GET `url` and abort when either the timeout elapses or the caller's signal fires.
 */
export async function fetchWithTimeout(
  url: string,
  options: FetchWithTimeoutOptions
): Promise<Response> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onCallerAbort = () => controller.abort();
  options.signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    return await fetch(url, {
      headers: { ...BROWSER_HEADERS, ...options.headers },
      signal: controller.signal,
    });
  } catch (err) {
    if (timedOut) throw new HttpTimeoutError(url, options.timeoutMs);
    throw err;
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onCallerAbort);
  }
}

/**
 * Decode a response body that the provider serves in GBK (Sina, Tencent).
 */
export async function readGbkText(res: Response): Promise<string> {
  const buffer = await res.arrayBuffer();
  return new TextDecoder("gbk").decode(buffer);
}

export function pickNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    if (Number.isFinite(n)) return n;
  }
  return null;
}

export function roundTo(value: number, precision: number): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}
