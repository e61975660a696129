import { HttpTimeoutError, fetchWithTimeout } from "../../util/http";
import { errorMessage } from "../../util/errors";
import { SourceError, kindForStatus } from "../errors";

/**
 * GET a provider URL and translate transport failures into `SourceError`.
 * Non-2xx responses are classified by status; network and abort errors are
 * transient.
 */
export async function requestProvider(
  sourceId: string,
  url: string,
  options: {
    timeoutMs: number;
    signal?: AbortSignal;
    headers?: Record<string, string>;
  }
): Promise<Response> {
  let res: Response;
  try {
    res = await fetchWithTimeout(url, options);
  } catch (err) {
    const message =
      err instanceof HttpTimeoutError
        ? err.message
        : `Request failed: ${errorMessage(err)}`;
    throw new SourceError(sourceId, "TRANSIENT", message, { cause: err });
  }
  if (!res.ok) {
    throw new SourceError(
      sourceId,
      kindForStatus(res.status),
      `HTTP ${res.status} from ${sourceId}`,
      { status: res.status }
    );
  }
  return res;
}

/**
 * Read a body and turn decode failures into a transient error (truncated
 * connections surface here).
 */
export async function readBody<T>(
  sourceId: string,
  read: () => Promise<T>
): Promise<T> {
  try {
    return await read();
  } catch (err) {
    throw new SourceError(
      sourceId,
      "TRANSIENT",
      `Failed to read response body: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

export function malformed(sourceId: string, detail: string): SourceError {
  return new SourceError(sourceId, "PERMANENT", `Malformed payload: ${detail}`);
}

/**
 * "20240612150003" or "2024-06-12 15:00:03" or "2024/06/12 16:08:03" in
 * exchange local time (UTC+8) to ISO8601.
 */
export function chinaTimeToIso(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const compact = value.match(/^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/);
  const spaced = value.match(
    /^(\d{4})[-/](\d{2})[-/](\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/
  );
  const m = compact ?? spaced;
  if (!m) return undefined;
  const iso = `${m[1]}-${m[2]}-${m[3]}T${m[4]}:${m[5]}:${m[6]}+08:00`;
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

export function optionalNumber(value: number | null): number | undefined {
  return value === null ? undefined : value;
}
