import { NetworkError, errorMessage } from "../errors.js";

/** The subset of the platform `fetch` the fetchers use. Tests pass an in-process fake. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type HttpOptions = {
  fetchImpl?: FetchLike;
  userAgent?: string;
};

export type RequestOptions = {
  signal?: AbortSignal;
};

export const DEFAULT_USER_AGENT = "cloudimgctl/0.1.0";

/**
 * Single GET attempt. Transport failures and non-2xx statuses become
 * NetworkError; an abort from the caller's signal is rethrown as-is.
 */
export async function httpGet(url: string, http: HttpOptions, opts: RequestOptions = {}): Promise<Response> {
  const fetchImpl = http.fetchImpl ?? fetch;
  let res: Response;
  try {
    res = await fetchImpl(url, {
      method: "GET",
      headers: { "User-Agent": http.userAgent ?? DEFAULT_USER_AGENT },
      redirect: "follow",
      signal: opts.signal,
    });
  } catch (err) {
    if (opts.signal?.aborted) throw opts.signal.reason;
    throw new NetworkError(url, null, errorMessage(err), { cause: err });
  }

  if (!res.ok) {
    // Release the connection; the body of an error page is not needed.
    await res.body?.cancel();
    throw new NetworkError(url, res.status, `HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ""}`);
  }
  return res;
}

/** Read a response body, mapping mid-body transport failures to NetworkError. */
export async function readBody<T>(url: string, read: () => Promise<T>, opts: RequestOptions = {}): Promise<T> {
  try {
    return await read();
  } catch (err) {
    if (opts.signal?.aborted) throw opts.signal.reason;
    throw new NetworkError(url, null, `body read failed: ${errorMessage(err)}`, { cause: err });
  }
}
