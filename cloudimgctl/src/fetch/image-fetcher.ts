import { httpGet, readBody, type HttpOptions, type RequestOptions } from "./http.js";

/**
 * ImageFetcher buffers the whole asset in memory. Nothing is written to disk
 * here; persistence happens only after verification.
 */
export class ImageFetcher {
  constructor(private readonly http: HttpOptions = {}) {}

  async fetch(url: string, opts: RequestOptions = {}): Promise<Buffer> {
    const res = await httpGet(url, this.http, opts);
    const body = await readBody(url, () => res.arrayBuffer(), opts);
    return Buffer.from(body);
  }
}
