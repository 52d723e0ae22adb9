import { EmptyManifestError } from "../errors.js";
import { httpGet, readBody, type HttpOptions, type RequestOptions } from "../fetch/http.js";
import type { ChecksumManifest, ManifestSource } from "../types/manifest.js";

/**
 * ManifestFetcher: reads the plaintext digest listing for one release.
 * One attempt per call; retry is the caller's decision.
 */
export class ManifestFetcher {
  constructor(
    private readonly source: Pick<ManifestSource, "checksumFile" | "algorithm" | "lineFormat">,
    private readonly http: HttpOptions = {},
  ) {}

  async fetch(baseUrl: string, opts: RequestOptions = {}): Promise<ChecksumManifest> {
    const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
    const url = `${base}${this.source.checksumFile}`;

    const res = await httpGet(url, this.http, opts);
    const text = await readBody(url, () => res.text(), opts);

    if (text.trim().length === 0) {
      throw new EmptyManifestError(url);
    }

    return {
      url,
      baseUrl: base,
      text,
      algorithm: this.source.algorithm,
      lineFormat: this.source.lineFormat,
    };
  }
}
