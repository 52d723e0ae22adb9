import { minimatch } from "minimatch";
import { ManifestFetcher } from "../manifest/fetcher.js";
import { AssetResolver, matchesFilter, type ListedAsset } from "../resolver/resolver.js";
import { normalizeArch } from "../sources/arch.js";
import { baseUrlFor } from "../sources/registry.js";
import {
  deadline,
  failureFromError,
  openSource,
  type CommandFailure,
  type ConfigOptions,
  type NetworkOptions,
} from "./common.js";

export type ListFilters = {
  arch: string;
  variant?: string;
  format?: string;
  /** Build selector such as "latest" or "9.4-20240513". */
  version?: string;
  /** Glob matched against the asset filename. */
  match?: string;
};

export type ListResult = { ok: true; manifestUrl: string; assets: ListedAsset[] } | CommandFailure;

/**
 * List every image a release's manifest publishes for one architecture,
 * optionally narrowed by variant, format, version or filename glob.
 */
export async function listImages(
  distro: string,
  release: string,
  filters: ListFilters,
  opts: ConfigOptions & NetworkOptions,
): Promise<ListResult> {
  const ctx = openSource(opts, distro);
  if (!ctx.ok) return ctx;
  const { source } = ctx;

  try {
    const manifest = await new ManifestFetcher(source, {
      fetchImpl: opts.fetchImpl,
      userAgent: ctx.config.user_agent,
    }).fetch(baseUrlFor(source, { release, arch: filters.arch }), { signal: deadline(opts.timeoutMs) });

    const filter = {
      arch: normalizeArch(filters.arch, source.archConvention),
      variant: filters.variant || undefined,
      format: filters.format || undefined,
      version: filters.version || undefined,
    };
    const assets = new AssetResolver(source)
      .list(manifest)
      .filter((a) => matchesFilter(source.filenameConvention, a, filter))
      .filter((a) => !filters.match || minimatch(a.filename, filters.match, { nocase: true }));

    return { ok: true, manifestUrl: manifest.url, assets };
  } catch (e) {
    return failureFromError(e);
  }
}
