import { ImageFetcher } from "../fetch/image-fetcher.js";
import type { FetchLike } from "../fetch/http.js";
import { IntegrityVerifier } from "../integrity/verifier.js";
import { diag, silentLogger, type Logger } from "../log/diagnostics.js";
import { ManifestFetcher } from "../manifest/fetcher.js";
import { destinationPath } from "../persist/safe-path.js";
import { PersistenceWriter } from "../persist/writer.js";
import { AssetResolver } from "../resolver/resolver.js";
import { baseUrlFor } from "../sources/registry.js";
import type { Destination, ImageAsset, ImageRequest } from "../types/image.js";
import type { ChecksumManifest, ManifestSource } from "../types/manifest.js";

export type PipelineOptions = {
  source: ManifestSource;
  fetchImpl?: FetchLike;
  userAgent?: string;
  signal?: AbortSignal;
  logger?: Logger;
};

export type ResolveResult = {
  manifest: ChecksumManifest;
  asset: ImageAsset;
};

export type RetrieveResult = {
  asset: ImageAsset;
  path: string;
  bytes: number;
};

/**
 * Manifest fetch + resolution, without touching the asset itself.
 */
export async function resolveImage(request: ImageRequest, opts: PipelineOptions): Promise<ResolveResult> {
  const logger = opts.logger ?? silentLogger;
  const http = { fetchImpl: opts.fetchImpl, userAgent: opts.userAgent };

  const manifest = await new ManifestFetcher(opts.source, http).fetch(baseUrlFor(opts.source, request), {
    signal: opts.signal,
  });
  logger.log(diag("info", "MANIFEST_FETCHED", `Fetched ${manifest.url}`, { url: manifest.url }));

  const asset = new AssetResolver(opts.source).resolve(request, manifest);
  logger.log(
    diag("info", "ASSET_RESOLVED", `Resolved ${asset.filename}`, {
      url: asset.url,
      digest: asset.digest,
      algorithm: asset.algorithm,
    }),
  );

  return { manifest, asset };
}

/**
 * Full pipeline: manifest → asset → bytes → digest check → atomic write.
 *
 * Every call starts from scratch; nothing from a previous run is trusted.
 * Any failure leaves the destination path as it was.
 */
export async function retrieveImage(
  request: ImageRequest,
  destination: Destination,
  opts: PipelineOptions,
): Promise<RetrieveResult> {
  const logger = opts.logger ?? silentLogger;
  const { asset } = await resolveImage(request, opts);
  const target = destinationPath(destination.dir, destination.filename ?? asset.filename);

  const bytes = await new ImageFetcher({ fetchImpl: opts.fetchImpl, userAgent: opts.userAgent }).fetch(asset.url, {
    signal: opts.signal,
  });
  logger.log(diag("info", "IMAGE_FETCHED", `Fetched ${bytes.length} bytes from ${asset.url}`, { bytes: bytes.length }));

  const payload = new IntegrityVerifier().verify(bytes, asset.digest, asset.algorithm, asset.url);
  logger.log(diag("info", "PAYLOAD_VERIFIED", `${asset.algorithm} ${payload.digest} OK`, { digest: payload.digest }));

  const written = await new PersistenceWriter().write(payload, target, { signal: opts.signal });
  logger.log(diag("info", "IMAGE_WRITTEN", `Wrote ${written}`, { path: written }));

  return { asset, path: written, bytes: bytes.length };
}
