import type { CloudImgConfig, RepositoryConfig } from "../types/config.js";
import type { ImageRequest } from "../types/image.js";
import type { ManifestSource } from "../types/manifest.js";
import { normalizeArch } from "./arch.js";

/** Build a typed manifest source from one `repositories.<distro>` config entry. */
export function sourceFromConfig(distro: string, repo: RepositoryConfig): ManifestSource {
  if (!repo.url.includes("{release}")) {
    throw new Error(`repository URL for ${distro} must contain a '{release}' placeholder: ${repo.url}`);
  }
  return {
    distro,
    urlTemplate: repo.url,
    checksumFile: repo.checksum_file,
    algorithm: repo.algorithm,
    lineFormat: repo.line_format,
    filenameConvention: repo.filename_convention,
    archConvention: repo.arch_convention,
  };
}

/**
 * Release-scoped base URL for a request, always ending in `/`.
 * `{arch}` is filled with the architecture as the source names it.
 */
export function baseUrlFor(source: ManifestSource, request: Pick<ImageRequest, "release" | "arch">): string {
  const url = source.urlTemplate
    .replaceAll("{release}", encodeURIComponent(request.release))
    .replaceAll("{arch}", encodeURIComponent(normalizeArch(request.arch, source.archConvention)));
  return url.endsWith("/") ? url : `${url}/`;
}

/**
 * The configured distributions, keyed by distro name.
 */
export class SourceRegistry {
  private readonly sources = new Map<string, ManifestSource>();

  constructor(config: CloudImgConfig) {
    for (const [distro, repo] of Object.entries(config.repositories)) {
      this.sources.set(distro.toLowerCase(), sourceFromConfig(distro.toLowerCase(), repo));
    }
  }

  get(distro: string): ManifestSource | undefined {
    return this.sources.get(distro.toLowerCase());
  }

  /** List all registered distro names. */
  names(): string[] {
    return [...this.sources.keys()].sort();
  }

  all(): ManifestSource[] {
    return this.names().flatMap((name) => {
      const source = this.sources.get(name);
      return source ? [source] : [];
    });
  }
}
