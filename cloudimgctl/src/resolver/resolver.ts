import { NoMatchError } from "../errors.js";
import { tokenizeManifest } from "../manifest/tokenizer.js";
import { normalizeArch } from "../sources/arch.js";
import { hasVariant, parseImageFilename } from "../sources/conventions.js";
import type { ImageAsset, ImageRequest } from "../types/image.js";
import type {
  ArchConvention,
  ChecksumEntry,
  ChecksumManifest,
  FilenameConvention,
  ImageFilenameFields,
  ManifestSource,
} from "../types/manifest.js";

export type AssetCriteria = {
  variant: string;
  arch: string;
  format: string;
  version?: string;
};

/** Criteria with every field optional; an absent field matches anything. */
export type AssetFilter = Partial<AssetCriteria>;

export type ListedAsset = ImageAsset & { fields: ImageFilenameFields };

type Naming = Pick<ManifestSource, "filenameConvention" | "archConvention">;

/**
 * Turn a request into field criteria. The architecture is normalized to the
 * manifest's naming here, before any entry is compared.
 */
export function criteriaFor(request: ImageRequest, archConvention: ArchConvention): AssetCriteria {
  const criteria: AssetCriteria = {
    variant: request.variant,
    arch: normalizeArch(request.arch, archConvention),
    format: request.format,
  };
  return request.version ? { ...criteria, version: request.version } : criteria;
}

export function describeCriteria(criteria: AssetCriteria): string {
  const base = `variant=${criteria.variant} arch=${criteria.arch} format=${criteria.format}`;
  return criteria.version ? `${base} version=${criteria.version}` : base;
}

/**
 * Variant, arch and version compare ASCII case-insensitively; format compares
 * exactly. A version filter never matches a filename that carries no version.
 */
export function matchesFilter(
  convention: FilenameConvention,
  entry: { filename: string; fields: ImageFilenameFields },
  filter: AssetFilter,
): boolean {
  const { filename, fields } = entry;
  if (filter.variant !== undefined && !hasVariant(convention, filename, fields, filter.variant)) return false;
  if (filter.arch !== undefined && fields.arch.toLowerCase() !== filter.arch.toLowerCase()) return false;
  if (filter.format !== undefined && fields.format !== filter.format) return false;
  if (filter.version !== undefined && fields.version?.toLowerCase() !== filter.version.toLowerCase()) return false;
  return true;
}

function toAsset(manifest: ChecksumManifest, entry: ChecksumEntry): ImageAsset {
  return {
    url: `${manifest.baseUrl}${entry.path}`,
    digest: entry.digest,
    filename: entry.filename,
    algorithm: manifest.algorithm,
  };
}

/**
 * Pick the first manifest entry (in manifest order) whose filename satisfies
 * the request. Pure; throws NoMatchError when the combination is not published.
 */
export function resolveAsset(request: ImageRequest, manifest: ChecksumManifest, naming: Naming): ImageAsset {
  const criteria = criteriaFor(request, naming.archConvention);
  const entries = tokenizeManifest(manifest.text, manifest.lineFormat, manifest.algorithm);

  for (const entry of entries) {
    const fields = parseImageFilename(naming.filenameConvention, entry.filename);
    if (fields && matchesFilter(naming.filenameConvention, { filename: entry.filename, fields }, criteria)) {
      return toAsset(manifest, entry);
    }
  }

  throw new NoMatchError(manifest.url, describeCriteria(criteria), entries.length);
}

/** Every entry that parses as an image under the source's filename convention. */
export function listAssets(manifest: ChecksumManifest, naming: Naming): ListedAsset[] {
  const out: ListedAsset[] = [];
  for (const entry of tokenizeManifest(manifest.text, manifest.lineFormat, manifest.algorithm)) {
    const fields = parseImageFilename(naming.filenameConvention, entry.filename);
    if (fields) out.push({ ...toAsset(manifest, entry), fields });
  }
  return out;
}

/**
 * AssetResolver binds the resolution rules to one manifest source.
 */
export class AssetResolver {
  constructor(private readonly naming: Naming) {}

  resolve(request: ImageRequest, manifest: ChecksumManifest): ImageAsset {
    return resolveAsset(request, manifest, this.naming);
  }

  list(manifest: ChecksumManifest): ListedAsset[] {
    return listAssets(manifest, this.naming);
  }
}
