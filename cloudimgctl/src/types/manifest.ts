/** Upstream checksum manifests and the sources that publish them. */
export const DIGEST_ALGORITHMS = ["md5", "sha1", "sha256", "sha512"] as const;

export type DigestAlgorithm = (typeof DIGEST_ALGORITHMS)[number];

/** `gnu`: `<hex>  [*]<file>` (coreutils). `bsd`: `SHA256 (<file>) = <hex>`. */
export type LineFormat = "gnu" | "bsd";

export type FilenameConvention = "debian" | "ubuntu" | "almalinux" | "generic";

/** `deb` names architectures amd64/arm64, `rpm` names them x86_64/aarch64. */
export type ArchConvention = "deb" | "rpm";

export type ChecksumEntry = {
  readonly digest: string;
  /** Basename of the listed file. */
  readonly filename: string;
  /** Listed location relative to the manifest, e.g. `images/a.qcow2`. */
  readonly path: string;
};

export type ChecksumManifest = {
  /** URL the listing was read from. */
  readonly url: string;
  /** Release-scoped base location; asset URLs are `baseUrl + path`. */
  readonly baseUrl: string;
  readonly text: string;
  readonly algorithm: DigestAlgorithm;
  readonly lineFormat: LineFormat;
};

export type ImageFilenameFields = {
  readonly variant: string;
  readonly arch: string;
  readonly format: string;
  readonly version?: string;
};

export type ManifestSource = {
  readonly distro: string;
  /** Base URL with `{release}` and optionally `{arch}` placeholders. */
  readonly urlTemplate: string;
  readonly checksumFile: string;
  readonly algorithm: DigestAlgorithm;
  readonly lineFormat: LineFormat;
  readonly filenameConvention: FilenameConvention;
  readonly archConvention: ArchConvention;
};
