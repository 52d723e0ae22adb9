import type { FilenameConvention, ImageFilenameFields } from "../types/manifest.js";

// debian-12-genericcloud-amd64.qcow2
const DEBIAN_RE = /^debian-(?<version>\d+)-(?<variant>[a-z0-9]+)-(?<arch>[a-z0-9_]+)\.(?<format>[a-z0-9.]+)$/i;

// ubuntu-24.04-server-cloudimg-amd64.img (release), noble-server-cloudimg-amd64.img (daily)
const UBUNTU_RE =
  /^(?:ubuntu-(?<version>\d+\.\d+)|(?<codename>[a-z]+))-(?<variant>[a-z0-9-]+?)-(?<arch>amd64|arm64|armhf|i386|ppc64el|riscv64|s390x)\.(?<format>[a-z0-9.]+)$/i;

// AlmaLinux-9-GenericCloud-9.4-20240513.x86_64.qcow2
const ALMALINUX_RE =
  /^AlmaLinux-(?<major>\d+)-(?<variant>[A-Za-z0-9-]+?)-(?<version>latest|[0-9][A-Za-z0-9.-]*)\.(?<arch>[A-Za-z0-9_]+)\.(?<format>.+)$/;

// <name>-<variant>-<arch>.<ext>
const GENERIC_RE = /^(?<name>.+)-(?<variant>[^-]+)-(?<arch>[^-.]+)\.(?<format>.+)$/;

function fields(match: RegExpExecArray | null): ImageFilenameFields | null {
  const g = match?.groups;
  if (!g || !g.variant || !g.arch || !g.format) return null;
  return { variant: g.variant, arch: g.arch, format: g.format, version: g.version };
}

// Metadata, checksum and signature files listed next to the images share their name stem.
const COMPANION_FORMAT_RE = /(?:^|\.)(?:json|sig|asc|gpg|checksum|manifest|sha256|sha512)$/i;

function imageFields(match: RegExpExecArray | null): ImageFilenameFields | null {
  const parsed = fields(match);
  if (!parsed || COMPANION_FORMAT_RE.test(parsed.format)) return null;
  return parsed;
}

/** Split an asset filename into its filterable fields, or null when it is not an image. */
export function parseImageFilename(
  convention: FilenameConvention,
  filename: string,
): ImageFilenameFields | null {
  switch (convention) {
    case "debian":
      return imageFields(DEBIAN_RE.exec(filename));
    case "ubuntu":
      return imageFields(UBUNTU_RE.exec(filename));
    case "almalinux":
      return imageFields(ALMALINUX_RE.exec(filename));
    case "generic":
      return imageFields(GENERIC_RE.exec(filename));
  }
}

/**
 * Whether a parsed filename carries `variant`. Generic names are
 * `<name>-<variant>-<arch>.<format>` where both name and variant may contain
 * hyphens, so the requested variant is matched as the tail before the arch
 * instead of trusting the parsed split.
 */
export function hasVariant(
  convention: FilenameConvention,
  filename: string,
  fields: ImageFilenameFields,
  variant: string,
): boolean {
  const want = variant.toLowerCase();
  if (convention !== "generic") return fields.variant.toLowerCase() === want;

  const stem = filename.slice(0, filename.length - fields.format.length - fields.arch.length - 2).toLowerCase();
  return stem.length > want.length + 1 && stem.endsWith(`-${want}`);
}
