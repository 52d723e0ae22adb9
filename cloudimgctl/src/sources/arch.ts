import type { ArchConvention } from "../types/manifest.js";

/** Equivalent architecture tokens, keyed by the name each convention uses. */
const ARCH_ALIASES: Record<ArchConvention, Record<string, string>> = {
  deb: { x86_64: "amd64", aarch64: "arm64", ppc64le: "ppc64el", armv7l: "armhf" },
  rpm: { amd64: "x86_64", arm64: "aarch64", ppc64el: "ppc64le", armhf: "armv7l" },
};

/**
 * Map an architecture token onto the naming a manifest uses.
 * Unknown tokens pass through unchanged.
 */
export function normalizeArch(arch: string, convention: ArchConvention): string {
  const token = arch.trim().toLowerCase();
  return ARCH_ALIASES[convention][token] ?? token;
}
