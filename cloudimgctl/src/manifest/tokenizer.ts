import path from "node:path";
import { isDigestOf } from "../integrity/checksum.js";
import type { ChecksumEntry, DigestAlgorithm, LineFormat } from "../types/manifest.js";

// SHA256 (AlmaLinux-9-GenericCloud-latest.x86_64.qcow2) = 6f1e...
const BSD_LINE_RE = /^(?<algo>[A-Za-z0-9-]+) \((?<file>.+)\) = (?<digest>[0-9A-Fa-f]+)$/;

function bsdAlgorithmName(algorithm: DigestAlgorithm): string {
  return algorithm.toUpperCase();
}

function tokenizeGnuLine(line: string): { digest: string; filename: string } | null {
  const sep = line.search(/\s/);
  if (sep === -1) return null;
  const digest = line.slice(0, sep);
  // Binary-mode marker: "<hex> *<file>"
  const filename = line.slice(sep).trimStart().replace(/^\*/, "");
  if (!filename) return null;
  return { digest, filename };
}

function tokenizeBsdLine(line: string, algorithm: DigestAlgorithm): { digest: string; filename: string } | null {
  const g = BSD_LINE_RE.exec(line)?.groups;
  if (!g?.algo || !g.file || !g.digest) return null;
  if (g.algo.replace("-", "").toUpperCase() !== bsdAlgorithmName(algorithm)) return null;
  return { digest: g.digest, filename: g.file };
}

/**
 * Split a checksum listing into typed (digest, filename) pairs, in manifest order.
 *
 * Blank lines, `#` comments, lines that do not fit `lineFormat` and digests that
 * are not the hex length `algorithm` produces are skipped. Digests are lowercased.
 * `path` is the listed name relative to the manifest (a leading `./` dropped);
 * `filename` is its basename, byte-for-byte.
 */
export function tokenizeManifest(text: string, lineFormat: LineFormat, algorithm: DigestAlgorithm): ChecksumEntry[] {
  const entries: ChecksumEntry[] = [];

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const token = lineFormat === "gnu" ? tokenizeGnuLine(line) : tokenizeBsdLine(line, algorithm);
    if (!token || !isDigestOf(algorithm, token.digest)) continue;

    const listed = token.filename.replace(/^(?:\.\/)+/, "");
    const filename = path.posix.basename(listed);
    if (!filename || filename === "." || filename === "..") continue;

    entries.push({ digest: token.digest.toLowerCase(), filename, path: listed });
  }

  return entries;
}
