import { createHash } from "node:crypto";
import fs from "node:fs";
import type { DigestAlgorithm } from "../types/manifest.js";

/** Hex length of each supported digest. */
export const DIGEST_HEX_LENGTH: Record<DigestAlgorithm, number> = {
  md5: 32,
  sha1: 40,
  sha256: 64,
  sha512: 128,
};

/** Compute a hex digest of a string/buffer. */
export function computeDigest(algorithm: DigestAlgorithm, content: string | Uint8Array): string {
  return createHash(algorithm).update(content).digest("hex");
}

/** Compute a hex digest of a file, streaming it from disk. */
export function computeFileDigest(algorithm: DigestAlgorithm, filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash(algorithm);
    const rs = fs.createReadStream(filePath);
    rs.on("error", reject);
    rs.on("data", (chunk) => hash.update(chunk));
    rs.on("end", () => resolve(hash.digest("hex")));
  });
}

/** True when `value` is hex of exactly the length `algorithm` produces. */
export function isDigestOf(algorithm: DigestAlgorithm, value: string): boolean {
  return value.length === DIGEST_HEX_LENGTH[algorithm] && /^[0-9a-f]+$/i.test(value);
}
