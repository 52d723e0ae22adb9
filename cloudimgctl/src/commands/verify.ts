import fs from "node:fs";
import { IntegrityError } from "../errors.js";
import { computeFileDigest, isDigestOf } from "../integrity/checksum.js";
import { DIGEST_ALGORITHMS, type DigestAlgorithm } from "../types/manifest.js";
import { failure, failureFromError, type CommandFailure } from "./common.js";

export type VerifyFileResult = { ok: true; algorithm: DigestAlgorithm; digest: string } | CommandFailure;

export function isDigestAlgorithm(value: string): value is DigestAlgorithm {
  return DIGEST_ALGORITHMS.some((a) => a === value);
}

/**
 * Check a file already on disk against an expected digest.
 */
export async function verifyFile(filePath: string, expected: string, algorithm: string): Promise<VerifyFileResult> {
  const algo = algorithm.toLowerCase();
  if (!isDigestAlgorithm(algo)) {
    return failure("INVALID_ARGS", `Unsupported algorithm '${algorithm}'. Use one of: ${DIGEST_ALGORITHMS.join(", ")}`);
  }
  const want = expected.trim().toLowerCase();
  if (!isDigestOf(algo, want)) {
    return failure("INVALID_ARGS", `'${expected}' is not a ${algo} digest`);
  }
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    return failure("FILE_MISSING", `File not found: ${filePath}`);
  }

  try {
    const computed = await computeFileDigest(algo, filePath);
    if (computed !== want) {
      return failureFromError(new IntegrityError(algo, want, computed, filePath));
    }
    return { ok: true, algorithm: algo, digest: computed };
  } catch (e) {
    return failureFromError(e);
  }
}
