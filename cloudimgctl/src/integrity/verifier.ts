import { IntegrityError } from "../errors.js";
import type { AcceptedPayload, RejectedPayload, UnverifiedPayload } from "../types/image.js";
import type { DigestAlgorithm } from "../types/manifest.js";
import { computeDigest } from "./checksum.js";

export function unverified(bytes: Buffer): UnverifiedPayload {
  return { state: "unverified", bytes };
}

/**
 * Thrown on mismatch. Carries the rejected payload so callers can inspect it,
 * but no writer accepts it.
 */
export class PayloadRejectedError extends IntegrityError {
  constructor(
    readonly payload: RejectedPayload,
    url?: string,
  ) {
    super(payload.algorithm, payload.expected, payload.computed, url);
  }
}

/**
 * IntegrityVerifier hashes fetched bytes with the algorithm the manifest was
 * published with and compares case-insensitively.
 */
export class IntegrityVerifier {
  verify(
    bytes: Buffer,
    expectedDigest: string,
    algorithm: DigestAlgorithm,
    url?: string,
  ): AcceptedPayload {
    const expected = expectedDigest.trim().toLowerCase();
    const computed = computeDigest(algorithm, bytes);

    if (computed !== expected) {
      throw new PayloadRejectedError(
        { state: "rejected", bytes, algorithm, expected, computed },
        url,
      );
    }
    return { state: "verified", bytes, algorithm, digest: computed };
  }
}
