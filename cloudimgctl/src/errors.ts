import type { DigestAlgorithm } from "./types/manifest.js";
import type { PayloadState } from "./types/image.js";

export type ErrorCode =
  | "NETWORK_ERROR"
  | "EMPTY_MANIFEST"
  | "NO_MATCH"
  | "INTEGRITY_ERROR"
  | "INVARIANT_VIOLATION";

/**
 * Base class for every failure the resolution pipeline raises.
 * `retryable` is a hint for the orchestrating layer; the core itself never retries.
 */
export abstract class CloudImgError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport failure or non-success HTTP status. */
export class NetworkError extends CloudImgError {
  readonly code = "NETWORK_ERROR";
  readonly retryable = true;

  constructor(
    readonly url: string,
    readonly status: number | null,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`GET ${url} failed: ${detail}`, options);
  }
}

export class EmptyManifestError extends CloudImgError {
  readonly code = "EMPTY_MANIFEST";
  readonly retryable = false;

  constructor(readonly url: string) {
    super(`Checksum manifest at ${url} is empty`);
  }
}

/** The requested combination does not exist for this release. Not a bug. */
export class NoMatchError extends CloudImgError {
  readonly code = "NO_MATCH";
  readonly retryable = false;

  constructor(
    readonly manifestUrl: string,
    readonly criteria: string,
    readonly entriesScanned: number,
  ) {
    super(`No image matching ${criteria} in ${manifestUrl} (${entriesScanned} entries scanned)`);
  }
}

export class IntegrityError extends CloudImgError {
  readonly code = "INTEGRITY_ERROR";
  readonly retryable = false;

  constructor(
    readonly algorithm: DigestAlgorithm,
    readonly expected: string,
    readonly computed: string,
    /** URL or file the bytes came from. */
    readonly location?: string,
  ) {
    super(
      `${algorithm} mismatch${location ? ` for ${location}` : ""}: expected ${expected}, computed ${computed}`,
    );
  }
}

/** Internal contract breach. Always a caller or implementation bug. */
export class InvariantViolation extends CloudImgError {
  readonly code = "INVARIANT_VIOLATION";
  readonly retryable = false;

  constructor(
    message: string,
    readonly state?: PayloadState,
  ) {
    super(message);
  }
}

export function isCloudImgError(err: unknown): err is CloudImgError {
  return err instanceof CloudImgError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
