import type { DigestAlgorithm } from "./manifest.js";

/** What the caller wants. All fields are normalized by the caller; nothing here is defaulted. */
export type ImageRequest = {
  readonly distro: string;
  /** Codename ("bookworm", "noble") or major version ("9"). */
  readonly release: string;
  readonly arch: string;
  /** Build flavor, e.g. "genericcloud", "nocloud", "GenericCloud". */
  readonly variant: string;
  /** File extension without the leading dot, e.g. "qcow2", "raw", "img". */
  readonly format: string;
  /**
   * Optional build selector, matched against the version a filename carries:
   * "latest" or "9.4-20240513" for AlmaLinux, "24.04" for Ubuntu releases, "12" for Debian.
   */
  readonly version?: string;
};

export type ImageAsset = {
  readonly url: string;
  /** Expected digest, lowercase hex. */
  readonly digest: string;
  readonly filename: string;
  readonly algorithm: DigestAlgorithm;
};

export type PayloadState = "unverified" | "verified" | "rejected";

export type UnverifiedPayload = {
  readonly state: "unverified";
  readonly bytes: Buffer;
};

export type AcceptedPayload = {
  readonly state: "verified";
  readonly bytes: Buffer;
  readonly algorithm: DigestAlgorithm;
  readonly digest: string;
};

export type RejectedPayload = {
  readonly state: "rejected";
  readonly bytes: Buffer;
  readonly algorithm: DigestAlgorithm;
  readonly expected: string;
  readonly computed: string;
};

export type VerifiedPayload = UnverifiedPayload | AcceptedPayload | RejectedPayload;

/** Where the verified image lands. `filename` defaults to the asset's own name. */
export type Destination = {
  dir: string;
  filename?: string;
};
