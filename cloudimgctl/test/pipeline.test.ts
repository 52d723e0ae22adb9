import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { retrieveImage, resolveImage } from "../src/core/pipeline.js";
import { IntegrityError, InvariantViolation, NoMatchError } from "../src/errors.js";
import { computeDigest } from "../src/integrity/checksum.js";
import type { Diagnostic, Logger } from "../src/log/diagnostics.js";
import type { FetchLike } from "../src/fetch/http.js";
import type { ImageRequest } from "../src/types/image.js";
import type { ManifestSource } from "../src/types/manifest.js";
import { fakeFetch } from "./fake-http.js";

const SAMPLE: ManifestSource = {
  distro: "sample",
  urlTemplate: "https://mirror.test/sample/{release}/",
  checksumFile: "MD5SUMS",
  algorithm: "md5",
  lineFormat: "gnu",
  filenameConvention: "generic",
  archConvention: "deb",
};
const SAMPLE_BASE = "https://mirror.test/sample/1/";
const SAMPLE_SUMS = "d41d8cd98f00b204e9800998ecf8427e  sample-generic-amd64.qcow2\n";
const SAMPLE_REQUEST: ImageRequest = { distro: "sample", release: "1", arch: "amd64", variant: "generic", format: "qcow2" };
const SAMPLE_IMAGE_URL = `${SAMPLE_BASE}sample-generic-amd64.qcow2`;

const DEBIAN: ManifestSource = {
  distro: "debian",
  urlTemplate: "https://mirror.test/debian/{release}/latest",
  checksumFile: "SHA512SUMS",
  algorithm: "sha512",
  lineFormat: "gnu",
  filenameConvention: "debian",
  archConvention: "deb",
};

function recorder(): Logger & { events: Diagnostic[] } {
  const events: Diagnostic[] = [];
  return { events, log: (d) => events.push(d) };
}

describe("retrieveImage", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "cloudimg-pipeline-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes zero bytes verified against the empty-input digest", async () => {
    const fetchImpl = fakeFetch({
      [`${SAMPLE_BASE}MD5SUMS`]: { body: SAMPLE_SUMS },
      [SAMPLE_IMAGE_URL]: { body: "" },
    });
    const logger = recorder();

    const res = await retrieveImage(SAMPLE_REQUEST, { dir: tmpDir }, { source: SAMPLE, fetchImpl, logger });

    expect(res.asset).toEqual({
      url: SAMPLE_IMAGE_URL,
      digest: "d41d8cd98f00b204e9800998ecf8427e",
      filename: "sample-generic-amd64.qcow2",
      algorithm: "md5",
    });
    expect(res.path).toBe(path.join(tmpDir, "sample-generic-amd64.qcow2"));
    expect(res.bytes).toBe(0);
    expect(fs.readFileSync(res.path).length).toBe(0);
    expect(logger.events.map((e) => e.code)).toEqual([
      "MANIFEST_FETCHED",
      "ASSET_RESOLVED",
      "IMAGE_FETCHED",
      "PAYLOAD_VERIFIED",
      "IMAGE_WRITTEN",
    ]);
  });

  it("writes a ./-prefixed manifest entry under its basename", async () => {
    const fetchImpl = fakeFetch({
      [`${SAMPLE_BASE}MD5SUMS`]: { body: "d41d8cd98f00b204e9800998ecf8427e  ./sample-generic-amd64.qcow2\n" },
      [SAMPLE_IMAGE_URL]: { body: "" },
    });

    const res = await retrieveImage(SAMPLE_REQUEST, { dir: tmpDir }, { source: SAMPLE, fetchImpl });

    expect(res.asset.filename).toBe("sample-generic-amd64.qcow2");
    expect(res.asset.url).toBe(SAMPLE_IMAGE_URL);
    expect(res.path).toBe(path.join(tmpDir, "sample-generic-amd64.qcow2"));
  });

  it("rejects a non-empty payload against the empty-input digest and writes nothing", async () => {
    const fetchImpl = fakeFetch({
      [`${SAMPLE_BASE}MD5SUMS`]: { body: SAMPLE_SUMS },
      [SAMPLE_IMAGE_URL]: { body: "tampered" },
    });

    const err = await retrieveImage(SAMPLE_REQUEST, { dir: tmpDir }, { source: SAMPLE, fetchImpl }).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(IntegrityError);
    if (!(err instanceof IntegrityError)) return;
    expect(err.expected).toBe("d41d8cd98f00b204e9800998ecf8427e");
    expect(err.computed).toBe(computeDigest("md5", "tampered"));
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it("keeps an existing destination untouched when verification fails", async () => {
    const dest = path.join(tmpDir, "sample-generic-amd64.qcow2");
    fs.writeFileSync(dest, "known good");
    const fetchImpl = fakeFetch({
      [`${SAMPLE_BASE}MD5SUMS`]: { body: SAMPLE_SUMS },
      [SAMPLE_IMAGE_URL]: { body: "tampered" },
    });

    await expect(retrieveImage(SAMPLE_REQUEST, { dir: tmpDir }, { source: SAMPLE, fetchImpl })).rejects.toBeInstanceOf(
      IntegrityError,
    );
    expect(fs.readFileSync(dest, "utf8")).toBe("known good");
  });

  it("re-fetches everything on every run and produces identical files", async () => {
    const image = Buffer.from("debian disk bytes");
    const sums = `${computeDigest("sha512", image)}  debian-12-genericcloud-amd64.qcow2\n`;
    const fetchImpl = fakeFetch({
      "https://mirror.test/debian/bookworm/latest/SHA512SUMS": { body: sums },
      "https://mirror.test/debian/bookworm/latest/debian-12-genericcloud-amd64.qcow2": { body: image },
    });
    const request: ImageRequest = {
      distro: "debian",
      release: "bookworm",
      arch: "amd64",
      variant: "genericcloud",
      format: "qcow2",
    };

    const first = await retrieveImage(request, { dir: tmpDir }, { source: DEBIAN, fetchImpl });
    const firstBytes = fs.readFileSync(first.path);
    const second = await retrieveImage(request, { dir: tmpDir }, { source: DEBIAN, fetchImpl });

    expect(fs.readFileSync(second.path).equals(firstBytes)).toBe(true);
    expect(firstBytes.equals(image)).toBe(true);
    expect(fetchImpl.calls).toEqual([
      "https://mirror.test/debian/bookworm/latest/SHA512SUMS",
      "https://mirror.test/debian/bookworm/latest/debian-12-genericcloud-amd64.qcow2",
      "https://mirror.test/debian/bookworm/latest/SHA512SUMS",
      "https://mirror.test/debian/bookworm/latest/debian-12-genericcloud-amd64.qcow2",
    ]);
  });

  it("resolves x86_64 against amd64 manifest entries", async () => {
    const image = Buffer.from("amd64 image");
    const fetchImpl = fakeFetch({
      "https://mirror.test/debian/trixie/latest/SHA512SUMS": {
        body: `${computeDigest("sha512", image)}  debian-13-nocloud-amd64.raw\n`,
      },
      "https://mirror.test/debian/trixie/latest/debian-13-nocloud-amd64.raw": { body: image },
    });

    const res = await retrieveImage(
      { distro: "debian", release: "trixie", arch: "x86_64", variant: "nocloud", format: "raw" },
      { dir: tmpDir, filename: "trixie.raw" },
      { source: DEBIAN, fetchImpl },
    );

    expect(res.asset.filename).toBe("debian-13-nocloud-amd64.raw");
    expect(res.path).toBe(path.join(tmpDir, "trixie.raw"));
    expect(fs.readFileSync(res.path).equals(image)).toBe(true);
  });

  it("stops after the manifest when nothing matches", async () => {
    const fetchImpl = fakeFetch({ [`${SAMPLE_BASE}MD5SUMS`]: { body: SAMPLE_SUMS } });
    await expect(
      retrieveImage({ ...SAMPLE_REQUEST, format: "raw" }, { dir: tmpDir }, { source: SAMPLE, fetchImpl }),
    ).rejects.toBeInstanceOf(NoMatchError);
    expect(fetchImpl.calls).toEqual([`${SAMPLE_BASE}MD5SUMS`]);
  });

  it("rejects an unsafe filename override before downloading", async () => {
    const fetchImpl = fakeFetch({
      [`${SAMPLE_BASE}MD5SUMS`]: { body: SAMPLE_SUMS },
      [SAMPLE_IMAGE_URL]: { body: "" },
    });
    await expect(
      retrieveImage(SAMPLE_REQUEST, { dir: tmpDir, filename: "../escape.qcow2" }, { source: SAMPLE, fetchImpl }),
    ).rejects.toBeInstanceOf(InvariantViolation);
    expect(fetchImpl.calls).toEqual([`${SAMPLE_BASE}MD5SUMS`]);
  });

  it("leaves no file behind when the caller aborts mid-download", async () => {
    const controller = new AbortController();
    const inner = fakeFetch({ [`${SAMPLE_BASE}MD5SUMS`]: { body: SAMPLE_SUMS } });
    const fetchImpl: FetchLike = async (url, init) => {
      if (url === SAMPLE_IMAGE_URL) controller.abort(new Error("deadline"));
      return inner(url, init);
    };

    await expect(
      retrieveImage(SAMPLE_REQUEST, { dir: tmpDir }, { source: SAMPLE, fetchImpl, signal: controller.signal }),
    ).rejects.toThrow("deadline");
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it("runs independent pipelines concurrently", async () => {
    const a = Buffer.from("image a");
    const b = Buffer.from("image b");
    const fetchImpl = fakeFetch({
      "https://mirror.test/sample/a/MD5SUMS": { body: `${computeDigest("md5", a)}  sample-generic-amd64.qcow2\n` },
      "https://mirror.test/sample/a/sample-generic-amd64.qcow2": { body: a },
      "https://mirror.test/sample/b/MD5SUMS": { body: `${computeDigest("md5", b)}  sample-generic-amd64.qcow2\n` },
      "https://mirror.test/sample/b/sample-generic-amd64.qcow2": { body: b },
    });
    const dirA = path.join(tmpDir, "a");
    const dirB = path.join(tmpDir, "b");

    const [ra, rb] = await Promise.all([
      retrieveImage({ ...SAMPLE_REQUEST, release: "a" }, { dir: dirA }, { source: SAMPLE, fetchImpl }),
      retrieveImage({ ...SAMPLE_REQUEST, release: "b" }, { dir: dirB }, { source: SAMPLE, fetchImpl }),
    ]);

    expect(fs.readFileSync(ra.path, "utf8")).toBe("image a");
    expect(fs.readFileSync(rb.path, "utf8")).toBe("image b");
  });
});

describe("resolveImage", () => {
  it("resolves without fetching the asset", async () => {
    const fetchImpl = fakeFetch({ [`${SAMPLE_BASE}MD5SUMS`]: { body: SAMPLE_SUMS } });
    const { asset, manifest } = await resolveImage(SAMPLE_REQUEST, { source: SAMPLE, fetchImpl });
    expect(asset.url).toBe(SAMPLE_IMAGE_URL);
    expect(manifest.algorithm).toBe("md5");
    expect(fetchImpl.calls).toEqual([`${SAMPLE_BASE}MD5SUMS`]);
  });
});
