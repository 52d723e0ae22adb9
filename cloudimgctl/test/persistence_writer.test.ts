import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { InvariantViolation } from "../src/errors.js";
import { computeDigest } from "../src/integrity/checksum.js";
import { unverified } from "../src/integrity/verifier.js";
import { destinationPath, sanitizeFilename } from "../src/persist/safe-path.js";
import { PersistenceWriter } from "../src/persist/writer.js";
import type { AcceptedPayload, RejectedPayload } from "../src/types/image.js";

function accepted(content: string): AcceptedPayload {
  const bytes = Buffer.from(content);
  return { state: "verified", bytes, algorithm: "sha256", digest: computeDigest("sha256", bytes) };
}

function rejected(content: string): RejectedPayload {
  const bytes = Buffer.from(content);
  return { state: "rejected", bytes, algorithm: "sha256", expected: "0".repeat(64), computed: computeDigest("sha256", bytes) };
}

describe("PersistenceWriter", () => {
  let tmpDir: string;
  const writer = new PersistenceWriter();

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "cloudimg-writer-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes a verified payload and returns the absolute path", async () => {
    const dest = path.join(tmpDir, "disk.qcow2");
    const written = await writer.write(accepted("image"), dest);
    expect(written).toBe(path.resolve(dest));
    expect(fs.readFileSync(dest, "utf8")).toBe("image");
  });

  it("creates missing parent directories", async () => {
    const dest = path.join(tmpDir, "nested", "dir", "disk.raw");
    await writer.write(accepted("raw"), dest);
    expect(fs.readFileSync(dest, "utf8")).toBe("raw");
  });

  it("replaces an existing file and leaves no temp files behind", async () => {
    const dest = path.join(tmpDir, "disk.qcow2");
    fs.writeFileSync(dest, "old");
    await writer.write(accepted("new"), dest);
    expect(fs.readFileSync(dest, "utf8")).toBe("new");
    expect(fs.readdirSync(tmpDir)).toEqual(["disk.qcow2"]);
  });

  it("refuses a rejected payload and does not create the destination", async () => {
    const dest = path.join(tmpDir, "disk.qcow2");
    const err = await writer.write(rejected("corrupt"), dest).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvariantViolation);
    if (!(err instanceof InvariantViolation)) return;
    expect(err.state).toBe("rejected");
    expect(fs.existsSync(dest)).toBe(false);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it("refuses an unverified payload and leaves an existing destination untouched", async () => {
    const dest = path.join(tmpDir, "disk.qcow2");
    fs.writeFileSync(dest, "previous");
    await expect(writer.write(unverified(Buffer.from("unchecked")), dest)).rejects.toBeInstanceOf(InvariantViolation);
    expect(fs.readFileSync(dest, "utf8")).toBe("previous");
  });

  it("discards the temp file when aborted before the rename", async () => {
    const dest = path.join(tmpDir, "disk.qcow2");
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));
    await expect(writer.write(accepted("image"), dest, { signal: controller.signal })).rejects.toThrow("cancelled");
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it("cleans up when the destination cannot be replaced", async () => {
    const dest = path.join(tmpDir, "taken");
    fs.mkdirSync(path.join(dest, "child"), { recursive: true });
    await expect(writer.write(accepted("image"), dest)).rejects.toThrow();
    expect(fs.readdirSync(tmpDir)).toEqual(["taken"]);
  });
});

describe("destination paths", () => {
  it("accepts plain file names", () => {
    expect(sanitizeFilename(" disk.qcow2 ")).toBe("disk.qcow2");
    expect(destinationPath("/srv/images", "disk.qcow2")).toBe(path.resolve("/srv/images/disk.qcow2"));
  });

  it("rejects traversal, separators and empty names", () => {
    for (const bad of ["", "  ", ".", "..", "../etc", "a/b", "a\\b", "nul\0"]) {
      expect(() => sanitizeFilename(bad)).toThrow(InvariantViolation);
    }
  });
});
