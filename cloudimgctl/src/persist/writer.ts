import { randomBytes } from "node:crypto";
import { mkdir, open, rename, unlink, type FileHandle } from "node:fs/promises";
import path from "node:path";
import { InvariantViolation } from "../errors.js";
import type { VerifiedPayload } from "../types/image.js";

export type WriteOptions = {
  signal?: AbortSignal;
};

function tempPathFor(destination: string): string {
  const dir = path.dirname(destination);
  return path.join(dir, `.${path.basename(destination)}.${randomBytes(6).toString("hex")}.partial`);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Close and unlink the temp file; returns the first cleanup failure, if any. */
async function discardTemp(fh: FileHandle | null, tmp: string): Promise<unknown> {
  let failure: unknown = null;
  if (fh) {
    await fh.close().catch((err: unknown) => {
      failure = err;
    });
  }
  try {
    await unlink(tmp);
  } catch (err) {
    if (!isMissingFile(err)) failure ??= err;
  }
  return failure;
}

/**
 * PersistenceWriter: the last gate before an image reaches disk.
 *
 * Only `verified` payloads are written. Bytes go to a sibling temp file which
 * is fsynced and renamed over the destination, so readers see either the old
 * state or the complete file.
 */
export class PersistenceWriter {
  async write(payload: VerifiedPayload, destination: string, opts: WriteOptions = {}): Promise<string> {
    if (payload.state !== "verified") {
      throw new InvariantViolation(
        `Refusing to persist a ${payload.state} payload to ${destination}`,
        payload.state,
      );
    }

    const target = path.resolve(destination);
    await mkdir(path.dirname(target), { recursive: true });
    const tmp = tempPathFor(target);

    let fh: FileHandle | null = null;
    try {
      opts.signal?.throwIfAborted();
      fh = await open(tmp, "wx", 0o644);
      await fh.writeFile(payload.bytes);
      await fh.sync();
      await fh.close();
      fh = null;

      opts.signal?.throwIfAborted();
      await rename(tmp, target);
    } catch (e) {
      const cleanupError = await discardTemp(fh, tmp);
      if (cleanupError) {
        throw new AggregateError([e, cleanupError], `Write to ${target} failed and ${tmp} could not be removed`);
      }
      throw e;
    }

    return target;
  }
}
