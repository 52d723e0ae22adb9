import path from "node:path";
import { InvariantViolation } from "../errors.js";

/**
 * Validate a single file name: no traversal, separators or NUL.
 * @throws InvariantViolation if the name is unusable as a destination file
 */
export function sanitizeFilename(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new InvariantViolation("Destination filename cannot be empty");
  }
  if (
    trimmed === "." ||
    trimmed.includes("..") ||
    trimmed.includes("/") ||
    trimmed.includes("\\") ||
    trimmed.includes("\0")
  ) {
    throw new InvariantViolation(`Invalid destination filename: ${name}`);
  }
  return trimmed;
}

/** Join a directory and a sanitized file name into an absolute path that stays inside `dir`. */
export function destinationPath(dir: string, filename: string): string {
  const base = path.resolve(dir);
  const full = path.resolve(base, sanitizeFilename(filename));
  if (path.dirname(full) !== base) {
    throw new InvariantViolation(`Path traversal detected: ${full}`);
  }
  return full;
}
