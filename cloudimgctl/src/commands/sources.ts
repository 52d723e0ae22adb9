import type { ManifestSource } from "../types/manifest.js";
import { openRegistry, type CommandFailure, type ConfigOptions } from "./common.js";

export type SourcesResult = { ok: true; sources: ManifestSource[] } | CommandFailure;

/**
 * List configured distributions and how their manifests are read.
 */
export function listSources(opts: ConfigOptions): SourcesResult {
  const ctx = openRegistry(opts);
  if (!ctx.ok) return ctx;
  return { ok: true, sources: ctx.registry.all() };
}
