import { loadConfig } from "../config/loader.js";
import { errorMessage, isCloudImgError } from "../errors.js";
import type { FetchLike } from "../fetch/http.js";
import { SourceRegistry } from "../sources/registry.js";
import type { CloudImgConfig } from "../types/config.js";
import type { ManifestSource } from "../types/manifest.js";

export type CommandError = {
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type CommandFailure = { ok: false; error: CommandError };

export type ConfigOptions = {
  configDir?: string;
  env?: string;
};

export type NetworkOptions = {
  fetchImpl?: FetchLike;
  /** Per-attempt deadline in milliseconds. */
  timeoutMs?: number;
};

export function failure(code: string, message: string, details?: Record<string, unknown>): CommandFailure {
  return { ok: false, error: details ? { code, message, details } : { code, message } };
}

/** Convert a thrown error into a command failure, keeping the diagnostic context. */
export function failureFromError(err: unknown): CommandFailure {
  if (isCloudImgError(err)) {
    const details: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(err)) {
      if (key === "payload" || key === "name" || key === "code" || key === "retryable") continue;
      details[key] = value;
    }
    details.retryable = err.retryable;
    return failure(err.code, err.message, details);
  }
  if (err instanceof Error && err.name === "TimeoutError") {
    return failure("TIMEOUT", err.message);
  }
  return failure("FAILED", errorMessage(err));
}

export type SourceContext = { ok: true; config: CloudImgConfig; registry: SourceRegistry };

export function openRegistry(opts: ConfigOptions): SourceContext | CommandFailure {
  const loaded = loadConfig(opts.env, opts.configDir);
  if (!loaded.ok) return failure("CONFIG_INVALID", loaded.error);
  try {
    return { ok: true, config: loaded.config, registry: new SourceRegistry(loaded.config) };
  } catch (e) {
    return failure("CONFIG_INVALID", errorMessage(e));
  }
}

export function openSource(
  opts: ConfigOptions,
  distro: string,
): { ok: true; config: CloudImgConfig; source: ManifestSource } | CommandFailure {
  const ctx = openRegistry(opts);
  if (!ctx.ok) return ctx;
  const source = ctx.registry.get(distro);
  if (!source) {
    return failure("UNKNOWN_DISTRO", `Unknown distro '${distro}'. Configured: ${ctx.registry.names().join(", ")}`);
  }
  return { ok: true, config: ctx.config, source };
}

export function deadline(timeoutMs?: number): AbortSignal | undefined {
  return timeoutMs !== undefined && timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined;
}
