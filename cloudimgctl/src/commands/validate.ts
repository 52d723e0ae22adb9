import path from "node:path";
import { CONFIG_DIR, loadRawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { errorMessage } from "../errors.js";
import { SourceRegistry } from "../sources/registry.js";
import { failure, type CommandFailure, type ConfigOptions } from "./common.js";

export type ValidateResult = { ok: true; configDir: string; distros: string[] } | CommandFailure;

/**
 * Validate the layered config: schema first, then that every repository
 * builds into a usable manifest source.
 */
export function validateAll(opts: ConfigOptions): ValidateResult {
  const configDir = path.resolve(opts.configDir ?? CONFIG_DIR);

  let raw: Record<string, unknown>;
  try {
    raw = loadRawConfig(opts.env, configDir);
  } catch (e) {
    return failure("CONFIG_INVALID", errorMessage(e), { path: configDir });
  }

  const res = validateConfig(raw);
  if (!res.valid) {
    return failure("CONFIG_INVALID", res.errors, { path: configDir });
  }

  try {
    const registry = new SourceRegistry(res.config);
    return { ok: true, configDir, distros: registry.names() };
  } catch (e) {
    return failure("CONFIG_INVALID", errorMessage(e), { path: configDir });
  }
}
