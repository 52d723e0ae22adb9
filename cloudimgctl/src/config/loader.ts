import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { CloudImgConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "CLOUDIMG_";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val)) {
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/** Apply CLOUDIMG_ prefixed environment variable overrides to top-level keys. */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // CLOUDIMG_USER_AGENT → user_agent
    result[key.slice(ENV_PREFIX.length).toLowerCase()] = value;
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← CLOUDIMG_* environment variables.
 *
 * The result is unvalidated; run it through validateConfig before use.
 */
export function loadRawConfig(
  envName?: string,
  configDir: string = CONFIG_DIR,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  let merged = loadYaml(path.join(configDir, "base.yaml"));

  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(configDir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}

export type LoadConfigResult =
  | { ok: true; config: CloudImgConfig }
  | { ok: false; error: string };

/** Load and validate the layered config. */
export function loadConfig(envName?: string, configDir?: string, env?: NodeJS.ProcessEnv): LoadConfigResult {
  let raw: Record<string, unknown>;
  try {
    raw = loadRawConfig(envName, configDir, env);
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }

  const res = validateConfig(raw);
  if (!res.valid) {
    return { ok: false, error: `Invalid config: ${res.errors}` };
  }
  return { ok: true, config: res.config };
}
