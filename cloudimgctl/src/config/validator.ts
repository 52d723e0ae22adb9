import { loadAjv } from "../schema/ajv.js";
import type { CloudImgConfig } from "../types/config.js";
import { DIGEST_ALGORITHMS } from "../types/manifest.js";

const REPOSITORY_SCHEMA = {
  type: "object",
  required: ["url", "checksum_file", "algorithm", "line_format", "filename_convention", "arch_convention"],
  additionalProperties: false,
  properties: {
    url: { type: "string", format: "uri-template", pattern: "\\{release\\}" },
    checksum_file: { type: "string", minLength: 1, pattern: "^[^/\\\\]+$" },
    algorithm: { type: "string", enum: [...DIGEST_ALGORITHMS] },
    line_format: { type: "string", enum: ["gnu", "bsd"] },
    filename_convention: { type: "string", enum: ["debian", "ubuntu", "almalinux", "generic"] },
    arch_convention: { type: "string", enum: ["deb", "rpm"] },
  },
};

/** Repository entries must carry everything a manifest source needs. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "repositories"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    user_agent: { type: "string", minLength: 1 },
    repositories: {
      type: "object",
      minProperties: 1,
      propertyNames: { type: "string", pattern: "^[a-z0-9][a-z0-9_-]*$" },
      additionalProperties: REPOSITORY_SCHEMA,
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: CloudImgConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  const validate = ajv.compile<CloudImgConfig>(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
