import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T = unknown>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

let shared: AjvInstance | null = null;

/** One strict 2020-12 instance per process, with the formats config schemas use. */
export function loadAjv(): AjvInstance {
  if (shared) return shared;

  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance, formats: string[]) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv, ["uri-template"]);

  shared = ajv;
  return ajv;
}
