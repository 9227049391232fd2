import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown) => string;
};

/** Nullable counters in the release record are written as `["integer", "null"]`. */
export const AJV_OPTIONS = { allErrors: true, strict: true, allowUnionTypes: true } as const;

/** Draft 2020-12 validator with the ajv-formats checks (date-time, uri). */
export async function loadAjv(): Promise<AjvInstance> {
  // ajv and ajv-formats are CommonJS; under NodeNext the default import is the module object.
  const AjvCtor = Ajv2020 as unknown as { new (opts: typeof AJV_OPTIONS): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor(AJV_OPTIONS);
  add(ajv);
  return ajv;
}
