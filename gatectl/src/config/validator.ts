import { loadAjv } from "../schema/ajv.js";
import type { GateConfig } from "../types/config.js";
import { loadConfigRaw, resolvePaths } from "./loader.js";

const SOURCE_SCHEMA = {
  type: "object",
  required: ["format"],
  additionalProperties: false,
  properties: {
    id: { type: "string", minLength: 1 },
    path: { type: "string", minLength: 1 },
    glob: { type: "string", minLength: 1 },
    format: { type: "string", enum: ["conda-env", "r-install", "install2r", "list"] },
    group: { type: "string", minLength: 1 },
    include_pip: { type: "boolean" },
  },
};

const DOMAIN_SCHEMA = {
  type: "object",
  required: ["name", "registry_url", "pin_format", "pinned_file", "sources", "snapshot"],
  additionalProperties: false,
  properties: {
    name: { type: "string", pattern: "^[a-z][a-z0-9_-]*$" },
    label: { type: "string" },
    registry_url: { type: "string", format: "uri" },
    pin_format: { type: "string", enum: ["r-script", "conda-spec"] },
    pinned_file: { type: "string", minLength: 1 },
    pip_pinned_file: { type: "string", minLength: 1 },
    channels: { type: "object", additionalProperties: { type: "string", format: "uri" } },
    sources: { type: "array", items: SOURCE_SCHEMA },
    snapshot: {
      type: "object",
      required: ["command", "format"],
      additionalProperties: false,
      properties: {
        command: { type: "string", minLength: 1 },
        format: { type: "string", enum: ["conda-json", "dcf"] },
        library_path: { type: "string", minLength: 1 },
      },
    },
    bundled_priorities: { type: "array", items: { type: "string" } },
    exclude: { type: "array", items: { type: "string" } },
    forbidden_install_prefixes: { type: "array", items: { type: "string", minLength: 1 } },
  },
};

/** Config schema: required fields, command strings, domain definitions. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "repo_root", "runs_dir", "artifact_ref", "pipeline", "domains"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    repo_root: { type: "string", minLength: 1 },
    runs_dir: { type: "string", minLength: 1 },
    artifact_ref: { type: "string", minLength: 1 },
    pipeline: {
      type: "object",
      required: ["build", "test", "publish"],
      additionalProperties: false,
      properties: {
        build: { type: "string", minLength: 1 },
        test: { type: "string", minLength: 1 },
        test_results: { type: "string", minLength: 1 },
        publish: { type: "string", minLength: 1 },
      },
    },
    release: {
      type: "object",
      required: ["tag"],
      additionalProperties: false,
      properties: {
        tag: { type: "boolean" },
        tag_prefix: { type: "string", minLength: 1 },
      },
    },
    domains: { type: "array", minItems: 1, items: DOMAIN_SCHEMA },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: GateConfig; errors: null }
  | { valid: false; errors: string };

function isGateConfig(config: unknown, check: (data: unknown) => boolean): config is GateConfig {
  return check(config);
}

/** Validate a loaded config against the config schema plus the cross-field rules. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile(CONFIG_SCHEMA);
  if (!isGateConfig(config, validate)) {
    return { valid: false, errors: ajv.errorsText(validate.errors) };
  }

  const seen = new Set<string>();
  for (const d of config.domains) {
    if (seen.has(d.name)) return { valid: false, errors: `duplicate domain name: ${d.name}` };
    seen.add(d.name);
    for (const s of d.sources) {
      if (Boolean(s.path) === Boolean(s.glob)) {
        return { valid: false, errors: `domain ${d.name}: each source needs exactly one of path or glob` };
      }
    }
  }

  return { valid: true, config, errors: null };
}

export type LoadConfigResult = { ok: true; config: GateConfig } | { ok: false; error: string };

/**
 * Load, validate and resolve the config. Relative `repo_root` and `runs_dir`
 * resolve against `baseDir` (default: the working directory).
 */
export async function loadConfig(opts: {
  envName?: string;
  configDir?: string;
  baseDir?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<LoadConfigResult> {
  const raw = loadConfigRaw(opts.envName, opts.configDir, opts.env);
  const res = await validateConfig(raw);
  if (!res.valid) return { ok: false, error: `Config invalid: ${res.errors}` };
  return { ok: true, config: resolvePaths(res.config, opts.baseDir ?? process.cwd()) };
}
