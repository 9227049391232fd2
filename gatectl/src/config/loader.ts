import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { GateConfig } from "../types/config.js";
import { isRecord } from "../manifest/common.js";

export const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

export const ENV_PREFIX = "GATECTL_";

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const prev = result[key];
    if (isRecord(val) && isRecord(prev)) {
      result[key] = deepMerge(prev, val);
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
  return isRecord(parsed) ? parsed : {};
}

/** Apply GATECTL_ prefixed environment variable overrides to top-level keys. */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // GATECTL_RUNS_DIR → runs_dir
    result[key.slice(ENV_PREFIX.length).toLowerCase()] = value;
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← GATECTL_* variables.
 * The result is unchecked; pass it through validateConfig before use.
 *
 * @param envName - Optional environment name (e.g. "ci"); loads `{envName}.yaml` as override layer.
 */
export function loadConfigRaw(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }
  return applyEnvOverrides(merged, env);
}

/** Resolve relative directories in a validated config against a base directory. */
export function resolvePaths(config: GateConfig, baseDir: string): GateConfig {
  return {
    ...config,
    repo_root: path.resolve(baseDir, config.repo_root),
    runs_dir: path.resolve(baseDir, config.runs_dir),
  };
}
