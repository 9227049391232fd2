import YAML from "yaml";
import { isRecord, uniqueInOrder } from "./common.js";

const OPERATOR_RE = /(==|>=|<=|!=|~=|=|>|<)/;

/** `conda-forge::xarray`, `conda-forge/label/dev::xarray` */
const CHANNEL_PREFIX_RE = /^[^\s=<>!~[]*::/;

/** Pip extras (`xarray[io]`) and conda bracket constraints (`numpy[version='>=1.26']`). */
const BRACKET_RE = /\[.*$/;

/** Interpreter and installer entries are never declared packages. */
const NON_PACKAGES = new Set(["python", "pip"]);

/**
 * Extract the package name from a conda or pip dependency spec.
 *
 *   "xarray>=2024.10"        → "xarray"
 *   "py-xgboost~=2.1.1=cpu*" → "py-xgboost"
 *   "numpy 1.26"             → "numpy"
 *   "conda-forge::xarray>=1" → "xarray"
 *   "xarray[io]>=2024.10"    → "xarray"
 */
export function extractPackageName(spec: string): string {
  const s = spec
    .split("#", 1)[0]
    .trim()
    .replace(/^['"]|['"]$/g, "")
    .replace(CHANNEL_PREFIX_RE, "")
    .replace(BRACKET_RE, "");
  const m = OPERATOR_RE.exec(s);
  const name = (m ? s.slice(0, m.index) : s).trim();
  return name.split(/\s+/)[0] ?? "";
}

export type CondaEnvOptions = {
  /** Include entries of a nested `pip:` list (default true). */
  includePip?: boolean;
};

/** Parse a conda environment YAML document into declared package names. */
export function parseCondaEnv(text: string, opts: CondaEnvOptions = {}): string[] {
  const includePip = opts.includePip ?? true;
  const doc: unknown = YAML.parse(text);
  if (!isRecord(doc) || !Array.isArray(doc.dependencies)) return [];

  const names: string[] = [];
  for (const dep of doc.dependencies) {
    if (typeof dep === "string") {
      names.push(extractPackageName(dep));
    } else if (includePip && isRecord(dep) && Array.isArray(dep.pip)) {
      for (const pipDep of dep.pip) {
        if (typeof pipDep === "string") names.push(extractPackageName(pipDep));
      }
    }
  }

  return uniqueInOrder(names.filter((n) => !NON_PACKAGES.has(n)));
}
