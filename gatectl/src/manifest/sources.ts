import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import type { DomainConfig, SourceConfig } from "../types/config.js";
import type { DependencySource } from "../types/packages.js";
import { parseCondaEnv } from "./conda-env.js";
import { parseRInstall } from "./r-install.js";
import { parseInstall2r } from "./install2r.js";
import { parsePackageList } from "./list.js";

const SKIP_DIRS = new Set([".git", "node_modules"]);

/** Parse one declared-dependency document according to its configured format. */
export function parseSourceDocument(text: string, source: SourceConfig): string[] {
  switch (source.format) {
    case "conda-env":
      return parseCondaEnv(text, { includePip: source.include_pip ?? true });
    case "r-install":
      return parseRInstall(text);
    case "install2r":
      return parseInstall2r(text);
    case "list":
      return parsePackageList(text);
  }
}

/** Leading path segments of a glob that contain no pattern characters. */
function globBase(pattern: string): string {
  const segments = pattern.split("/");
  const fixed: string[] = [];
  for (const seg of segments) {
    if (/[*?[\]{}]/.test(seg)) break;
    fixed.push(seg);
  }
  return fixed.join("/");
}

function walk(root: string, rel: string, out: string[]): void {
  const dir = path.join(root, rel);
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) return;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const child = rel ? `${rel}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (!SKIP_DIRS.has(entry.name)) walk(root, child, out);
    } else if (entry.isFile()) {
      out.push(child);
    }
  }
}

/**
 * Resolve a source entry to repo-relative file paths (forward slashes, sorted).
 * Throws when an explicit path is missing or a glob matches nothing.
 */
export function resolveSourcePaths(repoRoot: string, source: SourceConfig): string[] {
  if (source.path) {
    const abs = path.resolve(repoRoot, source.path);
    if (!fs.existsSync(abs)) {
      throw new Error(`Dependency manifest not found: ${abs}`);
    }
    return [source.path];
  }

  if (source.glob) {
    const candidates: string[] = [];
    walk(repoRoot, globBase(source.glob), candidates);
    const matched = candidates.filter((p) => minimatch(p, source.glob ?? "")).sort();
    if (matched.length === 0) {
      throw new Error(`No dependency manifests matched ${source.glob} under ${repoRoot}`);
    }
    return matched;
  }

  throw new Error(`Source ${source.id ?? "(unnamed)"} needs a path or a glob`);
}

/**
 * Load every declared-dependency document of a domain, in config order.
 * Names listed in the domain's `exclude` are dropped.
 */
export function loadDomainSources(domain: DomainConfig, repoRoot: string): DependencySource[] {
  const exclude = new Set(domain.exclude ?? []);
  const sources: DependencySource[] = [];

  for (const source of domain.sources) {
    const files = resolveSourcePaths(repoRoot, source);
    for (const rel of files) {
      const text = fs.readFileSync(path.resolve(repoRoot, rel), "utf8");
      const packages = parseSourceDocument(text, source).filter((n) => !exclude.has(n));
      const id = files.length === 1 && source.id ? source.id : rel;
      sources.push({ id, domain: domain.name, group: source.group ?? id, packages });
    }
  }

  return sources;
}
