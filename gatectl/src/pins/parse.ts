import type { PinFormat } from "../types/config.js";

export type ParsedPin = {
  name: string;
  version: string;
};

const INSTALL_VERSION_RE = /^remotes::install_version\s*\(\s*"([^"]+)"\s*,\s*version\s*=\s*"([^"]+)"/;
const INSTALL_GITHUB_RE = /^remotes::install_github\s*\(\s*"([^/"]+)\/([^"@]+)(?:@[^"]*)?"[^)]*\)\s*(?:#\s*(\S+)(?:\s+(\S+))?)?/;

function parseRScript(text: string): ParsedPin[] {
  const pins: ParsedPin[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const v = INSTALL_VERSION_RE.exec(line);
    if (v) {
      pins.push({ name: v[1], version: v[2] });
      continue;
    }

    const g = INSTALL_GITHUB_RE.exec(line);
    if (g) {
      // Trailing comment carries "<name> <version>"; older files only "<version>".
      const [, , repo, first, second] = g;
      if (first && second) pins.push({ name: first, version: second });
      else pins.push({ name: repo, version: first ?? "" });
    }
  }
  return pins;
}

function parseCondaSpec(text: string): ParsedPin[] {
  const pins: ParsedPin[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;
    const [spec = "", version = ""] = line.split("=");
    const sep = spec.lastIndexOf("::");
    const name = (sep === -1 ? spec : spec.slice(sep + 2)).trim();
    if (name) pins.push({ name, version: version.trim() });
  }
  return pins;
}

/** Read `name==version` lines of a pip requirements file; options and comments are skipped. */
export function parsePipRequirements(text: string): ParsedPin[] {
  const pins: ParsedPin[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#") || line.startsWith("-")) continue;
    const [name = "", version = ""] = line.split("==");
    if (name) pins.push({ name: name.trim(), version: version.trim() });
  }
  return pins;
}

/** Read a pinned manifest back into package names and versions. */
export function parsePinnedManifest(text: string, format: PinFormat): ParsedPin[] {
  return format === "r-script" ? parseRScript(text) : parseCondaSpec(text);
}
