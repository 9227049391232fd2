import { uncommentedLines, uniqueInOrder } from "./common.js";

const VECTOR_RE = /\bc\s*\(([^)]*)\)/g;
const QUOTED_RE = /["']([^"']+)["']/g;
const GITHUB_RE = /remotes::install_github\s*\(\s*["']([^/"']+)\/([^"'@]+)/g;

/**
 * Parse an R install script: names quoted inside `c(...)` vectors plus the repo
 * name of each `remotes::install_github("owner/repo")` call, in textual order.
 */
export function parseRInstall(text: string): string[] {
  const content = uncommentedLines(text).join("\n");
  const found: Array<{ index: number; name: string }> = [];

  for (const vector of content.matchAll(VECTOR_RE)) {
    const start = vector.index ?? 0;
    for (const quoted of vector[1].matchAll(QUOTED_RE)) {
      found.push({ index: start + (quoted.index ?? 0), name: quoted[1].trim() });
    }
  }

  for (const call of content.matchAll(GITHUB_RE)) {
    found.push({ index: call.index ?? 0, name: call[2].trim() });
  }

  found.sort((a, b) => a.index - b.index);
  return uniqueInOrder(found.map((f) => f.name));
}
