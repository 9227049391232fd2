import { uniqueInOrder } from "./common.js";

const BIOC_RE = /BiocManager::install\s*\(\s*["']([^"']+)["']/g;
const COMMANDS = new Set(["R", "Rscript", "apt", "apt-get", "set", "export", "echo", "rm"]);

/**
 * Parse a shell script that installs R packages with `install2.r`.
 *
 * Package names follow the `install2.r` line as backslash-continued lines; the
 * block ends at a blank line, a comment, a line without a trailing backslash,
 * or a line that starts a new command. `BiocManager::install('x')` calls are
 * collected as well.
 */
export function parseInstall2r(text: string): string[] {
  const names: string[] = [];
  let inBlock = false;

  for (const line of text.split(/\r?\n/)) {
    const stripped = line.trim();
    const isComment = stripped.startsWith("#");

    if (!isComment) {
      for (const m of stripped.matchAll(BIOC_RE)) names.push(m[1]);
    }

    if (!inBlock) {
      if (line.includes("install2.r") && !isComment) inBlock = true;
      continue;
    }

    if (!stripped || isComment) {
      inBlock = false;
      continue;
    }

    const tokens = stripped.replace(/\\$/, "").trim().split(/\s+/).filter(Boolean);
    if (tokens.length > 0 && COMMANDS.has(tokens[0])) {
      inBlock = false;
      continue;
    }
    for (const token of tokens) {
      if (token.startsWith("-") || token.startsWith("$") || token.startsWith("\"$")) continue;
      names.push(token);
    }

    if (!stripped.endsWith("\\")) inBlock = false;
  }

  return uniqueInOrder(names);
}
