export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Drop repeated names, keeping the first position of each. */
export function uniqueInOrder(names: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const name of names) {
    if (!name || seen.has(name)) continue;
    seen.add(name);
    out.push(name);
  }
  return out;
}

/** Lines of a document with whole-line `#` comments blanked out. */
export function uncommentedLines(text: string): string[] {
  return text.split(/\r?\n/).map((line) => (line.trimStart().startsWith("#") ? "" : line));
}
