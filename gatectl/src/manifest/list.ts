import { uniqueInOrder } from "./common.js";

/** One package name per line; `#` starts a comment. */
export function parsePackageList(text: string): string[] {
  return uniqueInOrder(text.split(/\r?\n/).map((line) => line.split("#", 1)[0].trim()));
}
