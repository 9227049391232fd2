import type { InstalledPackage } from "../types/packages.js";
import { isRecord } from "../manifest/common.js";
import { SnapshotUnavailableError } from "./errors.js";
import { errorMessage } from "../core/errors.js";

function str(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Parse `conda list --json` output. Every entry is a registry install; the
 * channel (`conda-forge`, `pypi`, ...) is kept on the origin.
 */
export function parseCondaListJson(text: string): InstalledPackage[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new SnapshotUnavailableError(`Invalid conda list JSON: ${errorMessage(e)}`);
  }
  if (!Array.isArray(data)) {
    throw new SnapshotUnavailableError("Invalid conda list JSON: expected an array of packages");
  }

  const packages: InstalledPackage[] = [];
  for (const rec of data) {
    if (!isRecord(rec)) continue;
    const name = str(rec.name);
    if (!name) continue;
    const channel = str(rec.channel);
    const build = str(rec.build_string);
    packages.push({
      name,
      version: str(rec.version) ?? "",
      ...(build ? { build } : {}),
      origin: channel ? { type: "registry", channel } : { type: "registry" },
    });
  }
  return packages;
}
