import fs from "node:fs";
import path from "node:path";
import type { InstalledPackage, PackageOrigin } from "../types/packages.js";
import { SnapshotUnavailableError } from "./errors.js";

export type DcfRecord = Record<string, string>;

/**
 * Parse Debian Control File text (the R DESCRIPTION format). Records are
 * separated by blank lines; indented lines continue the previous field.
 */
export function parseDcf(text: string): DcfRecord[] {
  const records: DcfRecord[] = [];
  let current: DcfRecord = {};
  let lastKey: string | null = null;

  const flush = () => {
    if (Object.keys(current).length > 0) records.push(current);
    current = {};
    lastKey = null;
  };

  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === "") {
      flush();
      continue;
    }
    if (/^\s/.test(line)) {
      if (lastKey) current[lastKey] = `${current[lastKey]} ${line.trim()}`;
      continue;
    }
    const idx = line.indexOf(":");
    if (idx <= 0) continue;
    lastKey = line.slice(0, idx).trim();
    current[lastKey] = line.slice(idx + 1).trim();
  }
  flush();

  return records;
}

function originOf(fields: DcfRecord): PackageOrigin {
  const remoteType = fields.RemoteType ?? "";
  const owner = fields.RemoteUsername;
  const repo = fields.RemoteRepo;
  if (/github/i.test(remoteType) && owner && repo) {
    const sha = fields.RemoteSha;
    return {
      type: "source-control",
      host: fields.RemoteHost || "api.github.com",
      owner,
      repo,
      ...(sha ? { commitRef: sha } : {}),
    };
  }
  const repository = fields.Repository;
  return repository ? { type: "registry", channel: repository } : { type: "registry" };
}

/** Convert one DESCRIPTION record; records without Package or Version are skipped. */
export function descriptionToPackage(fields: DcfRecord): InstalledPackage | null {
  const name = fields.Package;
  const version = fields.Version;
  if (!name || !version) return null;

  const priority = fields.Priority && fields.Priority !== "NA" ? fields.Priority : undefined;
  const libPath = fields.LibPath;

  return {
    name,
    version,
    ...(priority ? { priority } : {}),
    ...(libPath ? { libPath } : {}),
    origin: originOf(fields),
  };
}

/** Parse concatenated DESCRIPTION records into installed packages. */
export function parseDescriptionRecords(text: string): InstalledPackage[] {
  const packages: InstalledPackage[] = [];
  for (const rec of parseDcf(text)) {
    const pkg = descriptionToPackage(rec);
    if (pkg) packages.push(pkg);
  }
  return packages;
}

/** Read `<lib>/<pkg>/DESCRIPTION` for every package directory of an R library. */
export function readLibraryDirectory(libPath: string): InstalledPackage[] {
  if (!fs.existsSync(libPath) || !fs.statSync(libPath).isDirectory()) {
    throw new SnapshotUnavailableError(`Library path does not exist: ${libPath}`);
  }

  const packages: InstalledPackage[] = [];
  const dirs = fs
    .readdirSync(libPath, { withFileTypes: true })
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort();

  for (const dir of dirs) {
    const descPath = path.join(libPath, dir, "DESCRIPTION");
    if (!fs.existsSync(descPath)) continue;
    const [fields] = parseDcf(fs.readFileSync(descPath, "utf8"));
    if (!fields) continue;
    const pkg = descriptionToPackage({ LibPath: libPath, ...fields });
    if (pkg) packages.push(pkg);
  }

  return packages;
}
