import fs from "node:fs";
import type { DomainConfig } from "../types/config.js";
import type { InstalledPackage } from "../types/packages.js";
import { runCommand, substitute, type CommandRunner } from "../core/exec.js";
import { parseCondaListJson } from "./conda.js";
import { parseDescriptionRecords, readLibraryDirectory } from "./description.js";
import { SnapshotUnavailableError } from "./errors.js";

export const DEFAULT_FORBIDDEN_PREFIXES = ["/home"];

/**
 * Refuse a snapshot whose library lives under a forbidden prefix. The same
 * prefixes guard the emitted R install script.
 */
export function checkInstallPrefixes(
  domain: string,
  packages: InstalledPackage[],
  prefixes: string[],
  libraryPath?: string,
): void {
  const paths = new Set<string>();
  if (libraryPath) paths.add(libraryPath);
  for (const pkg of packages) if (pkg.libPath) paths.add(pkg.libPath);

  for (const p of paths) {
    const hit = prefixes.find((prefix) => p.startsWith(prefix));
    if (hit) {
      throw new SnapshotUnavailableError(
        `Packages for ${domain} are installed under forbidden prefix ${hit}: ${p}`,
        domain,
      );
    }
  }
}

/** Parse raw snapshot output according to the domain's snapshot format. */
export function parseSnapshot(domain: DomainConfig, text: string): InstalledPackage[] {
  try {
    switch (domain.snapshot.format) {
      case "conda-json":
        return parseCondaListJson(text);
      case "dcf":
        return parseDescriptionRecords(text);
    }
  } catch (e) {
    if (e instanceof SnapshotUnavailableError) {
      throw new SnapshotUnavailableError(e.message, domain.name);
    }
    throw e;
  }
}

/** Forbidden prefixes for a domain: configured, or `/home` for R libraries. */
export function forbiddenPrefixesFor(domain: DomainConfig): string[] {
  if (domain.forbidden_install_prefixes) return domain.forbidden_install_prefixes;
  return domain.pin_format === "r-script" ? DEFAULT_FORBIDDEN_PREFIXES : [];
}

/**
 * Capture the installed-package snapshot of a domain from a built artifact by
 * running its snapshot command. Throws SnapshotUnavailableError when the
 * listing cannot be obtained.
 */
export async function captureSnapshot(
  artifactId: string,
  domain: DomainConfig,
  opts: { cwd: string; exec?: CommandRunner },
): Promise<InstalledPackage[]> {
  const exec = opts.exec ?? runCommand;
  const command = substitute(domain.snapshot.command, { artifact: artifactId, domain: domain.name });
  const res = await exec(command, { cwd: opts.cwd });
  if (!res.ok) {
    const reason = res.stderr.trim() || res.error || `exit code ${res.exitCode ?? "unknown"}`;
    throw new SnapshotUnavailableError(`Snapshot command failed for ${domain.name}: ${reason}`, domain.name);
  }

  const packages = parseSnapshot(domain, res.stdout);
  checkInstallPrefixes(domain.name, packages, forbiddenPrefixesFor(domain), domain.snapshot.library_path);
  return packages;
}

/**
 * Read a snapshot saved on disk: a captured listing file in the domain's
 * snapshot format, or an R library directory.
 */
export function readSnapshotPath(domain: DomainConfig, snapshotPath: string): InstalledPackage[] {
  if (!fs.existsSync(snapshotPath)) {
    throw new SnapshotUnavailableError(`Snapshot not found: ${snapshotPath}`, domain.name);
  }
  if (fs.statSync(snapshotPath).isDirectory()) return readLibraryDirectory(snapshotPath);
  return parseSnapshot(domain, fs.readFileSync(snapshotPath, "utf8"));
}
