import fs from "node:fs";
import path from "node:path";
import { diag, type Diagnostic } from "../types/diagnostic.js";
import { isRecord } from "../manifest/common.js";
import { createRegistry } from "../schema/registry.js";
import { computeSha256 } from "../artifact-writer/checksum.js";
import { RELEASE_DIR, RELEASE_RECORD_FILE, isWithinDir } from "../artifact-writer/writer.js";
import { errorMessage } from "../core/errors.js";
import { loadContext, type ConfigOptions } from "./context.js";

export type CheckResult = { ok: true; diagnostics: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

function checkReleaseFiles(releaseDir: string, files: unknown[]): Diagnostic[] {
  const errors: Diagnostic[] = [];
  for (const entry of files) {
    if (!isRecord(entry) || typeof entry.path !== "string" || typeof entry.sha256 !== "string") {
      errors.push(diag("error", "RELEASE_ENTRY_INVALID", "Release file entry lacks path or sha256"));
      continue;
    }
    const target = path.resolve(releaseDir, entry.path);
    if (!isWithinDir(releaseDir, target)) {
      errors.push(diag("error", "RELEASE_PATH_ESCAPES_DIR", `Release path escapes release dir: ${entry.path}`));
      continue;
    }
    if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
      errors.push(diag("error", "RELEASE_FILE_MISSING", `Missing release file: ${entry.path}`, { path: target }));
      continue;
    }

    const size = fs.statSync(target).size;
    if (typeof entry.bytes === "number" && size !== entry.bytes) {
      errors.push(
        diag("error", "RELEASE_SIZE_MISMATCH", `Release file size mismatch (${entry.path}): record=${entry.bytes} actual=${size}`, {
          path: target,
        }),
      );
    }
    const actual = computeSha256(target);
    if (actual !== entry.sha256) {
      errors.push(
        diag("error", "RELEASE_SHA256_MISMATCH", `Release file sha256 mismatch (${entry.path}): record=${entry.sha256} actual=${actual}`, {
          path: target,
          expectedSha256: entry.sha256,
          actualSha256: actual,
        }),
      );
    }
  }
  return errors;
}

/**
 * Check the config and its declared-dependency documents, and optionally the
 * integrity of a run's release record: schema validity plus size and sha256
 * of every file it lists.
 */
export async function checkAll(opts: ConfigOptions & { runId?: string; schemaDir?: string }): Promise<CheckResult> {
  const ctx = await loadContext(opts);
  if (!ctx.ok) return { ok: false, errors: [diag("error", ctx.code, ctx.error)] };

  const diagnostics: Diagnostic[] = ctx.plans.map((p) =>
    diag("info", "DOMAIN_OK", `${p.config.name}: ${p.sources.length} source(s), ${p.sources.reduce((n, s) => n + s.packages.length, 0)} declared name(s)`),
  );
  if (!opts.runId) return { ok: true, diagnostics };

  const releaseDir = path.join(ctx.config.runs_dir, opts.runId, RELEASE_DIR);
  const recordPath = path.join(releaseDir, RELEASE_RECORD_FILE);
  if (!fs.existsSync(recordPath)) {
    return { ok: false, errors: [diag("error", "RELEASE_RECORD_MISSING", `Missing release record: ${recordPath}`)] };
  }

  let record: unknown;
  try {
    record = JSON.parse(fs.readFileSync(recordPath, "utf8"));
  } catch (e) {
    return { ok: false, errors: [diag("error", "RELEASE_RECORD_JSON_INVALID", `Invalid release record: ${errorMessage(e)}`)] };
  }

  const errors: Diagnostic[] = [];
  const schemas = await createRegistry(opts.schemaDir);
  const check = await schemas.validate("release-record", record);
  if (!check.valid) {
    errors.push(diag("error", "RELEASE_RECORD_INVALID", `Release record invalid: ${check.errors ?? "unknown error"}`));
  }
  if (isRecord(record) && Array.isArray(record.files)) {
    errors.push(...checkReleaseFiles(releaseDir, record.files));
  }

  if (errors.length > 0) return { ok: false, errors };
  diagnostics.push(diag("info", "RELEASE_OK", `Release record verified: ${recordPath}`));
  return { ok: true, diagnostics };
}
