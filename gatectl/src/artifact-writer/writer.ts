import fs from "node:fs";
import path from "node:path";
import { computeSha256FromContent } from "./checksum.js";
import type { ReleaseFileEntry, ReleaseRecord } from "../types/pipeline.js";

export const RELEASE_DIR = "release";
export const RELEASE_RECORD_FILE = "release.json";

export function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

/**
 * Release Writer: manages runs/{run_id}/release/.
 * Writes the pinned manifests and the validation report, tracks their sha256,
 * and finally writes release.json.
 */
export class ReleaseWriter {
  private files: ReleaseFileEntry[] = [];
  private readonly releaseDir: string;

  constructor(
    private readonly runsDir: string,
    private readonly runId: string,
  ) {
    this.releaseDir = path.join(runsDir, runId, RELEASE_DIR);
  }

  /** Ensure the release directory exists. */
  init(): void {
    fs.mkdirSync(this.releaseDir, { recursive: true });
  }

  /** Write a text file and track it. */
  writeText(
    relativePath: string,
    content: string,
    kind: ReleaseFileEntry["kind"],
    domain?: string,
  ): ReleaseFileEntry {
    const fullPath = path.resolve(this.releaseDir, relativePath);
    if (!isWithinDir(this.releaseDir, fullPath)) {
      throw new Error(`Release file path escapes release dir: ${relativePath}`);
    }

    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content, "utf8");

    const entry: ReleaseFileEntry = {
      path: path.relative(this.releaseDir, fullPath).split(path.sep).join("/"),
      sha256: computeSha256FromContent(content),
      bytes: Buffer.byteLength(content, "utf8"),
      kind,
      ...(domain ? { domain } : {}),
    };
    this.files.push(entry);
    return entry;
  }

  /** Write release.json. Returns its path. */
  writeRecord(record: ReleaseRecord): string {
    const recordPath = path.join(this.releaseDir, RELEASE_RECORD_FILE);
    fs.writeFileSync(recordPath, JSON.stringify(record, null, 2) + "\n", "utf8");
    return recordPath;
  }

  getFiles(): ReleaseFileEntry[] {
    return [...this.files];
  }
}
