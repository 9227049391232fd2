import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import type { PipelineRun, PipelineState } from "../types/pipeline.js";
import { isRecord } from "../manifest/common.js";

export const STATE_FILE = "state.json";

const STATES: ReadonlySet<string> = new Set<PipelineState>([
  "Pending",
  "Building",
  "Verifying",
  "Publishing",
  "ReleasePending",
  "Released",
  "BuildFailed",
  "VerifyFailed",
  "PublishFailed",
  "ReleaseFailed",
]);

export function makeRunId(now: Date = new Date()): string {
  const ts = now.toISOString().replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(6).toString("hex")}`;
}

export function statePathForRun(runsDir: string, runId: string): string {
  return path.join(runsDir, runId, STATE_FILE);
}

export function isPipelineRun(value: unknown): value is PipelineRun {
  return (
    isRecord(value) &&
    typeof value.run_id === "string" &&
    typeof value.state === "string" &&
    STATES.has(value.state) &&
    typeof value.verify_bypassed === "boolean" &&
    Array.isArray(value.history) &&
    Array.isArray(value.failures)
  );
}

export function saveRun(statePath: string, run: PipelineRun): void {
  fs.mkdirSync(path.dirname(statePath), { recursive: true });
  fs.writeFileSync(statePath, JSON.stringify(run, null, 2) + "\n", "utf8");
}

export type LoadRunResult = { ok: true; run: PipelineRun } | { ok: false; error: string };

export function loadRun(runsDir: string, runId: string): LoadRunResult {
  const statePath = statePathForRun(runsDir, runId);
  if (!fs.existsSync(statePath)) {
    return { ok: false, error: `No run found: ${runId}` };
  }
  try {
    const data: unknown = JSON.parse(fs.readFileSync(statePath, "utf8"));
    if (!isPipelineRun(data)) return { ok: false, error: `Corrupted run state: ${statePath}` };
    return { ok: true, run: data };
  } catch (e) {
    return { ok: false, error: `Failed to read state: ${e instanceof Error ? e.message : String(e)}` };
  }
}

export type RunSummary = { id: string; state: string; updated_at: string };

/**
 * List all runs with their current state, most recently updated first.
 */
export function listRuns(runsDir: string): RunSummary[] {
  if (!fs.existsSync(runsDir)) return [];

  const results: RunSummary[] = [];
  for (const entry of fs.readdirSync(runsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    if (!fs.existsSync(statePathForRun(runsDir, entry.name))) continue;

    const res = loadRun(runsDir, entry.name);
    results.push(
      res.ok
        ? { id: entry.name, state: res.run.state, updated_at: res.run.updated_at }
        : { id: entry.name, state: "corrupted", updated_at: "" },
    );
  }

  return results.sort((a, b) => b.updated_at.localeCompare(a.updated_at));
}
