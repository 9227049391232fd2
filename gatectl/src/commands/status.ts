import { loadRun, listRuns, type LoadRunResult, type RunSummary } from "../core/run-store.js";
import { loadConfig } from "../config/validator.js";
import type { ConfigOptions } from "./context.js";

/** Resolve the runs directory: an explicit path wins over the config's runs_dir. */
async function runsDirFor(opts: ConfigOptions & { runsDir?: string }): Promise<{ ok: true; dir: string } | { ok: false; error: string }> {
  if (opts.runsDir) return { ok: true, dir: opts.runsDir };
  const loaded = await loadConfig(opts);
  return loaded.ok ? { ok: true, dir: loaded.config.runs_dir } : { ok: false, error: loaded.error };
}

/** Read one run's persisted state. */
export async function status(opts: ConfigOptions & { runsDir?: string; runId: string }): Promise<LoadRunResult> {
  const dir = await runsDirFor(opts);
  if (!dir.ok) return dir;
  return loadRun(dir.dir, opts.runId);
}

export async function listAllRuns(
  opts: ConfigOptions & { runsDir?: string },
): Promise<{ ok: true; runs: RunSummary[] } | { ok: false; error: string }> {
  const dir = await runsDirFor(opts);
  if (!dir.ok) return dir;
  return { ok: true, runs: listRuns(dir.dir) };
}
