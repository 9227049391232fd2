import fs from "node:fs";
import path from "node:path";
import type { GateConfig } from "../types/config.js";
import type { TestOutcome } from "../types/pipeline.js";
import { adaptTestResult } from "../adapter/adapter.js";
import { captureSnapshot as captureFromArtifact } from "../snapshot/capture.js";
import { GitOperations } from "../git/operations.js";
import { runCommand, substitute, type CommandResult, type CommandRunner } from "./exec.js";
import { errorMessage } from "./errors.js";
import type { PipelineCollaborators } from "./controller.js";

export const DEFAULT_TAG_PREFIX = "release-";

/** The part of GitOperations release tagging needs. */
export type ReleaseTagger = Pick<GitOperations, "tagExists" | "createTag">;

function failureText(label: string, res: CommandResult): string {
  const detail = res.stderr.trim() || res.error || `exit code ${res.exitCode ?? "unknown"}`;
  return `${label} failed: ${detail}`;
}

/**
 * Collaborators backed by the shell commands in config. Every command runs in
 * repo_root with `{artifact}` (and `{run_id}` for build) substituted.
 */
export function commandCollaborators(
  config: GateConfig,
  opts: { exec?: CommandRunner; git?: ReleaseTagger } = {},
): PipelineCollaborators {
  const exec = opts.exec ?? runCommand;
  const cwd = config.repo_root;
  const pipeline = config.pipeline;

  return {
    async build(runId) {
      const artifactId = substitute(config.artifact_ref, { run_id: runId });
      const res = await exec(substitute(pipeline.build, { artifact: artifactId, run_id: runId }), { cwd });
      return res.ok ? { ok: true, artifactId } : { ok: false, error: failureText("Build", res) };
    },

    async runTests(artifactId): Promise<TestOutcome> {
      // Results must come from this run's test command, never an earlier one.
      const resultsPath = pipeline.test_results ? path.resolve(cwd, pipeline.test_results) : null;
      if (resultsPath) fs.rmSync(resultsPath, { force: true });

      const res = await exec(substitute(pipeline.test, { artifact: artifactId }), { cwd });
      const log = [res.stdout, res.stderr].filter((s) => s.length > 0).join("\n");
      if (!resultsPath) {
        return { pass: res.ok, log: res.ok ? log : `${log}\n${failureText("Notebook tests", res)}`.trim() };
      }

      if (!fs.existsSync(resultsPath)) {
        return { pass: false, log: `${log}\nTest results not found: ${resultsPath}`.trim() };
      }
      try {
        const result = adaptTestResult(resultsPath);
        return { pass: res.ok && result.pass, log, result };
      } catch (e) {
        return { pass: false, log: `${log}\n${errorMessage(e)}`.trim() };
      }
    },

    captureSnapshot(artifactId, domain) {
      return captureFromArtifact(artifactId, domain, { cwd, exec });
    },

    async publish(artifactId) {
      const res = await exec(substitute(pipeline.publish, { artifact: artifactId }), { cwd });
      return res.ok ? { ok: true, location: artifactId } : { ok: false, error: failureText("Publish", res) };
    },

    async createRelease(record, recordPath) {
      if (!config.release?.tag) return { ok: true, releaseId: recordPath };

      const git = opts.git ?? new GitOperations(cwd);
      const tag = `${config.release.tag_prefix ?? DEFAULT_TAG_PREFIX}${record.run_id}`;
      try {
        if (await git.tagExists(tag)) return { ok: false, error: `Tag already exists: ${tag}` };
        await git.createTag(tag, `Release ${record.artifact_id} (run ${record.run_id})`);
        return { ok: true, releaseId: tag };
      } catch (e) {
        return { ok: false, error: `Tagging ${tag} failed: ${errorMessage(e)}` };
      }
    },
  };
}
