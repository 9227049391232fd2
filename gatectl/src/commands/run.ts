import type { RunOutcome } from "../core/controller.js";
import { PipelineController } from "../core/controller.js";
import { commandCollaborators } from "../core/collaborators.js";
import { createRegistry } from "../schema/registry.js";
import type { DiagnosticSink } from "../types/diagnostic.js";
import { errorMessage } from "../core/errors.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";
import { loadContext, type ConfigOptions } from "./context.js";

export type RunCommandResult =
  | { ok: true; exitCode: ExitCode; outcome: RunOutcome }
  | { ok: false; exitCode: ExitCode; code: string; error: string };

/** Load config and drive one pipeline run through the controller. */
export async function runPipeline(
  opts: ConfigOptions & { runId?: string; bypass?: boolean; onDiagnostic?: DiagnosticSink },
): Promise<RunCommandResult> {
  const ctx = await loadContext(opts);
  if (!ctx.ok) return { ok: false, exitCode: EXIT.INVALID_ARGS, code: ctx.code, error: ctx.error };

  const controller = new PipelineController({
    runsDir: ctx.config.runs_dir,
    domains: ctx.plans,
    collaborators: commandCollaborators(ctx.config),
    schemas: await createRegistry(),
    onDiagnostic: opts.onDiagnostic,
  });

  try {
    const outcome = await controller.run({ runId: opts.runId, bypass: opts.bypass });
    return { ok: true, exitCode: exitCodeFor(outcome.final_state), outcome };
  } catch (e) {
    return { ok: false, exitCode: EXIT.INVALID_ARGS, code: "RUN_REJECTED", error: errorMessage(e) };
  }
}
