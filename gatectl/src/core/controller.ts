import fs from "node:fs";
import type { DomainConfig } from "../types/config.js";
import type { DependencySource, InstalledPackage, ValidationReport } from "../types/packages.js";
import type {
  BuildOutcome,
  PipelineFailure,
  PipelineRun,
  PipelineState,
  PublishOutcome,
  ReleaseOutcome,
  ReleaseRecord,
  TestOutcome,
  VerifyResult,
} from "../types/pipeline.js";
import { diag, type Diagnostic, type DiagnosticSink } from "../types/diagnostic.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { nextState, isSuccess, type PipelineEvent } from "./state-machine.js";
import { makeRunId, saveRun, statePathForRun } from "./run-store.js";
import { errorMessage } from "./errors.js";
import { reconcileDomains, type DomainInput } from "../reconcile/reconciler.js";
import { report, missingItems } from "../report/reporter.js";
import { assembleRelease } from "../artifact-writer/release-record.js";
import { SnapshotUnavailableError } from "../snapshot/errors.js";

/**
 * External collaborators. Each returns a definite outcome; a thrown error is
 * treated as that stage failing. The controller never retries and sets no
 * timeouts of its own.
 */
export interface PipelineCollaborators {
  build(runId: string): Promise<BuildOutcome>;
  runTests(artifactId: string): Promise<TestOutcome>;
  captureSnapshot(artifactId: string, domain: DomainConfig): Promise<InstalledPackage[]>;
  publish(artifactId: string): Promise<PublishOutcome>;
  createRelease(record: ReleaseRecord, recordPath: string): Promise<ReleaseOutcome>;
}

/** A domain's config with its declared-dependency sources, read once per run. */
export type DomainPlan = {
  config: DomainConfig;
  sources: DependencySource[];
};

export type ControllerOptions = {
  runsDir: string;
  domains: DomainPlan[];
  collaborators: PipelineCollaborators;
  schemas: SchemaRegistry;
  onDiagnostic?: DiagnosticSink;
  now?: () => Date;
};

export type RunOutcome = {
  ok: boolean;
  final_state: PipelineState;
  run: PipelineRun;
  failures: PipelineFailure[];
  state_path: string;
};

type StageResult<T> = { ok: true; value: T } | { ok: false; error: string };

async function attempt<T extends { ok: boolean }>(fn: () => Promise<T>): Promise<T | { ok: false; error: string }> {
  try {
    return await fn();
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}

/**
 * Pipeline Controller: drives one run through the gated release state machine.
 *
 * Build → Verify (tests ‖ package validation) → Publish → Release. Publish is
 * never reached while any verification stage failed unless the run is
 * bypassed; a bypassed run skips Verify entirely and never creates a release
 * record. State is persisted to runs/{run_id}/state.json after each transition.
 */
export class PipelineController {
  private readonly opts: ControllerOptions;

  constructor(opts: ControllerOptions) {
    this.opts = opts;
  }

  async run(opts: { runId?: string; bypass?: boolean } = {}): Promise<RunOutcome> {
    const bypass = opts.bypass ?? false;
    const runId = opts.runId ?? makeRunId(this.now());
    const statePath = statePathForRun(this.opts.runsDir, runId);
    if (fs.existsSync(statePath)) {
      throw new Error(`Run already exists: ${runId}`);
    }

    const startedAt = this.now().toISOString();
    const run: PipelineRun = {
      run_id: runId,
      artifact_id: null,
      state: "Pending",
      verify_bypassed: bypass,
      verify_result: null,
      published: false,
      release_created: false,
      release_id: null,
      failures: [],
      started_at: startedAt,
      updated_at: startedAt,
      history: [],
    };
    saveRun(statePath, run);

    const collab = this.opts.collaborators;
    const step = (event: PipelineEvent) => this.transition(run, event, statePath);
    const finish = (): RunOutcome => ({
      ok: isSuccess(run.state),
      final_state: run.state,
      run,
      failures: run.failures,
      state_path: statePath,
    });

    step("start");

    const build = await attempt(() => collab.build(runId));
    if (!build.ok) {
      this.fail(run, { kind: "BuildFailure", stage: "build", message: build.error });
      step("build_failed");
      return finish();
    }
    run.artifact_id = build.artifactId;
    step("build_succeeded");
    const artifactId = build.artifactId;

    let verified: VerifyResult | null = null;
    if (bypass) {
      this.emit(
        diag("warn", "QUALITY_GATE_WAIVED", "Verification bypassed: notebook tests and package validation did not run", {
          run_id: runId,
          artifact_id: artifactId,
        }),
      );
    } else {
      const verify = await this.verify(artifactId);
      run.verify_result = verify.result;
      verified = verify.result;
      if (verify.failures.length > 0) {
        for (const f of verify.failures) this.fail(run, f);
        step("verify_failed");
        return finish();
      }
      step("verify_passed");
    }

    const published = await attempt(() => collab.publish(artifactId));
    if (!published.ok) {
      this.fail(run, { kind: "PublishFailure", stage: "publish", message: published.error });
      step("publish_failed");
      return finish();
    }
    run.published = true;
    step("publish_succeeded");

    // bypassed runs are Released here, without a release record
    if (!verified) return finish();

    const release = await this.release(run, verified);
    if (!release.ok) {
      this.fail(run, { kind: "ReleaseCreationFailure", stage: "release", message: release.error });
      step("release_failed");
      return finish();
    }
    run.release_id = release.value;
    run.release_created = true;
    step("release_created");
    return finish();
  }

  /** Fan out tests and package validation against the same artifact, then join. */
  private async verify(artifactId: string): Promise<{ result: VerifyResult; failures: PipelineFailure[] }> {
    const [tests, validation] = await Promise.all([this.testStage(artifactId), this.validationStage(artifactId)]);
    return {
      result: validation.report ? { tests: tests.outcome, validation: validation.report } : { tests: tests.outcome },
      failures: [...tests.failures, ...validation.failures],
    };
  }

  private async testStage(artifactId: string): Promise<{ outcome: TestOutcome; failures: PipelineFailure[] }> {
    let outcome: TestOutcome;
    try {
      outcome = await this.opts.collaborators.runTests(artifactId);
    } catch (e) {
      outcome = { pass: false, log: errorMessage(e) };
    }
    if (outcome.pass) return { outcome, failures: [] };

    const failed = outcome.result?.failures.map((f) => f.name) ?? [];
    return {
      outcome,
      failures: [
        {
          kind: "TestExecutionFailure",
          stage: "test",
          message: failed.length > 0 ? `Notebook tests failed: ${failed.join(", ")}` : "Notebook tests failed",
          details: { log: outcome.log },
        },
      ],
    };
  }

  private async validationStage(
    artifactId: string,
  ): Promise<{ report?: ValidationReport; failures: PipelineFailure[] }> {
    const captures = await Promise.all(
      this.opts.domains.map(async (plan): Promise<{ plan: DomainPlan; installed: StageResult<InstalledPackage[]> }> => {
        try {
          const installed = await this.opts.collaborators.captureSnapshot(artifactId, plan.config);
          return { plan, installed: { ok: true, value: installed } };
        } catch (e) {
          const reason = e instanceof SnapshotUnavailableError ? e.message : `Snapshot capture failed: ${errorMessage(e)}`;
          return { plan, installed: { ok: false, error: reason } };
        }
      }),
    );

    const failures: PipelineFailure[] = [];
    const inputs: DomainInput[] = [];
    for (const { plan, installed } of captures) {
      if (!installed.ok) {
        failures.push({ kind: "SnapshotUnavailable", stage: "validation", domain: plan.config.name, message: installed.error });
        continue;
      }
      inputs.push({
        domain: plan.config.name,
        sources: plan.sources,
        installed: installed.value,
        bundledPriorities: plan.config.bundled_priorities,
      });
    }
    if (failures.length > 0) return { failures };

    const validation = report(reconcileDomains(inputs));
    for (const [domain, result] of Object.entries(validation.domains)) {
      if (result.status === "complete") continue;
      failures.push({
        kind: "PackageValidationFailure",
        stage: "validation",
        domain,
        message: `${result.missing.length} declared package(s) missing in ${domain}: ${result.missing.map((m) => m.name).join(", ")}`,
        details: { missing: missingItems(validation).filter((m) => m.domain === domain) },
      });
    }
    return { report: validation, failures };
  }

  private async release(run: PipelineRun, verify: VerifyResult): Promise<StageResult<string>> {
    try {
      const { record, recordPath } = await assembleRelease({
        runsDir: this.opts.runsDir,
        run,
        verify,
        domains: this.opts.domains.map((d) => d.config),
        schemas: this.opts.schemas,
        now: this.opts.now,
      });
      const created = await this.opts.collaborators.createRelease(record, recordPath);
      return created.ok ? { ok: true, value: created.releaseId } : { ok: false, error: created.error };
    } catch (e) {
      return { ok: false, error: errorMessage(e) };
    }
  }

  private transition(run: PipelineRun, event: PipelineEvent, statePath: string): void {
    const from = run.state;
    const to = nextState(from, event, { bypass: run.verify_bypassed });
    const at = this.now().toISOString();
    run.state = to;
    run.updated_at = at;
    run.history.push({ from, to, at });
    saveRun(statePath, run);
    this.emit(diag("info", "STATE_CHANGED", `${from} -> ${to}`, { run_id: run.run_id, event }));
  }

  private fail(run: PipelineRun, failure: PipelineFailure): void {
    run.failures.push(failure);
    this.emit(
      diag("error", failure.kind, failure.message, {
        run_id: run.run_id,
        stage: failure.stage,
        ...(failure.domain ? { domain: failure.domain } : {}),
      }),
    );
  }

  private emit(d: Diagnostic): void {
    this.opts.onDiagnostic?.(d);
  }

  private now(): Date {
    return (this.opts.now ?? (() => new Date()))();
  }
}
