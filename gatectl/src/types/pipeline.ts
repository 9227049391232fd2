import type { TestResult } from "./adapter-output.js";
import type { ValidationReport } from "./packages.js";

/** Pipeline run state: persisted to runs/{run_id}/state.json after each transition. */
export type PipelineState =
  | "Pending"
  | "Building"
  | "Verifying"
  | "Publishing"
  | "ReleasePending"
  | "Released"
  | "BuildFailed"
  | "VerifyFailed"
  | "PublishFailed"
  | "ReleaseFailed";

export type FailureKind =
  | "BuildFailure"
  | "SnapshotUnavailable"
  | "TestExecutionFailure"
  | "PackageValidationFailure"
  | "PublishFailure"
  | "ReleaseCreationFailure";

export type PipelineStage = "build" | "test" | "validation" | "publish" | "release";

export type PipelineFailure = {
  kind: FailureKind;
  stage: PipelineStage;
  message: string;
  /** Domain the failure belongs to, for package validation and snapshot capture. */
  domain?: string;
  details?: Record<string, unknown>;
};

export type TestOutcome = {
  pass: boolean;
  log: string;
  result?: TestResult;
};

export type VerifyResult = {
  tests: TestOutcome;
  validation?: ValidationReport;
};

export type StateTransition = {
  from: PipelineState;
  to: PipelineState;
  at: string;
};

export type PipelineRun = {
  run_id: string;
  artifact_id: string | null;
  state: PipelineState;
  verify_bypassed: boolean;
  verify_result: VerifyResult | null;
  published: boolean;
  release_created: boolean;
  release_id: string | null;
  failures: PipelineFailure[];
  started_at: string;
  updated_at: string;
  history: StateTransition[];
};

export type BuildOutcome = { ok: true; artifactId: string } | { ok: false; error: string };

export type PublishOutcome = { ok: true; location?: string } | { ok: false; error: string };

export type ReleaseOutcome = { ok: true; releaseId: string } | { ok: false; error: string };

export type ReleaseFileEntry = {
  path: string;
  sha256: string;
  bytes: number;
  kind: "pinned-manifest" | "pip-requirements" | "validation-report";
  domain?: string;
};

export type ReleaseDomainSummary = {
  name: string;
  pin_format: string;
  pinned_file: string;
  pins: number;
  declared: number;
  found: number;
  status: string;
};

/** Release record: the provenance entry created after a verified publish. */
export type ReleaseRecord = {
  schema_version: string;
  run_id: string;
  artifact_id: string;
  created_at: string;
  all_passed: boolean;
  tests: {
    pass: boolean;
    total: number | null;
    passed: number | null;
    failed: number | null;
  };
  domains: ReleaseDomainSummary[];
  files: ReleaseFileEntry[];
};
