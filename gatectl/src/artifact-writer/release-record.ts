import type { DomainConfig } from "../types/config.js";
import type { PinRecord, ValidationReport } from "../types/packages.js";
import type {
  PipelineRun,
  ReleaseDomainSummary,
  ReleaseFileEntry,
  ReleaseRecord,
  TestOutcome,
  VerifyResult,
} from "../types/pipeline.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { emit } from "../pins/emitter.js";
import { emitOptionsFor, renderDomainManifests } from "../pins/manifests.js";
import { renderReport } from "../report/reporter.js";
import { ReleaseWriter } from "./writer.js";

export const RELEASE_RECORD_SCHEMA_VERSION = "1.0.0";
export const VALIDATION_REPORT_FILE = "validation-report.txt";

export type ReleaseRecordInput = {
  run_id: string;
  artifact_id: string;
  created_at: string;
  validation: ValidationReport;
  tests: TestOutcome;
  domains: DomainConfig[];
  pins: PinRecord[];
  files: ReleaseFileEntry[];
};

/** Build the release record from its parts. */
export function buildReleaseRecord(input: ReleaseRecordInput): ReleaseRecord {
  const domains: ReleaseDomainSummary[] = input.domains.map((d) => {
    const result = input.validation.domains[d.name];
    return {
      name: d.name,
      pin_format: d.pin_format,
      pinned_file: d.pinned_file,
      pins: input.pins.filter((p) => p.domain === d.name).length,
      declared: result ? result.declared.length : 0,
      found: result ? result.present.length : 0,
      status: result ? result.status : "complete",
    };
  });

  const r = input.tests.result;
  return {
    schema_version: RELEASE_RECORD_SCHEMA_VERSION,
    run_id: input.run_id,
    artifact_id: input.artifact_id,
    created_at: input.created_at,
    all_passed: input.validation.all_passed,
    tests: {
      pass: input.tests.pass,
      total: r ? r.total : null,
      passed: r ? r.passed : null,
      failed: r ? r.failed : null,
    },
    domains,
    files: input.files,
  };
}

export type AssembleReleaseInput = {
  runsDir: string;
  run: PipelineRun;
  verify: VerifyResult;
  domains: DomainConfig[];
  schemas: SchemaRegistry;
  now?: () => Date;
};

/**
 * Assemble the release record of a verified, published run: pinned manifests
 * per domain, the validation report, and release.json listing both with their
 * sha256. The record is schema-checked before it is written.
 */
export async function assembleRelease(input: AssembleReleaseInput): Promise<{ record: ReleaseRecord; recordPath: string }> {
  const { run, verify, domains } = input;
  const validation = verify.validation;
  if (!run.artifact_id) throw new Error("Run has no artifact to release");
  if (!validation) throw new Error("Run has no validation report to attach");

  const results = new Map(
    domains.flatMap((d) => {
      const result = validation.domains[d.name];
      return result ? [[d.name, result] as const] : [];
    }),
  );
  const pins = emit(results, emitOptionsFor(domains));

  const writer = new ReleaseWriter(input.runsDir, run.run_id);
  writer.init();

  for (const d of domains) {
    for (const m of renderDomainManifests(d, pins)) {
      writer.writeText(m.file, m.text, m.kind, d.name);
    }
  }

  const labels = Object.fromEntries(domains.map((d) => [d.name, d.label ?? d.name]));
  writer.writeText(VALIDATION_REPORT_FILE, renderReport(validation, labels), "validation-report");

  const record = buildReleaseRecord({
    run_id: run.run_id,
    artifact_id: run.artifact_id,
    created_at: (input.now ?? (() => new Date()))().toISOString(),
    validation,
    tests: verify.tests,
    domains,
    pins,
    files: writer.getFiles(),
  });

  const check = await input.schemas.validate("release-record", record);
  if (!check.valid) {
    throw new Error(`Release record invalid: ${check.errors ?? "unknown error"}`);
  }

  return { record, recordPath: writer.writeRecord(record) };
}
