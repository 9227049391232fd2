#!/usr/bin/env node

import { Command } from "commander";
import type { Diagnostic } from "./types/diagnostic.js";
import { runPipeline } from "./commands/run.js";
import { pin } from "./commands/pin.js";
import { validatePackages, parseSnapshotArgs } from "./commands/validate.js";
import { status, listAllRuns } from "./commands/status.js";
import { checkAll } from "./commands/check.js";
import { EXIT } from "./commands/exit-codes.js";
import { sinkFromArg, writeToSink } from "./pins/sink.js";
import { pipSiblingPath } from "./pins/manifests.js";

type Format = "human" | "jsonl";

type ConfigFlags = { config?: string; env?: string; format: Format };

function configOptions(opts: ConfigFlags) {
  return { configDir: opts.config, envName: opts.env };
}

function printDiagnostic(format: Format, d: Diagnostic): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify(d) + "\n");
    return;
  }
  const line = `[${d.level}] ${d.code}: ${d.message}`;
  if (d.level === "info") console.log(line);
  else console.error(line);
}

function fail(format: Format, code: string, message: string, exitCode: number): never {
  printDiagnostic(format, { level: "error", code, message });
  process.exit(exitCode);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name("gatectl")
  .description("Gated image release pipeline: build, verify, publish, release with pinned provenance")
  .version("0.1.0");

program
  .command("run")
  .description("Run the pipeline: build, verify, publish, release")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay (e.g. ci)")
  .option("--run <id>", "Run id (default: generated)")
  .option("--bypass", "Skip verification (tests and package validation); no release record is created")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: ConfigFlags & { run?: string; bypass?: boolean }) => {
    const res = await runPipeline({
      ...configOptions(opts),
      runId: opts.run,
      bypass: opts.bypass,
      onDiagnostic: (d) => printDiagnostic(opts.format, d),
    });
    if (!res.ok) fail(opts.format, res.code, res.error, res.exitCode);

    const { outcome } = res;
    printDiagnostic(opts.format, {
      level: outcome.ok ? "info" : "error",
      code: "RUN_FINISHED",
      message: `Run ${outcome.run.run_id}: ${outcome.final_state}`,
      details: { run_id: outcome.run.run_id, state_path: outcome.state_path, release_id: outcome.run.release_id },
    });
    process.exit(res.exitCode);
  });

program
  .command("pin")
  .description("Emit a domain's pinned install manifest from a saved snapshot")
  .requiredOption("--domain <name>", "Domain to pin")
  .requiredOption("--snapshot <path>", "Snapshot file in the domain's format, or an R library directory")
  .option("--output <path>", "Output file ('-' for stdout)", "-")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: ConfigFlags & { domain: string; snapshot: string; output: string }) => {
    const sink = sinkFromArg(opts.output);
    const res = await pin({ ...configOptions(opts), domain: opts.domain, snapshot: opts.snapshot, sink });
    if (!res.ok) fail(opts.format, "PIN_FAILED", res.error, EXIT.INVALID_ARGS);

    // stdout may carry the manifest itself, so warnings go to stderr
    for (const name of res.missing) {
      console.error(`[warn] PACKAGE_NOT_INSTALLED: ${name} is declared but not installed; no pin emitted`);
    }
    if (sink.kind === "file") {
      printDiagnostic(opts.format, { level: "info", code: "PINS_WRITTEN", message: `${res.pins.length} pin(s) written to ${sink.path}` });
      if (res.pip) {
        printDiagnostic(opts.format, {
          level: "info",
          code: "PIP_REQUIREMENTS_WRITTEN",
          message: `pip requirements written to ${pipSiblingPath(sink.path)}`,
        });
      }
    }
  });

program
  .command("validate")
  .description("Validate saved snapshots against declared dependencies")
  .option("--snapshot <domain=path>", "Snapshot for a domain (repeatable)", collect, [])
  .option("--output <path>", "Report file ('-' for stdout)", "-")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: ConfigFlags & { snapshot: string[]; output: string }) => {
    const parsed = parseSnapshotArgs(opts.snapshot);
    if (!parsed.ok) fail(opts.format, "INVALID_ARGS", parsed.error, EXIT.INVALID_ARGS);

    const res = await validatePackages({ ...configOptions(opts), snapshots: parsed.snapshots });
    if (!res.ok) fail(opts.format, "VALIDATE_FAILED", res.error, EXIT.INVALID_ARGS);

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify(res.report) + "\n");
    } else {
      writeToSink(sinkFromArg(opts.output), res.text);
    }
    process.exit(res.report.all_passed ? EXIT.SUCCESS : EXIT.FAILED);
  });

program
  .command("status")
  .description("Show run state")
  .argument("[id]", "Run id (omit to list all)")
  .option("--runs-dir <path>", "Runs directory (default: runs_dir from config)")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (id: string | undefined, opts: ConfigFlags & { runsDir?: string }) => {
    if (id) {
      const res = await status({ ...configOptions(opts), runsDir: opts.runsDir, runId: id });
      if (!res.ok) fail(opts.format, "RUN_NOT_FOUND", res.error, EXIT.FAILED);
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify(res.run) + "\n");
      } else {
        console.log(JSON.stringify(res.run, null, 2));
      }
      return;
    }

    const res = await listAllRuns({ ...configOptions(opts), runsDir: opts.runsDir });
    if (!res.ok) fail(opts.format, "CONFIG_INVALID", res.error, EXIT.INVALID_ARGS);
    if (opts.format === "jsonl") {
      for (const item of res.runs) process.stdout.write(JSON.stringify(item) + "\n");
    } else {
      if (res.runs.length === 0) { console.log("No runs found."); return; }
      for (const item of res.runs) console.log(`${item.id}  ${item.state}  ${item.updated_at}`);
    }
  });

program
  .command("check-config")
  .description("Check config and declared-dependency documents, and optionally a run's release record")
  .option("--run <id>", "Verify the release record of this run")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: ConfigFlags & { run?: string }) => {
    const res = await checkAll({ ...configOptions(opts), runId: opts.run });
    if (!res.ok) {
      for (const err of res.errors) printDiagnostic(opts.format, err);
      process.exit(EXIT.INVALID_ARGS);
    }
    for (const d of res.diagnostics) printDiagnostic(opts.format, d);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
