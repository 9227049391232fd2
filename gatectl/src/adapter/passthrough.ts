import fs from "node:fs";
import type { TestFailure, TestResult } from "../types/adapter-output.js";
import { isRecord } from "../manifest/common.js";

function num(value: unknown): number {
  return typeof value === "number" ? value : 0;
}

function failuresOf(value: unknown): TestFailure[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map((f) => ({
    name: String(f.name ?? "unknown"),
    message: String(f.message ?? ""),
    ...(typeof f.stacktrace === "string" ? { stacktrace: f.stacktrace } : {}),
  }));
}

/**
 * Passthrough adapter: reads a JSON file that already conforms to TestResult.
 * Validates required fields exist.
 */
export function passthroughJson(filePath: string): TestResult {
  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

  if (!isRecord(data) || typeof data.pass !== "boolean" || typeof data.total !== "number") {
    throw new Error(`Invalid test result JSON: missing required fields in ${filePath}`);
  }

  return {
    pass: data.pass,
    total: data.total,
    passed: num(data.passed),
    failed: num(data.failed),
    skipped: num(data.skipped),
    duration_ms: num(data.duration_ms),
    failures: failuresOf(data.failures),
  };
}
