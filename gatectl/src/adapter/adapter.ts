import path from "node:path";
import { parseJunitXmlFile } from "./junit-xml.js";
import { passthroughJson } from "./passthrough.js";
import type { TestResult } from "../types/adapter-output.js";

export type ResultFormat = "junit_xml" | "json";

/** Detect result format from file extension. */
export function detectFormat(filePath: string): ResultFormat | null {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".xml") return "junit_xml";
  if (ext === ".json") return "json";
  return null;
}

/**
 * Read the notebook test stage's result file, routed by format.
 *
 * @param format - Explicit format override. Auto-detected from extension if omitted.
 */
export function adaptTestResult(filePath: string, format?: ResultFormat): TestResult {
  const resolved = format ?? detectFormat(filePath);
  switch (resolved) {
    case "junit_xml":
      return parseJunitXmlFile(filePath);
    case "json":
      return passthroughJson(filePath);
    default:
      throw new Error(`Unsupported test result format: ${path.basename(filePath)}`);
  }
}
