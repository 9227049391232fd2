import { XMLParser } from "fast-xml-parser";
import fs from "node:fs";
import type { TestResult, TestFailure } from "../types/adapter-output.js";
import { isRecord } from "../manifest/common.js";

type XmlNode = Record<string, unknown>;

function nodes(value: unknown): XmlNode[] {
  const list = Array.isArray(value) ? value : value === undefined ? [] : [value];
  return list.map((v) => (isRecord(v) ? v : { "#text": String(v) }));
}

function attr(node: XmlNode, name: string): string | undefined {
  const v = node[`@_${name}`];
  return v === undefined ? undefined : String(v);
}

function int(node: XmlNode, name: string): number {
  const n = parseInt(attr(node, name) ?? "0", 10);
  return Number.isNaN(n) ? 0 : n;
}

function toFailure(name: string, node: XmlNode): TestFailure {
  const text = node["#text"] === undefined ? undefined : String(node["#text"]);
  return { name, message: attr(node, "message") ?? text ?? "", stacktrace: text };
}

/**
 * Parse JUnit XML (as written by pytest --nbval or nbmake) into a TestResult.
 */
export function parseJunitXml(xmlContent: string): TestResult {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    isArray: (name) => name === "testsuite" || name === "testcase" || name === "failure" || name === "error",
  });

  const parsed: unknown = parser.parse(xmlContent);
  const root = isRecord(parsed) ? parsed : {};

  // Handle both <testsuites> wrapper and single <testsuite>
  const wrapper = isRecord(root.testsuites) ? root.testsuites : root;
  const suites = nodes(wrapper.testsuite);

  let total = 0;
  let failed = 0;
  let skipped = 0;
  let durationSec = 0;
  const failures: TestFailure[] = [];

  for (const suite of suites) {
    total += int(suite, "tests");
    failed += int(suite, "failures") + int(suite, "errors");
    skipped += int(suite, "skipped");
    durationSec += parseFloat(attr(suite, "time") ?? "0") || 0;

    for (const tc of nodes(suite.testcase)) {
      const tcName = attr(tc, "name") ?? "unknown";
      const tcClass = attr(tc, "classname") ?? "";
      const fullName = tcClass ? `${tcClass}.${tcName}` : tcName;

      for (const f of nodes(tc.failure)) failures.push(toFailure(fullName, f));
      for (const e of nodes(tc.error)) failures.push(toFailure(fullName, e));
    }
  }

  return {
    pass: failed === 0,
    total,
    passed: Math.max(0, total - failed - skipped),
    failed,
    skipped,
    duration_ms: Math.round(durationSec * 1000),
    failures,
  };
}

/** Read a JUnit XML file and return normalized TestResult. */
export function parseJunitXmlFile(filePath: string): TestResult {
  return parseJunitXml(fs.readFileSync(filePath, "utf8"));
}
