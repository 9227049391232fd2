import type { ReconciliationResult, ValidationReport } from "../types/packages.js";

const RULE = "=".repeat(70);

/** Aggregate per-domain results; `all_passed` holds iff every domain is complete. */
export function report(results: Map<string, ReconciliationResult>): ValidationReport {
  const domains: Record<string, ReconciliationResult> = {};
  let allPassed = true;
  for (const [domain, result] of results) {
    domains[domain] = result;
    if (result.missing.length > 0) allPassed = false;
  }
  return { domains, all_passed: allPassed };
}

export type MissingItem = {
  domain: string;
  name: string;
  declaredIn: string[];
};

/** Every missing package across domains, in report order. */
export function missingItems(validation: ValidationReport): MissingItem[] {
  const items: MissingItem[] = [];
  for (const [domain, result] of Object.entries(validation.domains)) {
    for (const m of result.missing) items.push({ domain, name: m.name, declaredIn: [...m.declaredIn] });
  }
  return items;
}

function renderDomain(domain: string, result: ReconciliationResult, label: string): string[] {
  const lines = [
    RULE,
    `${label} Validation Report`,
    RULE,
    "",
    `declared ${result.declared.length}, found ${result.present.length}, missing ${result.missing.length}`,
  ];

  for (const g of result.groups) {
    lines.push(`  ${g.group === g.source ? g.source : `${g.group} (${g.source})`}: declared ${g.declared}, found ${g.found}`);
  }

  lines.push("");
  if (result.status === "complete") {
    lines.push("STATUS: SUCCESS");
  } else {
    lines.push("STATUS: FAILED");
    lines.push("");
    lines.push(`Missing packages (${domain}):`);
    for (const m of result.missing) {
      lines.push(`  - ${m.name}`);
      lines.push(`    Found in: ${m.declaredIn.join(", ")}`);
    }
  }
  lines.push("");
  return lines;
}

/**
 * Human-readable itemization: per domain the declared/found/missing counts,
 * the status, and the literal list of missing names when it failed.
 */
export function renderReport(validation: ValidationReport, labels: Record<string, string> = {}): string {
  const lines: string[] = [];
  for (const [domain, result] of Object.entries(validation.domains)) {
    lines.push(...renderDomain(domain, result, labels[domain] ?? domain));
  }
  lines.push(RULE);
  lines.push(`OVERALL: ${validation.all_passed ? "SUCCESS" : "FAILED"}`);
  lines.push(RULE);
  return lines.join("\n") + "\n";
}
