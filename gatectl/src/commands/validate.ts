import type { ValidationReport } from "../types/packages.js";
import { reconcileDomains, type DomainInput } from "../reconcile/reconciler.js";
import { report, renderReport } from "../report/reporter.js";
import { readSnapshotPath } from "../snapshot/capture.js";
import { errorMessage } from "../core/errors.js";
import { loadContext, selectPlans, type ConfigOptions } from "./context.js";

export type ValidatePackagesResult =
  | { ok: true; report: ValidationReport; text: string }
  | { ok: false; error: string };

/** Split `domain=path` snapshot arguments. */
export function parseSnapshotArgs(args: string[]): { ok: true; snapshots: Map<string, string> } | { ok: false; error: string } {
  const snapshots = new Map<string, string>();
  for (const arg of args) {
    const eq = arg.indexOf("=");
    if (eq <= 0 || eq === arg.length - 1) return { ok: false, error: `Expected <domain>=<path>, got: ${arg}` };
    snapshots.set(arg.slice(0, eq), arg.slice(eq + 1));
  }
  return { ok: true, snapshots };
}

/**
 * Validate saved snapshots against the declared dependencies of each domain
 * named in `snapshots`, and render the report.
 */
export async function validatePackages(
  opts: ConfigOptions & { snapshots: Map<string, string> },
): Promise<ValidatePackagesResult> {
  if (opts.snapshots.size === 0) return { ok: false, error: "No snapshots given" };
  const ctx = await loadContext(opts);
  if (!ctx.ok) return { ok: false, error: ctx.error };
  const selected = selectPlans(ctx.plans, [...opts.snapshots.keys()]);
  if (!selected.ok) return selected;

  const inputs: DomainInput[] = [];
  for (const plan of selected.plans) {
    const snapshotPath = opts.snapshots.get(plan.config.name);
    if (!snapshotPath) continue;
    try {
      inputs.push({
        domain: plan.config.name,
        sources: plan.sources,
        installed: readSnapshotPath(plan.config, snapshotPath),
        bundledPriorities: plan.config.bundled_priorities,
      });
    } catch (e) {
      return { ok: false, error: errorMessage(e) };
    }
  }

  const validation = report(reconcileDomains(inputs));
  const labels = Object.fromEntries(selected.plans.map((p) => [p.config.name, p.config.label ?? p.config.name]));
  return { ok: true, report: validation, text: renderReport(validation, labels) };
}
