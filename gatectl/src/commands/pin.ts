import type { InstalledPackage, PinRecord } from "../types/packages.js";
import { reconcileDomains } from "../reconcile/reconciler.js";
import { emit } from "../pins/emitter.js";
import { emitOptionsFor, pipSiblingPath, renderDomainManifests, type RenderedManifest } from "../pins/manifests.js";
import { writeToSink, type OutputSink } from "../pins/sink.js";
import { readSnapshotPath } from "../snapshot/capture.js";
import { errorMessage } from "../core/errors.js";
import { loadContext, selectPlans, type ConfigOptions } from "./context.js";

export type PinResult =
  | { ok: true; pins: PinRecord[]; missing: string[]; text: string; pip: RenderedManifest | null }
  | { ok: false; error: string };

/**
 * Emit the pinned manifest of one domain from a saved snapshot. Packages
 * declared but not installed produce no pin and are returned as `missing`.
 * Pip requirements of a conda domain go beside the output file, or follow the
 * manifest on stdout.
 */
export async function pin(
  opts: ConfigOptions & { domain: string; snapshot: string; sink: OutputSink },
): Promise<PinResult> {
  const ctx = await loadContext(opts);
  if (!ctx.ok) return { ok: false, error: ctx.error };
  const selected = selectPlans(ctx.plans, [opts.domain]);
  if (!selected.ok) return selected;
  const [plan] = selected.plans;
  if (!plan) return { ok: false, error: `Unknown domain(s): ${opts.domain}` };
  const domain = plan.config;

  let installed: InstalledPackage[];
  try {
    installed = readSnapshotPath(domain, opts.snapshot);
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }

  const results = reconcileDomains([
    { domain: domain.name, sources: plan.sources, installed, bundledPriorities: domain.bundled_priorities },
  ]);
  let pins: PinRecord[];
  let manifests: RenderedManifest[];
  try {
    pins = emit(results, emitOptionsFor([domain]));
    manifests = renderDomainManifests(domain, pins);
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
  const [main, pip = null] = manifests;
  if (!main) return { ok: false, error: `No manifest rendered for domain ${domain.name}` };

  try {
    writeToSink(opts.sink, main.text);
    if (pip) {
      const pipSink: OutputSink =
        opts.sink.kind === "file" ? { kind: "file", path: pipSiblingPath(opts.sink.path) } : opts.sink;
      writeToSink(pipSink, pip.text);
    }
  } catch (e) {
    return { ok: false, error: `Failed to write pins: ${errorMessage(e)}` };
  }
  const missing = results.get(domain.name)?.missing.map((m) => m.name) ?? [];
  return { ok: true, pins, missing, text: main.text, pip };
}
