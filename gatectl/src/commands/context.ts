import type { GateConfig } from "../types/config.js";
import type { DomainPlan } from "../core/controller.js";
import { loadConfig, type LoadConfigResult } from "../config/validator.js";
import { loadDomainSources } from "../manifest/sources.js";
import { errorMessage } from "../core/errors.js";

export type ConfigOptions = {
  configDir?: string;
  envName?: string;
  baseDir?: string;
  env?: NodeJS.ProcessEnv;
};

export type ContextResult =
  | { ok: true; config: GateConfig; plans: DomainPlan[] }
  | { ok: false; code: string; error: string };

/** Load the config and read every domain's declared-dependency documents. */
export async function loadContext(opts: ConfigOptions): Promise<ContextResult> {
  let loaded: LoadConfigResult;
  try {
    loaded = await loadConfig(opts);
  } catch (e) {
    return { ok: false, code: "CONFIG_READ_FAILED", error: errorMessage(e) };
  }
  if (!loaded.ok) return { ok: false, code: "CONFIG_INVALID", error: loaded.error };

  const config = loaded.config;
  const plans: DomainPlan[] = [];
  for (const domain of config.domains) {
    try {
      plans.push({ config: domain, sources: loadDomainSources(domain, config.repo_root) });
    } catch (e) {
      return { ok: false, code: "SOURCES_UNREADABLE", error: `${domain.name}: ${errorMessage(e)}` };
    }
  }
  return { ok: true, config, plans };
}

/** Restrict plans to the named domains, keeping config order. */
export function selectPlans(plans: DomainPlan[], names?: string[]): { ok: true; plans: DomainPlan[] } | { ok: false; error: string } {
  if (!names || names.length === 0) return { ok: true, plans };
  const known = new Set(plans.map((p) => p.config.name));
  const unknown = names.filter((n) => !known.has(n));
  if (unknown.length > 0) return { ok: false, error: `Unknown domain(s): ${unknown.join(", ")}` };
  return { ok: true, plans: plans.filter((p) => names.includes(p.config.name)) };
}
