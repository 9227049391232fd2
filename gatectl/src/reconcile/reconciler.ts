import type {
  DependencySource,
  GroupSummary,
  InstalledPackage,
  MissingPackage,
  PresentPackage,
  ReconciliationResult,
} from "../types/packages.js";

/** Priority tags of packages that ship with the runtime and are never pinned. */
export const DEFAULT_BUNDLED_PRIORITIES = ["base", "recommended"];

export type ReconcileOptions = {
  bundledPriorities?: string[];
};

/**
 * Index a snapshot by exact name, dropping bundled entries first.
 * The first entry of a repeated name wins.
 */
export function indexInstalled(
  installed: InstalledPackage[],
  bundledPriorities: string[] = DEFAULT_BUNDLED_PRIORITIES,
): Map<string, InstalledPackage> {
  const bundled = new Set(bundledPriorities);
  const index = new Map<string, InstalledPackage>();
  for (const pkg of installed) {
    if (pkg.priority !== undefined && bundled.has(pkg.priority)) continue;
    if (!index.has(pkg.name)) index.set(pkg.name, pkg);
  }
  return index;
}

function reconcileDomain(
  domain: string,
  sources: DependencySource[],
  index: Map<string, InstalledPackage>,
): ReconciliationResult {
  const declared: string[] = [];
  const present: PresentPackage[] = [];
  const missing: MissingPackage[] = [];
  const missingByName = new Map<string, MissingPackage>();
  const groups: GroupSummary[] = [];
  const seen = new Set<string>();

  for (const source of sources) {
    const group = source.group ?? source.id;
    const local = new Set<string>();
    let found = 0;

    for (const name of source.packages) {
      if (local.has(name)) continue;
      local.add(name);

      const installed = index.get(name);
      if (installed) found++;

      if (seen.has(name)) {
        const m = missingByName.get(name);
        if (m && !m.declaredIn.includes(source.id)) m.declaredIn.push(source.id);
        continue;
      }
      seen.add(name);
      declared.push(name);

      if (installed) {
        present.push({ name, source: source.id, group, installed });
      } else {
        const m: MissingPackage = { name, declaredIn: [source.id] };
        missing.push(m);
        missingByName.set(name, m);
      }
    }

    groups.push({ source: source.id, group, declared: local.size, found });
  }

  return {
    domain,
    declared,
    present,
    missing,
    status: missing.length === 0 ? "complete" : "incomplete",
    groups,
  };
}

/**
 * Partition each domain's declared names into present and missing against an
 * installed-package snapshot.
 *
 * Matching is by exact, case-sensitive name; versions never affect presence.
 * Output order follows declaration order: sources in the order given, names in
 * the order each source lists them. A name declared by several sources of one
 * domain is attributed to the first.
 */
export function reconcile(
  sources: DependencySource[],
  installed: InstalledPackage[],
  opts: ReconcileOptions = {},
): Map<string, ReconciliationResult> {
  const index = indexInstalled(installed, opts.bundledPriorities);

  const byDomain = new Map<string, DependencySource[]>();
  for (const source of sources) {
    const list = byDomain.get(source.domain) ?? [];
    list.push(source);
    byDomain.set(source.domain, list);
  }

  const results = new Map<string, ReconciliationResult>();
  for (const [domain, domainSources] of byDomain) {
    results.set(domain, reconcileDomain(domain, domainSources, index));
  }
  return results;
}

export type DomainInput = {
  domain: string;
  sources: DependencySource[];
  installed: InstalledPackage[];
  bundledPriorities?: string[];
};

/**
 * Reconcile several domains, each against its own snapshot. A domain with no
 * sources still gets a (vacuously complete) result.
 */
export function reconcileDomains(inputs: DomainInput[]): Map<string, ReconciliationResult> {
  const results = new Map<string, ReconciliationResult>();
  for (const input of inputs) {
    const index = indexInstalled(input.installed, input.bundledPriorities);
    const own = input.sources.filter((s) => s.domain === input.domain);
    results.set(input.domain, reconcileDomain(input.domain, own, index));
  }
  return results;
}
