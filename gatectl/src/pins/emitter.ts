import type { PinRecord, ReconciliationResult } from "../types/packages.js";

export const SHORT_REF_LENGTH = 7;

export type EmitOptions = {
  /** Default registry URL per domain, used for packages the snapshot records no channel for. */
  repositories: Record<string, string>;
  /** Per domain, snapshot channel name to repository URL. */
  channels?: Record<string, Record<string, string>>;
};

const URL_RE = /^[a-z][a-z0-9+.-]*:\/\//i;

/** Repository a registry package was installed from, by the channel recorded in the snapshot. */
export function resolveRepository(
  domain: string,
  name: string,
  channel: string | undefined,
  opts: EmitOptions,
): string {
  if (channel) {
    const mapped = opts.channels?.[domain]?.[channel];
    if (mapped) return mapped;
    if (URL_RE.test(channel)) return channel;
    throw new Error(`No repository configured for channel "${channel}" (package ${name}, domain ${domain})`);
  }
  const repository = opts.repositories[domain];
  if (!repository) {
    throw new Error(`No registry URL configured for domain ${domain}`);
  }
  return repository;
}

/**
 * Turn the present packages of each domain into pin records, one per package.
 * Order: domains as given, then source groups, then declaration order. Missing
 * packages never produce a record.
 */
export function emit(
  results: Map<string, ReconciliationResult>,
  opts: EmitOptions,
): PinRecord[] {
  const pins: PinRecord[] = [];

  for (const [domain, result] of results) {
    for (const entry of result.present) {
      const { installed } = entry;
      const base = { domain, group: entry.group, name: entry.name, version: installed.version };

      if (installed.origin.type === "source-control") {
        const { owner, repo, commitRef } = installed.origin;
        pins.push({
          ...base,
          kind: "source-control",
          owner,
          repo,
          ...(commitRef ? { ref: commitRef.slice(0, SHORT_REF_LENGTH) } : {}),
        });
        continue;
      }

      const { channel } = installed.origin;
      pins.push({
        ...base,
        kind: "registry",
        repository: resolveRepository(domain, entry.name, channel, opts),
        ...(channel ? { channel } : {}),
        ...(installed.build ? { build: installed.build } : {}),
      });
    }
  }

  return pins;
}
