import path from "node:path";
import type { DomainConfig } from "../types/config.js";
import type { PinRecord, RegistryPin } from "../types/packages.js";
import { forbiddenPrefixesFor } from "../snapshot/capture.js";
import type { EmitOptions } from "./emitter.js";
import { isPipPin, renderPins, renderPipRequirements } from "./render.js";

export type RenderedManifest = {
  /** Path relative to the release directory. */
  file: string;
  kind: "pinned-manifest" | "pip-requirements";
  text: string;
};

/** Emitter options for a set of domains: default registry and channel map of each. */
export function emitOptionsFor(domains: DomainConfig[]): EmitOptions {
  return {
    repositories: Object.fromEntries(domains.map((d) => [d.name, d.registry_url])),
    channels: Object.fromEntries(domains.map((d) => [d.name, d.channels ?? {}])),
  };
}

/** `conda-linux-64.pinned.txt` → `conda-linux-64.pinned.pip.txt` */
export function pipSiblingPath(pinnedPath: string): string {
  const ext = path.extname(pinnedPath);
  return `${pinnedPath.slice(0, pinnedPath.length - ext.length)}.pip${ext || ".txt"}`;
}

export function pipRequirementsFile(domain: DomainConfig): string {
  return domain.pip_pinned_file ?? pipSiblingPath(domain.pinned_file);
}

/**
 * Render a domain's pins into the files that reinstall them. A conda-spec
 * domain with pip-installed packages gets a second, pip requirements file.
 */
export function renderDomainManifests(domain: DomainConfig, pins: PinRecord[]): RenderedManifest[] {
  const title = domain.label ? `Pinned ${domain.label}` : undefined;
  const own = pins.filter((p) => p.domain === domain.name);

  if (domain.pin_format === "r-script") {
    const text = renderPins(own, {
      format: "r-script",
      repository: domain.registry_url,
      forbiddenPrefixes: forbiddenPrefixesFor(domain),
      title,
    });
    return [{ file: domain.pinned_file, kind: "pinned-manifest", text }];
  }

  const pip: RegistryPin[] = own.filter(isPipPin);
  const manifests: RenderedManifest[] = [
    {
      file: domain.pinned_file,
      kind: "pinned-manifest",
      text: renderPins(
        own.filter((p) => !isPipPin(p)),
        { format: "conda-spec", repository: domain.registry_url, title },
      ),
    },
  ];
  if (pip.length > 0) {
    manifests.push({
      file: pipRequirementsFile(domain),
      kind: "pip-requirements",
      text: renderPipRequirements(pip, { title: domain.label ? `Pinned ${domain.label} pip packages` : undefined }),
    });
  }
  return manifests;
}
