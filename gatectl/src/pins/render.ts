import type { PinFormat } from "../types/config.js";
import type { PinRecord, RegistryPin } from "../types/packages.js";

/** Channel conda reports for packages pip installed into the environment. */
export const PIP_CHANNEL = "pypi";

export function isPipPin(pin: PinRecord): pin is RegistryPin {
  return pin.kind === "registry" && pin.channel === PIP_CHANNEL;
}

export type RenderOptions = {
  format: PinFormat;
  /** Registry URL stated at the top of the manifest. */
  repository: string;
  /** Library prefixes the R script refuses to install under. */
  forbiddenPrefixes?: string[];
  title?: string;
};

function rString(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function regexEscape(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function rDirective(pin: PinRecord, opts: RenderOptions): string {
  if (pin.kind === "registry") {
    const repos = pin.repository === opts.repository ? "repo" : rString(pin.repository);
    return `remotes::install_version(${rString(pin.name)}, version = ${rString(pin.version)}, repos = ${repos}, upgrade = "never")`;
  }
  const target = pin.ref ? `${pin.owner}/${pin.repo}@${pin.ref}` : `${pin.owner}/${pin.repo}`;
  return `remotes::install_github(${rString(target)}, upgrade = "never") # ${pin.name} ${pin.version}`;
}

function condaDirective(pin: PinRecord, opts: RenderOptions): string {
  if (pin.kind === "source-control") {
    throw new Error(`conda-spec manifests cannot pin source-control package ${pin.name} (${pin.owner}/${pin.repo})`);
  }
  if (pin.channel === PIP_CHANNEL) {
    throw new Error(`conda-spec manifests cannot pin pip package ${pin.name}; render it as pip requirements`);
  }
  const spec = pin.build ? `${pin.name}=${pin.version}=${pin.build}` : `${pin.name}=${pin.version}`;
  // Packages from another channel carry it in the match spec.
  return pin.repository === opts.repository ? spec : `${pin.channel ?? pin.repository}::${spec}`;
}

/** Pin lines with a `# <group>` header whenever the group changes. */
function groupedBody(pins: PinRecord[], directive: (pin: PinRecord) => string): string[] {
  const lines: string[] = [];
  let group: string | null = null;
  for (const pin of pins) {
    if (pin.group !== group) {
      if (group !== null) lines.push("");
      lines.push(`# ${pin.group}`);
      group = pin.group;
    }
    lines.push(directive(pin));
  }
  return lines;
}

function renderRScript(pins: PinRecord[], opts: RenderOptions): string[] {
  const lines = [
    "#!/usr/bin/env Rscript",
    `# ${opts.title ?? "Pinned R package installs"}`,
    "# Generated by gatectl from the installed package snapshot",
    "",
    `repo <- ${rString(opts.repository)}`,
    "",
  ];

  const prefixes = opts.forbiddenPrefixes ?? [];
  if (prefixes.length > 0) {
    lines.push("# Guardrail: refuse to install under forbidden library prefixes");
    lines.push("install_lib <- .libPaths()[1]");
    for (const prefix of prefixes) {
      lines.push(`if (grepl(${rString(`^${regexEscape(prefix)}`)}, install_lib)) {`);
      lines.push(`  stop(${rString(`Error: Packages are being installed to ${prefix}. Exiting.`)}, call. = FALSE)`);
      lines.push("}");
    }
    lines.push("");
  }

  return [...lines, ...groupedBody(pins, (pin) => rDirective(pin, opts))];
}

function renderCondaSpec(pins: PinRecord[], opts: RenderOptions): string[] {
  return [
    `# ${opts.title ?? "Pinned conda packages"}`,
    "# Generated by gatectl from the installed package snapshot",
    `# channel: ${opts.repository}`,
    "",
    ...groupedBody(pins, (pin) => condaDirective(pin, opts)),
  ];
}

/**
 * Pip requirements for the pip-installed packages of a conda environment,
 * `name==version` per line under the index they came from.
 */
export function renderPipRequirements(pins: RegistryPin[], opts: { title?: string } = {}): string {
  const indexes = [...new Set(pins.map((p) => p.repository))];
  const lines = [
    `# ${opts.title ?? "Pinned pip packages"}`,
    "# Generated by gatectl from the installed package snapshot",
    ...indexes.map((url, i) => `${i === 0 ? "--index-url" : "--extra-index-url"} ${url}`),
    "",
    ...groupedBody(pins, (pin) => `${pin.name}==${pin.version}`),
  ];
  return lines.join("\n") + "\n";
}

/** Serialize pin records into a manifest the package manager can execute as-is. */
export function renderPins(pins: PinRecord[], opts: RenderOptions): string {
  const lines = opts.format === "r-script" ? renderRScript(pins, opts) : renderCondaSpec(pins, opts);
  return lines.join("\n") + "\n";
}
