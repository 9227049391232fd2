import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { reconcile } from "../src/reconcile/reconciler.js";
import { emit } from "../src/pins/emitter.js";
import { renderPins } from "../src/pins/render.js";
import { parsePinnedManifest, parsePipRequirements } from "../src/pins/parse.js";
import { emitOptionsFor, pipSiblingPath, renderDomainManifests } from "../src/pins/manifests.js";
import { sinkFromArg, writeToSink } from "../src/pins/sink.js";
import { parseCondaEnv } from "../src/manifest/conda-env.js";
import { parseCondaListJson } from "../src/snapshot/conda.js";
import type { DomainConfig } from "../src/types/config.js";
import type { DependencySource, InstalledPackage, PinRecord } from "../src/types/packages.js";

const CRAN = "https://cloud.r-project.org";
const CONDA_FORGE = "https://conda.anaconda.org/conda-forge";
const PYPI = "https://pypi.org/simple";
const FIXTURES = path.resolve(import.meta.dirname, "../fixtures");

const rInstalled: InstalledPackage[] = [
  { name: "rstac", version: "1.0.1", origin: { type: "registry", channel: "CRAN" } },
  {
    name: "ohwtools",
    version: "0.2.0",
    origin: {
      type: "source-control",
      host: "api.github.com",
      owner: "example-lab",
      repo: "ohwtools",
      commitRef: "3f9c2b1d8e7a6f5c4b3a29180706f5e4d3c2b1a0",
    },
  },
];

const rSources: DependencySource[] = [{ id: "install.R", domain: "r", packages: ["rstac", "missingpkg", "ohwtools"] }];

function rPins(): PinRecord[] {
  return emit(reconcile(rSources, rInstalled), { repositories: { r: CRAN }, channels: { r: { CRAN } } });
}

describe("pin emitter", () => {
  it("emits one record per present package, never for missing ones", () => {
    expect(rPins()).toEqual([
      { domain: "r", group: "install.R", name: "rstac", version: "1.0.1", kind: "registry", repository: CRAN, channel: "CRAN" },
      {
        domain: "r",
        group: "install.R",
        name: "ohwtools",
        version: "0.2.0",
        kind: "source-control",
        owner: "example-lab",
        repo: "ohwtools",
        ref: "3f9c2b1",
      },
    ]);
  });

  it("omits the ref when the commit is unknown", () => {
    const installed: InstalledPackage[] = [
      { name: "tool", version: "1.0", origin: { type: "source-control", host: "api.github.com", owner: "o", repo: "tool" } },
    ];
    const [pin] = emit(reconcile([{ id: "s", domain: "r", packages: ["tool"] }], installed), { repositories: {} });
    expect(pin).toEqual({ domain: "r", group: "s", name: "tool", version: "1.0", kind: "source-control", owner: "o", repo: "tool" });
  });

  it("requires a registry URL for packages without a channel", () => {
    const installed: InstalledPackage[] = [{ name: "sf", version: "1.0-19", origin: { type: "registry" } }];
    const results = reconcile([{ id: "install.R", domain: "r", packages: ["sf"] }], installed);
    expect(() => emit(results, { repositories: {} })).toThrow("No registry URL configured for domain r");
  });

  it("resolves each package's repository from its recorded channel", () => {
    const installed: InstalledPackage[] = [
      { name: "sf", version: "1.0-19", origin: { type: "registry" } },
      { name: "rhdf5", version: "2.50.0", origin: { type: "registry", channel: "BioCsoft" } },
      { name: "arrow", version: "18.1.0", origin: { type: "registry", channel: "https://apache.r-universe.dev" } },
    ];
    const results = reconcile([{ id: "install.R", domain: "r", packages: ["sf", "rhdf5", "arrow"] }], installed);
    const pins = emit(results, {
      repositories: { r: CRAN },
      channels: { r: { BioCsoft: "https://bioconductor.org/packages/3.20/bioc" } },
    });
    expect(pins.map((p) => (p.kind === "registry" ? [p.name, p.repository] : [p.name]))).toEqual([
      ["sf", CRAN],
      ["rhdf5", "https://bioconductor.org/packages/3.20/bioc"],
      ["arrow", "https://apache.r-universe.dev"],
    ]);
  });

  it("refuses a channel with no configured repository", () => {
    const installed: InstalledPackage[] = [{ name: "nbmake", version: "1.5.4", origin: { type: "registry", channel: "pypi" } }];
    const results = reconcile([{ id: "environment.yml", domain: "python", packages: ["nbmake"] }], installed);
    expect(() => emit(results, { repositories: { python: CONDA_FORGE } })).toThrow(
      'No repository configured for channel "pypi" (package nbmake, domain python)',
    );
  });
});

describe("R script rendering", () => {
  it("renders the guardrail and one directive per pin", () => {
    const text = renderPins(rPins(), { format: "r-script", repository: CRAN, forbiddenPrefixes: ["/home"] });
    expect(text).toBe(
      [
        "#!/usr/bin/env Rscript",
        "# Pinned R package installs",
        "# Generated by gatectl from the installed package snapshot",
        "",
        'repo <- "https://cloud.r-project.org"',
        "",
        "# Guardrail: refuse to install under forbidden library prefixes",
        "install_lib <- .libPaths()[1]",
        'if (grepl("^/home", install_lib)) {',
        '  stop("Error: Packages are being installed to /home. Exiting.", call. = FALSE)',
        "}",
        "",
        "# install.R",
        'remotes::install_version("rstac", version = "1.0.1", repos = repo, upgrade = "never")',
        'remotes::install_github("example-lab/ohwtools@3f9c2b1", upgrade = "never") # ohwtools 0.2.0',
        "",
      ].join("\n"),
    );
  });

  it("reads back exactly the emitted names and versions", () => {
    const pins = rPins();
    const text = renderPins(pins, { format: "r-script", repository: CRAN });
    expect(parsePinnedManifest(text, "r-script")).toEqual(pins.map((p) => ({ name: p.name, version: p.version })));
  });

  it("names the repository inline for packages from another registry", () => {
    const installed: InstalledPackage[] = [
      { name: "rhdf5", version: "2.50.0", origin: { type: "registry", channel: "BioCsoft" } },
    ];
    const pins = emit(reconcile([{ id: "install.R", domain: "r", packages: ["rhdf5"] }], installed), {
      repositories: { r: CRAN },
      channels: { r: { BioCsoft: "https://bioconductor.org/packages/3.20/bioc" } },
    });
    const text = renderPins(pins, { format: "r-script", repository: CRAN });
    expect(text.split("\n")).toContain(
      'remotes::install_version("rhdf5", version = "2.50.0", repos = "https://bioconductor.org/packages/3.20/bioc", upgrade = "never")',
    );
    expect(parsePinnedManifest(text, "r-script")).toEqual([{ name: "rhdf5", version: "2.50.0" }]);
  });

  it("falls back to the repo name for github lines carrying only a version", () => {
    const text = 'remotes::install_github("o/ohwtools@abc1234", upgrade = "never") # 0.2.0\n';
    expect(parsePinnedManifest(text, "r-script")).toEqual([{ name: "ohwtools", version: "0.2.0" }]);
  });
});

describe("conda spec rendering", () => {
  const installed: InstalledPackage[] = [
    { name: "xarray", version: "2025.1.1", build: "pyhd8ed1ab_0", origin: { type: "registry", channel: "conda-forge" } },
    { name: "dask", version: "2024.12.1", build: "pyhd8ed1ab_0", origin: { type: "registry", channel: "conda-forge" } },
  ];
  const sources: DependencySource[] = [
    { id: "environment.yml", domain: "python", group: "other", packages: ["xarray"] },
    { id: "feedstocks/pangeo-notebook.txt", domain: "python", group: "feedstock", packages: ["dask"] },
  ];

  it("groups pins under their source group", () => {
    const pins = emit(reconcile(sources, installed), {
      repositories: { python: CONDA_FORGE },
      channels: { python: { "conda-forge": CONDA_FORGE } },
    });
    const text = renderPins(pins, { format: "conda-spec", repository: CONDA_FORGE });
    expect(text).toBe(
      [
        "# Pinned conda packages",
        "# Generated by gatectl from the installed package snapshot",
        "# channel: https://conda.anaconda.org/conda-forge",
        "",
        "# other",
        "xarray=2025.1.1=pyhd8ed1ab_0",
        "",
        "# feedstock",
        "dask=2024.12.1=pyhd8ed1ab_0",
        "",
      ].join("\n"),
    );
    expect(parsePinnedManifest(text, "conda-spec")).toEqual([
      { name: "xarray", version: "2025.1.1" },
      { name: "dask", version: "2024.12.1" },
    ]);
  });

  it("prefixes packages from another channel with that channel", () => {
    const bio: InstalledPackage[] = [
      { name: "samtools", version: "1.21", build: "h50ea8bc_0", origin: { type: "registry", channel: "bioconda" } },
    ];
    const pins = emit(reconcile([{ id: "environment.yml", domain: "python", packages: ["samtools"] }], bio), {
      repositories: { python: CONDA_FORGE },
      channels: { python: { bioconda: "https://conda.anaconda.org/bioconda" } },
    });
    const text = renderPins(pins, { format: "conda-spec", repository: CONDA_FORGE });
    expect(text.split("\n")).toContain("bioconda::samtools=1.21=h50ea8bc_0");
    expect(parsePinnedManifest(text, "conda-spec")).toEqual([{ name: "samtools", version: "1.21" }]);
  });

  it("refuses pip-installed packages", () => {
    const pip: InstalledPackage[] = [{ name: "nbmake", version: "1.5.4", origin: { type: "registry", channel: "pypi" } }];
    const pins = emit(reconcile([{ id: "environment.yml", domain: "python", packages: ["nbmake"] }], pip), {
      repositories: { python: CONDA_FORGE },
      channels: { python: { pypi: PYPI } },
    });
    expect(() => renderPins(pins, { format: "conda-spec", repository: CONDA_FORGE })).toThrow(
      "conda-spec manifests cannot pin pip package nbmake; render it as pip requirements",
    );
  });

  it("refuses source-control pins", () => {
    expect(() => renderPins(rPins(), { format: "conda-spec", repository: CONDA_FORGE })).toThrow(
      "conda-spec manifests cannot pin source-control package ohwtools (example-lab/ohwtools)",
    );
  });
});

describe("domain manifests", () => {
  const python: DomainConfig = {
    name: "python",
    label: "Python",
    registry_url: CONDA_FORGE,
    channels: { "conda-forge": CONDA_FORGE, pypi: PYPI },
    pin_format: "conda-spec",
    pinned_file: "conda-linux-64.pinned.txt",
    sources: [],
    snapshot: { command: "true", format: "conda-json" },
  };

  it("splits pip-installed packages of the environment into pip requirements", () => {
    const declared = parseCondaEnv(fs.readFileSync(path.join(FIXTURES, "repo", "environment.yml"), "utf8"));
    const installed = parseCondaListJson(fs.readFileSync(path.join(FIXTURES, "snapshots", "conda-list.json"), "utf8"));
    const results = reconcile([{ id: "environment.yml", domain: "python", group: "other", packages: declared }], installed);
    const manifests = renderDomainManifests(python, emit(results, emitOptionsFor([python])));

    expect(manifests.map((m) => [m.file, m.kind])).toEqual([
      ["conda-linux-64.pinned.txt", "pinned-manifest"],
      ["conda-linux-64.pinned.pip.txt", "pip-requirements"],
    ]);
    expect(manifests[0].text).toBe(
      [
        "# Pinned Python",
        "# Generated by gatectl from the installed package snapshot",
        "# channel: https://conda.anaconda.org/conda-forge",
        "",
        "# other",
        "xarray=2025.1.1=pyhd8ed1ab_0",
        "zarr=2.18.4=pyhd8ed1ab_0",
        "",
      ].join("\n"),
    );
    expect(manifests[1].text).toBe(
      [
        "# Pinned Python pip packages",
        "# Generated by gatectl from the installed package snapshot",
        "--index-url https://pypi.org/simple",
        "",
        "# other",
        "nbmake==1.5.4",
        "",
      ].join("\n"),
    );
    expect(parsePipRequirements(manifests[1].text)).toEqual([{ name: "nbmake", version: "1.5.4" }]);
  });

  it("writes no pip requirements when nothing came from pip", () => {
    const installed: InstalledPackage[] = [
      { name: "xarray", version: "2025.1.1", origin: { type: "registry", channel: "conda-forge" } },
    ];
    const results = reconcile([{ id: "environment.yml", domain: "python", packages: ["xarray"] }], installed);
    const manifests = renderDomainManifests(python, emit(results, emitOptionsFor([python])));
    expect(manifests.map((m) => m.file)).toEqual(["conda-linux-64.pinned.txt"]);
  });

  it("derives the pip requirements path from the manifest path", () => {
    expect(pipSiblingPath("conda-linux-64.pinned.txt")).toBe("conda-linux-64.pinned.pip.txt");
    expect(pipSiblingPath("/out/conda")).toBe("/out/conda.pip.txt");
  });
});

describe("output sink", () => {
  it("treats '-' and no argument as stdout", () => {
    expect(sinkFromArg(undefined)).toEqual({ kind: "stdout" });
    expect(sinkFromArg("-")).toEqual({ kind: "stdout" });
  });

  it("writes to a file, creating parent directories", () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), "gatectl-sink-"));
    const target = path.join(tmp, "out", "install.pinned.R");
    const sink = sinkFromArg(target);
    expect(sink).toEqual({ kind: "file", path: target });
    writeToSink(sink, "# pins\n");
    expect(fs.readFileSync(target, "utf8")).toBe("# pins\n");
  });
});
