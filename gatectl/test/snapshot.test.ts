import { describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parseCondaListJson } from "../src/snapshot/conda.js";
import { parseDcf, parseDescriptionRecords, readLibraryDirectory } from "../src/snapshot/description.js";
import { captureSnapshot, forbiddenPrefixesFor, readSnapshotPath } from "../src/snapshot/capture.js";
import { SnapshotUnavailableError } from "../src/snapshot/errors.js";
import type { CommandRunner } from "../src/core/exec.js";
import type { DomainConfig } from "../src/types/config.js";

const SNAPSHOTS = path.resolve(import.meta.dirname, "../fixtures/snapshots");
const DCF = fs.readFileSync(path.join(SNAPSHOTS, "r-descriptions.dcf"), "utf8");

const rDomain: DomainConfig = {
  name: "r",
  registry_url: "https://cloud.r-project.org",
  pin_format: "r-script",
  pinned_file: "install.pinned.R",
  sources: [],
  snapshot: { command: "scripts/r-descriptions.sh {artifact}", format: "dcf" },
};

describe("conda list snapshot", () => {
  it("keeps name, version, build and channel", () => {
    const pkgs = parseCondaListJson(fs.readFileSync(path.join(SNAPSHOTS, "conda-list.json"), "utf8"));
    expect(pkgs.map((p) => p.name)).toEqual(["dask", "netcdf4", "xarray", "zarr", "nbmake", "python"]);
    expect(pkgs[0]).toEqual({
      name: "dask",
      version: "2024.12.1",
      build: "pyhd8ed1ab_0",
      origin: { type: "registry", channel: "conda-forge" },
    });
    expect(pkgs[4].origin).toEqual({ type: "registry", channel: "pypi" });
  });

  it("rejects output that is not a JSON array", () => {
    expect(() => parseCondaListJson("not json")).toThrow(SnapshotUnavailableError);
    expect(() => parseCondaListJson("{}")).toThrow("expected an array of packages");
  });
});

describe("DESCRIPTION snapshot", () => {
  it("folds continuation lines", () => {
    const [first] = parseDcf(DCF);
    expect(first.Description).toBe("Client library for SpatioTemporal Asset Catalog services.");
  });

  it("builds typed origins at capture time", () => {
    const pkgs = parseDescriptionRecords(DCF);
    expect(pkgs.map((p) => p.name)).toEqual(["rstac", "aws.s3", "stats", "Matrix", "tigris", "ohwtools"]);
    expect(pkgs[0]).toEqual({ name: "rstac", version: "1.0.1", origin: { type: "registry", channel: "CRAN" } });
    expect(pkgs[2].priority).toBe("base");
    expect(pkgs[4].priority).toBeUndefined();
    expect(pkgs[5].origin).toEqual({
      type: "source-control",
      host: "api.github.com",
      owner: "example-lab",
      repo: "ohwtools",
      commitRef: "3f9c2b1d8e7a6f5c4b3a29180706f5e4d3c2b1a0",
    });
  });

  it("treats a github remote without owner as a registry package", () => {
    const [pkg] = parseDescriptionRecords("Package: half\nVersion: 1.0\nRemoteType: github\nRemoteRepo: half\n");
    expect(pkg.origin).toEqual({ type: "registry" });
  });

  it("reads a library directory in sorted order", () => {
    const lib = fs.mkdtempSync(path.join(os.tmpdir(), "gatectl-lib-"));
    for (const [dir, body] of [
      ["sf", "Package: sf\nVersion: 1.0-19\n"],
      ["abind", "Package: abind\nVersion: 1.4-8\n"],
    ]) {
      fs.mkdirSync(path.join(lib, dir));
      fs.writeFileSync(path.join(lib, dir, "DESCRIPTION"), body, "utf8");
    }
    fs.mkdirSync(path.join(lib, "00LOCK"));

    const pkgs = readLibraryDirectory(lib);
    expect(pkgs).toEqual([
      { name: "abind", version: "1.4-8", libPath: lib, origin: { type: "registry" } },
      { name: "sf", version: "1.0-19", libPath: lib, origin: { type: "registry" } },
    ]);
    expect(readSnapshotPath(rDomain, lib)).toEqual(pkgs);
  });
});

describe("snapshot capture", () => {
  it("substitutes the artifact into the snapshot command", async () => {
    const exec = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>(async () => ({
      ok: true,
      exitCode: 0,
      stdout: DCF,
      stderr: "",
    }));
    const pkgs = await captureSnapshot("registry.example.org/img:1", rDomain, { cwd: "/work", exec });
    expect(exec).toHaveBeenCalledWith("scripts/r-descriptions.sh registry.example.org/img:1", { cwd: "/work" });
    expect(pkgs).toHaveLength(6);
  });

  it("reports a failed command as unavailable", async () => {
    const exec: CommandRunner = async () => ({ ok: false, exitCode: 125, stdout: "", stderr: "boom\n" });
    await expect(captureSnapshot("img", rDomain, { cwd: "/work", exec })).rejects.toThrow(
      "Snapshot command failed for r: boom",
    );
  });

  it("refuses a library under a forbidden prefix", async () => {
    const exec: CommandRunner = async () => ({ ok: true, exitCode: 0, stdout: DCF, stderr: "" });
    const domain: DomainConfig = {
      ...rDomain,
      snapshot: { ...rDomain.snapshot, library_path: "/home/rstudio/R/library" },
    };
    await expect(captureSnapshot("img", domain, { cwd: "/work", exec })).rejects.toThrow(
      "Packages for r are installed under forbidden prefix /home: /home/rstudio/R/library",
    );
  });

  it("defaults forbidden prefixes to /home for R domains only", () => {
    expect(forbiddenPrefixesFor(rDomain)).toEqual(["/home"]);
    expect(forbiddenPrefixesFor({ ...rDomain, pin_format: "conda-spec" })).toEqual([]);
    expect(forbiddenPrefixesFor({ ...rDomain, forbidden_install_prefixes: ["/tmp"] })).toEqual(["/tmp"]);
  });
});
