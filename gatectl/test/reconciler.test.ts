import { describe, expect, it } from "vitest";
import { reconcile, reconcileDomains } from "../src/reconcile/reconciler.js";
import type { DependencySource, InstalledPackage } from "../src/types/packages.js";

function pkg(name: string, version: string, priority?: string): InstalledPackage {
  return { name, version, ...(priority ? { priority } : {}), origin: { type: "registry" } };
}

function source(id: string, packages: string[], domain = "r"): DependencySource {
  return { id, domain, packages };
}

describe("reconcile", () => {
  it("drops bundled packages before matching", () => {
    const results = reconcile([source("install.R", ["a", "b", "c"])], [pkg("a", "1.0"), pkg("c", "2.0", "base")]);
    const r = results.get("r");
    expect(r?.present.map((p) => p.name)).toEqual(["a"]);
    expect(r?.missing.map((m) => m.name)).toEqual(["b", "c"]);
    expect(r?.status).toBe("incomplete");
  });

  it("partitions declared names exactly into present and missing", () => {
    const declared = ["x", "y", "z", "w"];
    const results = reconcile([source("list", declared)], [pkg("y", "1"), pkg("w", "2"), pkg("extra", "3")]);
    const r = results.get("r");
    const present = r?.present.map((p) => p.name) ?? [];
    const missing = r?.missing.map((m) => m.name) ?? [];
    expect([...present, ...missing].sort()).toEqual([...declared].sort());
    expect(present.filter((n) => missing.includes(n))).toEqual([]);
    expect(present).toEqual(["y", "w"]);
  });

  it("matches names exactly and ignores versions", () => {
    const r = reconcile([source("list", ["Matrix", "sf"])], [pkg("matrix", "1.7"), pkg("sf", "0.0.1")]).get("r");
    expect(r?.present.map((p) => p.name)).toEqual(["sf"]);
    expect(r?.missing.map((m) => m.name)).toEqual(["Matrix"]);
  });

  it("uses the first snapshot entry of a repeated name", () => {
    const r = reconcile([source("list", ["sf"])], [pkg("sf", "1.0-19"), pkg("sf", "0.9")]).get("r");
    expect(r?.present[0].installed.version).toBe("1.0-19");
  });

  it("attributes a name declared twice to its first source and lists every declaring source when missing", () => {
    const r = reconcile(
      [source("install.R", ["sf", "gone"]), { id: "extra.R", domain: "r", group: "extras", packages: ["gone", "sf"] }],
      [pkg("sf", "1.0")],
    ).get("r");
    expect(r?.declared).toEqual(["sf", "gone"]);
    expect(r?.present).toEqual([{ name: "sf", source: "install.R", group: "install.R", installed: pkg("sf", "1.0") }]);
    expect(r?.missing).toEqual([{ name: "gone", declaredIn: ["install.R", "extra.R"] }]);
    expect(r?.groups).toEqual([
      { source: "install.R", group: "install.R", declared: 2, found: 1 },
      { source: "extra.R", group: "extras", declared: 2, found: 1 },
    ]);
  });

  it("treats a domain that declares nothing as complete", () => {
    const r = reconcile([source("empty", [])], [pkg("sf", "1.0")]).get("r");
    expect(r?.status).toBe("complete");
    expect(r?.present).toEqual([]);
    expect(r?.missing).toEqual([]);
  });

  it("honours custom bundled priorities", () => {
    const r = reconcile([source("list", ["Matrix"])], [pkg("Matrix", "1.7", "recommended")], {
      bundledPriorities: ["base"],
    }).get("r");
    expect(r?.status).toBe("complete");
  });
});

describe("reconcileDomains", () => {
  it("reconciles each domain against its own snapshot, in input order", () => {
    const results = reconcileDomains([
      { domain: "python", sources: [source("environment.yml", ["xarray"], "python")], installed: [pkg("xarray", "2025.1.1")] },
      { domain: "r", sources: [source("install.R", ["xarray"])], installed: [pkg("sf", "1.0")] },
    ]);
    expect([...results.keys()]).toEqual(["python", "r"]);
    expect(results.get("python")?.status).toBe("complete");
    expect(results.get("r")?.status).toBe("incomplete");
  });

  it("yields a complete result for a domain without sources", () => {
    const results = reconcileDomains([{ domain: "r", sources: [], installed: [] }]);
    expect(results.get("r")).toEqual({ domain: "r", declared: [], present: [], missing: [], status: "complete", groups: [] });
  });
});
