import { describe, expect, it } from "vitest";
import { reconcileDomains } from "../src/reconcile/reconciler.js";
import { missingItems, renderReport, report } from "../src/report/reporter.js";
import type { InstalledPackage } from "../src/types/packages.js";

function installed(...names: string[]): InstalledPackage[] {
  return names.map((name) => ({ name, version: "1.0", origin: { type: "registry" } }));
}

function twoDomains() {
  return report(
    reconcileDomains([
      {
        domain: "python",
        sources: [{ id: "environment.yml", domain: "python", packages: ["xarray", "dask"] }],
        installed: installed("xarray", "dask"),
      },
      {
        domain: "r",
        sources: [
          { id: "install.R", domain: "r", packages: ["sf", "terra"] },
          { id: "extra.R", domain: "r", group: "extras", packages: ["terra"] },
        ],
        installed: installed("sf"),
      },
    ]),
  );
}

describe("validation reporter", () => {
  it("fails overall when any domain is incomplete", () => {
    const validation = twoDomains();
    expect(validation.all_passed).toBe(false);
    expect(validation.domains.python.status).toBe("complete");
    expect(validation.domains.r.status).toBe("incomplete");
  });

  it("itemizes exactly the missing packages", () => {
    expect(missingItems(twoDomains())).toEqual([{ domain: "r", name: "terra", declaredIn: ["install.R", "extra.R"] }]);
  });

  it("renders counts, status and the missing names", () => {
    const rule = "=".repeat(70);
    expect(renderReport(twoDomains(), { python: "Python", r: "R" })).toBe(
      [
        rule,
        "Python Validation Report",
        rule,
        "",
        "declared 2, found 2, missing 0",
        "  environment.yml: declared 2, found 2",
        "",
        "STATUS: SUCCESS",
        "",
        rule,
        "R Validation Report",
        rule,
        "",
        "declared 2, found 1, missing 1",
        "  install.R: declared 2, found 1",
        "  extras (extra.R): declared 1, found 0",
        "",
        "STATUS: FAILED",
        "",
        "Missing packages (r):",
        "  - terra",
        "    Found in: install.R, extra.R",
        "",
        rule,
        "OVERALL: FAILED",
        rule,
        "",
      ].join("\n"),
    );
  });

  it("passes when every domain is complete", () => {
    const validation = report(
      reconcileDomains([{ domain: "r", sources: [{ id: "install.R", domain: "r", packages: ["sf"] }], installed: installed("sf") }]),
    );
    expect(validation.all_passed).toBe(true);
    expect(renderReport(validation).split("\n").slice(-4)).toEqual(["=".repeat(70), "OVERALL: SUCCESS", "=".repeat(70), ""]);
  });
});
