/** Package data model shared by the reconciler, pin emitter and reporter. */

/** Ordered declared package names from one manifest document. */
export type DependencySource = {
  id: string;
  domain: string;
  group?: string;
  packages: string[];
};

export type RegistryOrigin = {
  type: "registry";
  channel?: string;
};

export type SourceControlOrigin = {
  type: "source-control";
  host: string;
  owner: string;
  repo: string;
  commitRef?: string;
};

export type PackageOrigin = RegistryOrigin | SourceControlOrigin;

export type InstalledPackage = {
  name: string;
  version: string;
  priority?: string;
  build?: string;
  libPath?: string;
  origin: PackageOrigin;
};

export type PresentPackage = {
  name: string;
  /** Source that declared the name first. */
  source: string;
  group: string;
  installed: InstalledPackage;
};

export type MissingPackage = {
  name: string;
  declaredIn: string[];
};

export type GroupSummary = {
  source: string;
  group: string;
  declared: number;
  found: number;
};

export type ReconciliationStatus = "complete" | "incomplete";

export type ReconciliationResult = {
  domain: string;
  declared: string[];
  present: PresentPackage[];
  missing: MissingPackage[];
  status: ReconciliationStatus;
  groups: GroupSummary[];
};

type PinBase = {
  domain: string;
  group: string;
  name: string;
  version: string;
};

export type RegistryPin = PinBase & {
  kind: "registry";
  /** Repository URL resolved from the channel recorded in the snapshot. */
  repository: string;
  /** Channel name as the package manager reported it. */
  channel?: string;
  build?: string;
};

export type SourceControlPin = PinBase & {
  kind: "source-control";
  owner: string;
  repo: string;
  /** Short (7-character) commit prefix, absent when the install recorded none. */
  ref?: string;
};

export type PinRecord = RegistryPin | SourceControlPin;

export type ValidationReport = {
  domains: Record<string, ReconciliationResult>;
  all_passed: boolean;
};
