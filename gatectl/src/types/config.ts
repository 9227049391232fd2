/** Configuration types: layered config system (base.yaml ← env.yaml ← GATECTL_*). */
export type SourceFormat = "conda-env" | "r-install" | "install2r" | "list";

export type SnapshotFormat = "conda-json" | "dcf";

export type PinFormat = "r-script" | "conda-spec";

/** One declared-dependency document, or a glob of them sharing a group label. */
export type SourceConfig = {
  id?: string;
  path?: string;
  glob?: string;
  format: SourceFormat;
  group?: string;
  include_pip?: boolean;
};

export type SnapshotConfig = {
  /** Command run against the built artifact; `{artifact}` is substituted. */
  command: string;
  format: SnapshotFormat;
  /** Library the packages were installed into, checked against forbidden prefixes. */
  library_path?: string;
};

export type DomainConfig = {
  name: string;
  label?: string;
  registry_url: string;
  pin_format: PinFormat;
  pinned_file: string;
  /** Pip requirements written beside a conda-spec manifest; derived from pinned_file when unset. */
  pip_pinned_file?: string;
  /** Snapshot channel name to repository URL. Packages without a channel use registry_url. */
  channels?: Record<string, string>;
  sources: SourceConfig[];
  snapshot: SnapshotConfig;
  bundled_priorities?: string[];
  exclude?: string[];
  forbidden_install_prefixes?: string[];
};

export type PipelineCommands = {
  build: string;
  test: string;
  /** JUnit XML written by the test command, relative to repo_root. */
  test_results?: string;
  publish: string;
};

export type ReleaseConfig = {
  tag: boolean;
  tag_prefix?: string;
};

export type GateConfig = {
  schema_version: string;
  repo_root: string;
  runs_dir: string;
  /** Artifact reference template; `{run_id}` is substituted. */
  artifact_ref: string;
  pipeline: PipelineCommands;
  release?: ReleaseConfig;
  domains: DomainConfig[];
};
