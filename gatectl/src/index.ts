export * from "./types/config.js";
export * from "./types/packages.js";
export * from "./types/pipeline.js";
export type { Diagnostic, DiagnosticSink } from "./types/diagnostic.js";
export type { TestFailure, TestResult } from "./types/adapter-output.js";

export { parseSourceDocument, loadDomainSources } from "./manifest/sources.js";
export { parseCondaEnv } from "./manifest/conda-env.js";
export { parseRInstall } from "./manifest/r-install.js";
export { parseInstall2r } from "./manifest/install2r.js";
export { parsePackageList } from "./manifest/list.js";

export { parseCondaListJson } from "./snapshot/conda.js";
export { parseDescriptionRecords, readLibraryDirectory } from "./snapshot/description.js";
export { captureSnapshot, readSnapshotPath } from "./snapshot/capture.js";
export { SnapshotUnavailableError } from "./snapshot/errors.js";

export { reconcile, reconcileDomains, DEFAULT_BUNDLED_PRIORITIES } from "./reconcile/reconciler.js";
export { emit } from "./pins/emitter.js";
export { renderPins, renderPipRequirements, isPipPin, PIP_CHANNEL } from "./pins/render.js";
export { renderDomainManifests, emitOptionsFor } from "./pins/manifests.js";
export type { RenderedManifest } from "./pins/manifests.js";
export { parsePinnedManifest, parsePipRequirements } from "./pins/parse.js";
export type { OutputSink } from "./pins/sink.js";
export { report, renderReport, missingItems } from "./report/reporter.js";

export { nextState, InvalidTransitionError } from "./core/state-machine.js";
export { PipelineController } from "./core/controller.js";
export type { PipelineCollaborators, DomainPlan, RunOutcome } from "./core/controller.js";
export { commandCollaborators } from "./core/collaborators.js";
export { loadConfig } from "./config/validator.js";
