import type { PipelineState } from "../types/pipeline.js";

export const TERMINAL_STATES: ReadonlySet<PipelineState> = new Set<PipelineState>([
  "Released",
  "BuildFailed",
  "VerifyFailed",
  "PublishFailed",
  "ReleaseFailed",
]);

/**
 * Events that drive state transitions.
 */
export type PipelineEvent =
  | "start"
  | "build_succeeded"
  | "build_failed"
  | "verify_passed"
  | "verify_failed"
  | "publish_succeeded"
  | "publish_failed"
  | "release_created"
  | "release_failed";

export type TransitionContext = {
  bypass: boolean;
};

export class InvalidTransitionError extends Error {
  constructor(
    readonly from: PipelineState,
    readonly event: PipelineEvent,
  ) {
    super(`No transition from ${from} on ${event}`);
    this.name = "InvalidTransitionError";
  }
}

export function isTerminal(state: PipelineState): boolean {
  return TERMINAL_STATES.has(state);
}

/** Terminal states that count as a successful run. */
export function isSuccess(state: PipelineState): boolean {
  return state === "Released";
}

/**
 * Pure function: given current state + event, return next state.
 *
 * A bypassed run goes Building → Publishing → Released and never enters
 * Verifying or ReleasePending.
 */
export function nextState(current: PipelineState, event: PipelineEvent, ctx: TransitionContext): PipelineState {
  switch (current) {
    case "Pending":
      if (event === "start") return "Building";
      break;
    case "Building":
      if (event === "build_succeeded") return ctx.bypass ? "Publishing" : "Verifying";
      if (event === "build_failed") return "BuildFailed";
      break;
    case "Verifying":
      if (ctx.bypass) break;
      if (event === "verify_passed") return "Publishing";
      if (event === "verify_failed") return "VerifyFailed";
      break;
    case "Publishing":
      if (event === "publish_succeeded") return ctx.bypass ? "Released" : "ReleasePending";
      if (event === "publish_failed") return "PublishFailed";
      break;
    case "ReleasePending":
      if (event === "release_created") return "Released";
      if (event === "release_failed") return "ReleaseFailed";
      break;
    default:
      break;
  }
  throw new InvalidTransitionError(current, event);
}
