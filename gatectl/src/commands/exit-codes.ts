import type { PipelineState } from "../types/pipeline.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  PUBLISH_FAILED: 2,
  INVALID_ARGS: 3,
  RELEASE_NOT_CREATED: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** Exit code for a run's final state. */
export function exitCodeFor(state: PipelineState): ExitCode {
  switch (state) {
    case "Released":
      return EXIT.SUCCESS;
    case "PublishFailed":
      return EXIT.PUBLISH_FAILED;
    case "ReleaseFailed":
      return EXIT.RELEASE_NOT_CREATED;
    default:
      return EXIT.FAILED;
  }
}
