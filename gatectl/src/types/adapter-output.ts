/** Normalized result of the notebook test stage. */
export type TestFailure = {
  name: string;
  message: string;
  stacktrace?: string;
};

export type TestResult = {
  pass: boolean;
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  duration_ms: number;
  failures: TestFailure[];
};
