export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type DiagnosticSink = (d: Diagnostic) => void;

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  details?: Record<string, unknown>,
): Diagnostic {
  return details ? { level, code, message, details } : { level, code, message };
}
