import fs from "node:fs";
import path from "node:path";

/** Where rendered text goes: standard output or a file. */
export type OutputSink = { kind: "stdout" } | { kind: "file"; path: string };

/** `-` or no path means stdout. */
export function sinkFromArg(arg: string | undefined): OutputSink {
  return !arg || arg === "-" ? { kind: "stdout" } : { kind: "file", path: path.resolve(arg) };
}

export function writeToSink(sink: OutputSink, text: string): void {
  if (sink.kind === "stdout") {
    process.stdout.write(text);
    return;
  }
  fs.mkdirSync(path.dirname(sink.path), { recursive: true });
  fs.writeFileSync(sink.path, text, "utf8");
}
