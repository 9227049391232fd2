import { execFile } from "node:child_process";
import { promisify } from "node:util";

const pExecFile = promisify(execFile);

export type CommandResult = {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error?: string;
};

export type CommandRunner = (command: string, opts: { cwd: string }) => Promise<CommandResult>;

/** Replace `{key}` placeholders in a command template. Unknown keys are left as-is. */
export function substitute(template: string, vars: Record<string, string>): string {
  return template.replace(/\{([a-z_]+)\}/g, (whole, key: string) => vars[key] ?? whole);
}

type ExecFailure = Error & { code?: number | string; stdout?: string; stderr?: string };

function isExecFailure(e: unknown): e is ExecFailure {
  return e instanceof Error;
}

/** Split a configured command on whitespace. Quotes are not interpreted. */
export function splitCommand(command: string): string[] {
  const trimmed = command.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

/**
 * Run a whitespace-separated command without a shell. Never rejects: a spawn
 * failure or non-zero exit comes back as `ok: false`.
 */
export const runCommand: CommandRunner = async (command, opts) => {
  const [file, ...args] = splitCommand(command);
  if (!file) {
    return { ok: false, exitCode: null, stdout: "", stderr: "", error: "Empty command" };
  }
  try {
    const { stdout, stderr } = await pExecFile(file, args, {
      cwd: opts.cwd,
      maxBuffer: 256 * 1024 * 1024,
    });
    return { ok: true, exitCode: 0, stdout, stderr };
  } catch (e) {
    if (!isExecFailure(e)) {
      return { ok: false, exitCode: null, stdout: "", stderr: "", error: String(e) };
    }
    return {
      ok: false,
      exitCode: typeof e.code === "number" ? e.code : null,
      stdout: e.stdout ?? "",
      stderr: e.stderr ?? "",
      error: e.message,
    };
  }
};
