import { ExecaError, execa } from "execa";

// =============================================================================
// TYPES
// =============================================================================

export type ShellCommandOptions = {
  cwd: string;
  timeoutMs?: number;
  input?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
};

export type ShellCommandResult = {
  exitCode: number | null;
  timedOut: boolean;
  canceled: boolean;
  stdout: string;
  stderr: string;
  // stdout and stderr joined, for logs and failure notes.
  output: string;
  // Set when the process could not be started or ended without an exit code.
  error?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Runs a command through the shell without throwing on a non-zero exit.
 * Timeouts and cancellation are reported on the result.
 */
export async function runShellCommand(
  command: string,
  options: ShellCommandOptions,
): Promise<ShellCommandResult> {
  const res = await execa(command, {
    cwd: options.cwd,
    shell: true,
    reject: false,
    stdio: "pipe",
    input: options.input ?? "",
    env: options.env,
    timeout: options.timeoutMs,
    cancelSignal: options.signal,
  });
  return toCommandResult(res);
}

export async function runCommand(
  file: string,
  args: string[],
  options: ShellCommandOptions,
): Promise<ShellCommandResult> {
  const res = await execa(file, args, {
    cwd: options.cwd,
    reject: false,
    stdio: "pipe",
    input: options.input ?? "",
    env: options.env,
    timeout: options.timeoutMs,
    cancelSignal: options.signal,
  });
  return toCommandResult(res);
}

export function describeCommandFailure(command: string, result: ShellCommandResult): string {
  if (result.timedOut) return `\`${command}\` timed out`;
  if (result.canceled) return `\`${command}\` was cancelled`;
  if (result.error) return `\`${command}\` could not run: ${result.error}`;
  return `\`${command}\` exited with code ${result.exitCode ?? "unknown"}`;
}

export function outputText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  if (Array.isArray(value)) return value.join("\n");
  return String(value);
}

type RawResult = {
  exitCode?: number;
  timedOut: boolean;
  isCanceled: boolean;
  stdout: unknown;
  stderr: unknown;
};

function toCommandResult(res: RawResult): ShellCommandResult {
  const stdout = outputText(res.stdout);
  const stderr = outputText(res.stderr);
  const result: ShellCommandResult = {
    exitCode: res.exitCode ?? null,
    timedOut: res.timedOut,
    canceled: res.isCanceled,
    stdout,
    stderr,
    output: [stdout, stderr].filter((part) => part.trim().length > 0).join("\n"),
  };

  if (res instanceof ExecaError && res.exitCode === undefined) {
    result.error = res.shortMessage;
  }

  return result;
}
