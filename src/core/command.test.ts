import { describe, expect, it, vi } from "vitest";

const execaMocks = vi.hoisted(() => ({ execa: vi.fn() }));

vi.mock("execa", async (importOriginal) => {
  const actual = await importOriginal<typeof import("execa")>();
  return { ...actual, execa: execaMocks.execa };
});

import { describeCommandFailure, runCommand, runShellCommand } from "./command.js";

function rawResult(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    exitCode: 0,
    timedOut: false,
    isCanceled: false,
    stdout: "",
    stderr: "",
    ...overrides,
  };
}

describe("runShellCommand", () => {
  it("runs through the shell without rejecting and joins non-empty output", async () => {
    execaMocks.execa.mockResolvedValueOnce(rawResult({ exitCode: 1, stdout: "out", stderr: "err" }));
    const controller = new AbortController();

    const result = await runShellCommand("make check", {
      cwd: "/work",
      timeoutMs: 5000,
      input: "{}",
      env: { PLANLOOM_TASK_ID: "T1" },
      signal: controller.signal,
    });

    expect(execaMocks.execa).toHaveBeenCalledWith("make check", {
      cwd: "/work",
      shell: true,
      reject: false,
      stdio: "pipe",
      input: "{}",
      env: { PLANLOOM_TASK_ID: "T1" },
      timeout: 5000,
      cancelSignal: controller.signal,
    });
    expect(result).toEqual({
      exitCode: 1,
      timedOut: false,
      canceled: false,
      stdout: "out",
      stderr: "err",
      output: "out\nerr",
    });
  });

  it("reports a missing exit code as null", async () => {
    execaMocks.execa.mockResolvedValueOnce(
      rawResult({ exitCode: undefined, timedOut: true, stdout: "partial" }),
    );

    const result = await runShellCommand("sleep 100", { cwd: "/work" });

    expect(result).toMatchObject({ exitCode: null, timedOut: true, output: "partial" });
  });
});

describe("runCommand", () => {
  it("passes the file and args without a shell", async () => {
    execaMocks.execa.mockResolvedValueOnce(rawResult({ stdout: "test lint" }));

    const result = await runCommand("just", ["--summary"], { cwd: "/work" });

    expect(execaMocks.execa).toHaveBeenCalledWith("just", ["--summary"], {
      cwd: "/work",
      reject: false,
      stdio: "pipe",
      input: "",
      env: undefined,
      timeout: undefined,
      cancelSignal: undefined,
    });
    expect(result.stdout).toBe("test lint");
    expect(result.output).toBe("test lint");
  });
});

describe("describeCommandFailure", () => {
  const base = {
    exitCode: 2,
    timedOut: false,
    canceled: false,
    stdout: "",
    stderr: "",
    output: "",
  };

  it("names the reason a command failed", () => {
    expect(describeCommandFailure("just test", base)).toBe("`just test` exited with code 2");
    expect(describeCommandFailure("just test", { ...base, timedOut: true })).toBe(
      "`just test` timed out",
    );
    expect(describeCommandFailure("just test", { ...base, canceled: true })).toBe(
      "`just test` was cancelled",
    );
    expect(
      describeCommandFailure("just test", { ...base, exitCode: null, error: "spawn just ENOENT" }),
    ).toBe("`just test` could not run: spawn just ENOENT");
  });
});
