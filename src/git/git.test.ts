import { describe, expect, it, vi } from "vitest";

const execaMocks = vi.hoisted(() => ({ execa: vi.fn() }));

vi.mock("execa", async (importOriginal) => {
  const actual = await importOriginal<typeof import("execa")>();
  return { ...actual, execa: execaMocks.execa };
});

import { GitError } from "../core/errors.js";

import { git, isAncestor, isMergeConflictError } from "./git.js";

describe("git", () => {
  it("wraps a failed invocation into a GitError naming the command", async () => {
    execaMocks.execa.mockRejectedValueOnce(new Error("spawn git ENOENT"));

    const result = git("/repo", ["status", "--porcelain"]);

    await expect(result).rejects.toBeInstanceOf(GitError);
    await expect(result).rejects.toThrow(
      "git status --porcelain failed (cwd=/repo): Error: spawn git ENOENT",
    );
  });
});

describe("isAncestor", () => {
  it("maps merge-base exit codes to a boolean", async () => {
    execaMocks.execa
      .mockResolvedValueOnce({ exitCode: 0, stdout: "", stderr: "" })
      .mockResolvedValueOnce({ exitCode: 1, stdout: "", stderr: "" });

    await expect(isAncestor("/repo", "base", "head")).resolves.toBe(true);
    await expect(isAncestor("/repo", "base", "head")).resolves.toBe(false);
    expect(execaMocks.execa).toHaveBeenLastCalledWith(
      "git",
      ["merge-base", "--is-ancestor", "base", "head"],
      expect.objectContaining({ cwd: "/repo", reject: false }),
    );
  });

  it("throws when merge-base fails for another reason", async () => {
    execaMocks.execa.mockResolvedValueOnce({
      exitCode: 128,
      stdout: "",
      stderr: "fatal: Not a valid commit name base",
    });

    await expect(isAncestor("/repo", "base", "head")).rejects.toThrow(
      "git merge-base --is-ancestor base head failed (cwd=/repo): fatal: Not a valid commit name base",
    );
  });
});

describe("isMergeConflictError", () => {
  it("detects conflict markers without the merge conflict phrase", () => {
    const err = new GitError("git merge failed", {
      stdout: "CONFLICT (rename/delete): src/app.ts deleted in HEAD and modified in feature\n",
      stderr: "",
    });

    expect(isMergeConflictError(err)).toBe(true);
  });

  it("ignores non-conflict git errors", () => {
    const err = new GitError("git merge failed", {
      stdout: "",
      stderr: "fatal: not a git repository (or any of the parent directories): .git\n",
    });

    expect(isMergeConflictError(err)).toBe(false);
  });
});
