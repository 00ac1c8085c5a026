import { ExecaError, execa, type Options } from "execa";

import { outputText } from "../core/command.js";
import { GitError } from "../core/errors.js";

export type GitResult = { stdout: string; stderr: string; exitCode: number };

export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      env: process.env,
      ...opts,
    });
    return {
      stdout: outputText(res.stdout),
      stderr: outputText(res.stderr),
      exitCode: res.exitCode ?? -1,
    };
  } catch (err) {
    const stdout = err instanceof ExecaError ? outputText(err.stdout) : "";
    const stderr =
      err instanceof ExecaError ? outputText(err.stderr) || err.shortMessage : String(err);
    throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${stderr}`, { stdout, stderr });
  }
}

export async function headSha(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "HEAD"]);
  return res.stdout.trim();
}

export async function currentBranch(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--abbrev-ref", "HEAD"]);
  return res.stdout.trim();
}

export async function resolveRevision(cwd: string, revision: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--verify", `${revision}^{commit}`]);
  return res.stdout.trim();
}

export async function isAncestor(
  repoPath: string,
  ancestorSha: string,
  descendantSha: string,
): Promise<boolean> {
  const res = await git(repoPath, ["merge-base", "--is-ancestor", ancestorSha, descendantSha], {
    reject: false,
  });

  if (res.exitCode === 0) return true;
  if (res.exitCode === 1) return false;

  throw new GitError(
    `git merge-base --is-ancestor ${ancestorSha} ${descendantSha} failed (cwd=${repoPath}): ${res.stderr}`,
    { stdout: res.stdout, stderr: res.stderr },
  );
}

export async function hasUncommittedChanges(cwd: string): Promise<boolean> {
  const res = await git(cwd, ["status", "--porcelain"]);
  return res.stdout.trim().length > 0;
}

export async function ensureCleanWorkingTree(cwd: string): Promise<void> {
  // Untracked files (tickets, logs) do not block a merge.
  const res = await git(cwd, ["status", "--porcelain", "--untracked-files=no"]);
  if (res.stdout.trim().length > 0) {
    throw new GitError(
      `Repository has uncommitted changes (cwd=${cwd}). Please commit/stash before running.`,
    );
  }
}

export async function branchExists(cwd: string, branch: string): Promise<boolean> {
  try {
    await git(cwd, ["rev-parse", "--verify", `refs/heads/${branch}`]);
    return true;
  } catch {
    return false;
  }
}

export async function mergeNoFf(cwd: string, ref: string, message?: string): Promise<void> {
  const args = ["merge", "--no-ff", ref];
  if (message) {
    args.push("-m", message);
  }
  await git(cwd, args);
}

export async function abortMerge(cwd: string): Promise<void> {
  await git(cwd, ["merge", "--abort"]);
}

export async function deleteLocalBranch(cwd: string, branch: string): Promise<void> {
  await git(cwd, ["branch", "-D", branch]);
}

export async function diffStat(cwd: string, fromRef: string): Promise<string> {
  const res = await git(cwd, ["diff", "--stat", fromRef]);
  return res.stdout.trim();
}

export function isMergeConflictError(err: unknown): boolean {
  if (!(err instanceof GitError)) return false;

  const { stdout, stderr } = extractGitErrorOutput(err);
  const output = `${stdout}\n${stderr}`.toLowerCase();
  return (
    output.includes("automatic merge failed") ||
    output.includes("merge conflict") ||
    /^conflict \(/m.test(output)
  );
}

function extractGitErrorOutput(err: GitError): { stdout: string; stderr: string } {
  const cause = err.cause;
  if (cause && typeof cause === "object") {
    const stdout = "stdout" in cause ? cause.stdout : undefined;
    const stderr = "stderr" in cause ? cause.stderr : undefined;
    return {
      stdout: typeof stdout === "string" ? stdout : "",
      stderr: typeof stderr === "string" ? stderr : "",
    };
  }
  return { stdout: "", stderr: "" };
}
