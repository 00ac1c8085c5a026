// Git worktree helpers.
// Purpose: create, list and remove the worktrees that isolate a run from the main checkout.
// Assumes the repo path is the main checkout, not a linked worktree.

import path from "node:path";

import fse from "fs-extra";

import { git } from "./git.js";

// =============================================================================
// TYPES
// =============================================================================

export type WorktreeEntry = {
  path: string;
  head: string | null;
  branch: string | null;
  locked: boolean;
  prunable: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function listWorktrees(repoPath: string): Promise<WorktreeEntry[]> {
  const res = await git(repoPath, ["worktree", "list", "--porcelain"]);
  return parseWorktreeList(res.stdout);
}

export function parseWorktreeList(output: string): WorktreeEntry[] {
  const entries: WorktreeEntry[] = [];
  let current: WorktreeEntry | null = null;

  for (const line of output.split(/\r?\n/)) {
    if (line.startsWith("worktree ")) {
      current = {
        path: line.slice("worktree ".length),
        head: null,
        branch: null,
        locked: false,
        prunable: false,
      };
      entries.push(current);
      continue;
    }
    if (!current) continue;

    if (line.startsWith("HEAD ")) {
      current.head = line.slice("HEAD ".length);
    } else if (line.startsWith("branch ")) {
      current.branch = line.slice("branch ".length).replace(/^refs\/heads\//, "");
    } else if (line === "locked" || line.startsWith("locked ")) {
      current.locked = true;
    } else if (line === "prunable" || line.startsWith("prunable ")) {
      current.prunable = true;
    }
  }

  return entries;
}

export async function addWorktree(input: {
  repoPath: string;
  worktreePath: string;
  branch: string;
  startPoint: string;
}): Promise<void> {
  await fse.ensureDir(path.dirname(input.worktreePath));
  await git(input.repoPath, [
    "worktree",
    "add",
    "-b",
    input.branch,
    input.worktreePath,
    input.startPoint,
  ]);
}

export async function removeWorktree(repoPath: string, worktreePath: string): Promise<void> {
  await git(repoPath, ["worktree", "remove", "--force", worktreePath]);
  await git(repoPath, ["worktree", "prune"]);
}

/**
 * Adds the worktree root to `.git/info/exclude` so run workspaces never show up
 * in the main checkout's status.
 */
export async function ensureWorktreeRootIgnored(
  repoPath: string,
  workspaceRoot: string,
): Promise<void> {
  const excludePath = path.join(repoPath, ".git", "info", "exclude");
  const pattern = `/${workspaceRoot.replace(/^\.?\/+/, "").replace(/\/+$/, "")}/`;

  let existing = "";
  if (await fse.pathExists(excludePath)) {
    existing = await fse.readFile(excludePath, "utf8");
  }

  const existingLines = existing
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (existingLines.includes(pattern)) return;

  const pieces = [existing.trimEnd(), "# planloom run worktrees", pattern];
  const next = pieces.filter((part) => part.length > 0).join("\n") + "\n";
  await fse.ensureDir(path.dirname(excludePath));
  await fse.writeFile(excludePath, next, "utf8");
}
