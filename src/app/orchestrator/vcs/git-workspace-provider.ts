/**
 * GitWorktreeProvider isolates a run in its own git worktree and branch.
 * Purpose: implement the WorkspaceProvider port over the helpers in src/git.
 * Assumptions: `repoPath` is the main checkout; the base branch is checked out there
 * when a run is integrated.
 * Usage: new GitWorktreeProvider({ repoPath, workspaceRoot: ".worktrees" }).
 */

import path from "node:path";

import { GitError } from "../../../core/errors.js";
import {
  abortMerge,
  branchExists,
  currentBranch,
  deleteLocalBranch,
  diffStat,
  ensureCleanWorkingTree,
  git,
  hasUncommittedChanges,
  headSha,
  isAncestor,
  isMergeConflictError,
  mergeNoFf,
  resolveRevision,
} from "../../../git/git.js";
import {
  addWorktree,
  ensureWorktreeRootIgnored,
  listWorktrees,
  removeWorktree,
  type WorktreeEntry,
} from "../../../git/worktree.js";
import type {
  EnvironmentValidation,
  WorkspaceEnvironment,
  WorkspaceProvider,
} from "../ports.js";

export type GitWorktreeProviderOptions = {
  repoPath: string;
  // Relative to repoPath unless absolute.
  workspaceRoot: string;
};

export class GitWorktreeProvider implements WorkspaceProvider {
  private readonly repoPath: string;
  private readonly rootDir: string;

  constructor(options: GitWorktreeProviderOptions) {
    this.repoPath = path.resolve(options.repoPath);
    this.rootDir = path.resolve(this.repoPath, options.workspaceRoot);
  }

  worktreePath(name: string): string {
    return path.join(this.rootDir, name);
  }

  async createIsolatedEnvironment(
    baseRevision: string,
    name: string,
  ): Promise<WorkspaceEnvironment> {
    const baseSha = await resolveRevision(this.repoPath, baseRevision);
    if (await branchExists(this.repoPath, name)) {
      throw new GitError(
        `Branch ${name} already exists without a worktree. Delete it or use another run id.`,
      );
    }

    const relativeRoot = path.relative(this.repoPath, this.rootDir);
    if (isInsideRepo(relativeRoot)) {
      await ensureWorktreeRootIgnored(this.repoPath, relativeRoot);
    }

    const worktreePath = this.worktreePath(name);
    await addWorktree({ repoPath: this.repoPath, worktreePath, branch: name, startPoint: baseSha });
    return { name, path: worktreePath, baseSha };
  }

  async findEnvironment(name: string, baseRevision: string): Promise<WorkspaceEnvironment | null> {
    const entry = await this.findWorktree((candidate) => candidate.branch === name);
    if (!entry) return null;

    const res = await git(this.repoPath, ["merge-base", baseRevision, name]);
    return { name, path: entry.path, baseSha: res.stdout.trim() };
  }

  async validateEnvironment(
    env: WorkspaceEnvironment,
    baseRevision: string,
  ): Promise<EnvironmentValidation> {
    const entry = await this.findWorktree((candidate) => candidate.path === env.path);
    if (!entry) {
      return { valid: false, reason: `${env.path} is not a worktree of ${this.repoPath}` };
    }
    if (entry.prunable) {
      return { valid: false, reason: `worktree ${env.path} is missing on disk` };
    }

    const branch = await currentBranch(env.path);
    if (branch !== env.name) {
      return { valid: false, reason: `checked out branch is ${branch}, expected ${env.name}` };
    }

    const head = await headSha(env.path);
    if (!(await isAncestor(this.repoPath, baseRevision, head))) {
      return { valid: false, reason: `${baseRevision} is not an ancestor of ${env.name}` };
    }

    return { valid: true };
  }

  async resetEnvironment(env: WorkspaceEnvironment): Promise<void> {
    await git(env.path, ["reset", "--hard", "HEAD"]);
    await git(env.path, ["clean", "-fd"]);
  }

  async checkpointEnvironment(env: WorkspaceEnvironment, message: string): Promise<string | null> {
    await git(env.path, ["add", "-A"]);
    if (!(await hasUncommittedChanges(env.path))) return null;

    await git(env.path, ["commit", "-m", message]);
    return headSha(env.path);
  }

  async describeChanges(env: WorkspaceEnvironment): Promise<string> {
    const log = await git(env.path, ["log", "--oneline", `${env.baseSha}..HEAD`]);
    const stat = await diffStat(env.path, env.baseSha);
    return [log.stdout.trim(), stat].filter((part) => part.length > 0).join("\n\n");
  }

  async integrateEnvironment(env: WorkspaceEnvironment, baseRevision: string): Promise<void> {
    const branch = await currentBranch(this.repoPath);
    if (branch !== baseRevision) {
      throw new GitError(
        `Main checkout is on ${branch}; check out ${baseRevision} before integrating ${env.name}.`,
      );
    }
    await ensureCleanWorkingTree(this.repoPath);
    if (await hasUncommittedChanges(env.path)) {
      throw new GitError(`Workspace ${env.path} has uncommitted changes; refusing to integrate.`);
    }

    try {
      await mergeNoFf(this.repoPath, env.name, `Merge ${env.name} into ${baseRevision}`);
    } catch (err) {
      if (!isMergeConflictError(err)) throw err;
      await abortMerge(this.repoPath);
      throw new GitError(
        `Merging ${env.name} into ${baseRevision} conflicts; the merge was aborted.`,
        err,
      );
    }
  }

  async teardownEnvironment(env: WorkspaceEnvironment): Promise<void> {
    const entry = await this.findWorktree((candidate) => candidate.path === env.path);
    if (entry) {
      await removeWorktree(this.repoPath, env.path);
    }
    if (await branchExists(this.repoPath, env.name)) {
      await deleteLocalBranch(this.repoPath, env.name);
    }
  }

  private async findWorktree(
    match: (entry: WorktreeEntry) => boolean,
  ): Promise<WorktreeEntry | undefined> {
    const entries = await listWorktrees(this.repoPath);
    return entries.find(match);
  }
}

function isInsideRepo(relativePath: string): boolean {
  return (
    relativePath.length > 0 && !relativePath.startsWith("..") && !path.isAbsolute(relativePath)
  );
}
