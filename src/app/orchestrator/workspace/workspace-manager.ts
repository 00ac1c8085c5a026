/**
 * WorkspaceManager owns the single isolated environment of a run.
 * Purpose: acquire it once (reusing a valid leftover), keep it for the whole run, release it at the end.
 * Assumptions: one manager per run; the provider does the actual git/filesystem work.
 * Usage: const handle = await manager.acquire(runId); ...; await manager.release(handle, "discard").
 */

import { WorkspaceAcquisitionError } from "../../../core/errors.js";
import { slugify } from "../../../core/utils.js";
import { formatErrorMessage } from "../helpers/errors.js";
import type { EnvironmentValidation, WorkspaceEnvironment, WorkspaceProvider } from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type WorkspaceHandle = {
  readonly runId: string;
  readonly name: string;
  readonly path: string;
  readonly baseRevision: string;
  readonly baseSha: string;
};

export type ReleaseMode = "integrate" | "discard";

export type AcquireResult = {
  handle: WorkspaceHandle;
  reused: boolean;
};

export type WorkspaceManagerOptions = {
  provider: WorkspaceProvider;
  baseRevision: string;
  branchPrefix: string;
};

// =============================================================================
// MANAGER
// =============================================================================

export class WorkspaceManager {
  private readonly handles = new Map<string, WorkspaceHandle>();
  private readonly released = new Set<string>();

  constructor(private readonly options: WorkspaceManagerOptions) {}

  workspaceName(runId: string): string {
    const slug = slugify(runId);
    return `${this.options.branchPrefix}${slug.length > 0 ? slug : "run"}`;
  }

  async acquire(runId: string): Promise<AcquireResult> {
    const cached = this.handles.get(runId);
    if (cached) {
      return { handle: cached, reused: true };
    }
    if (this.released.has(runId)) {
      throw new WorkspaceAcquisitionError(
        `Workspace for run ${runId} was already released in this session.`,
        runId,
      );
    }

    const { provider, baseRevision } = this.options;
    const name = this.workspaceName(runId);

    let existing: WorkspaceEnvironment | null;
    try {
      existing = await provider.findEnvironment(name, baseRevision);
    } catch (err) {
      throw new WorkspaceAcquisitionError(
        `Could not inspect workspace ${name} for run ${runId}: ${formatErrorMessage(err)}`,
        runId,
        err,
      );
    }

    if (existing) {
      let validation: EnvironmentValidation;
      try {
        validation = await provider.validateEnvironment(existing, baseRevision);
      } catch (err) {
        throw new WorkspaceAcquisitionError(
          `Could not validate workspace ${existing.path} for run ${runId}: ${formatErrorMessage(err)}`,
          runId,
          err,
        );
      }
      if (!validation.valid) {
        throw new WorkspaceAcquisitionError(
          `Workspace ${existing.path} for run ${runId} is not usable: ${validation.reason}. Remove it or release the run with --mode discard.`,
          runId,
        );
      }
      return { handle: this.remember(runId, existing), reused: true };
    }

    let created: WorkspaceEnvironment;
    try {
      created = await provider.createIsolatedEnvironment(baseRevision, name);
    } catch (err) {
      throw new WorkspaceAcquisitionError(
        `Could not create workspace ${name} from ${baseRevision} for run ${runId}: ${formatErrorMessage(err)}`,
        runId,
        err,
      );
    }

    return { handle: this.remember(runId, created), reused: false };
  }

  async find(runId: string): Promise<WorkspaceHandle | null> {
    const cached = this.handles.get(runId);
    if (cached) return cached;

    const existing = await this.options.provider.findEnvironment(
      this.workspaceName(runId),
      this.options.baseRevision,
    );
    return existing ? this.remember(runId, existing) : null;
  }

  async resetAttempt(handle: WorkspaceHandle): Promise<void> {
    this.assertActive(handle);
    await this.options.provider.resetEnvironment(toEnvironment(handle));
  }

  async checkpoint(handle: WorkspaceHandle, message: string): Promise<string | null> {
    this.assertActive(handle);
    return this.options.provider.checkpointEnvironment(toEnvironment(handle), message);
  }

  async describeChanges(handle: WorkspaceHandle): Promise<string> {
    this.assertActive(handle);
    return this.options.provider.describeChanges(toEnvironment(handle));
  }

  async release(handle: WorkspaceHandle, mode: ReleaseMode): Promise<void> {
    this.assertActive(handle);
    const env = toEnvironment(handle);

    if (mode === "integrate") {
      await this.options.provider.integrateEnvironment(env, handle.baseRevision);
    }
    await this.options.provider.teardownEnvironment(env);

    this.handles.delete(handle.runId);
    this.released.add(handle.runId);
  }

  private remember(runId: string, env: WorkspaceEnvironment): WorkspaceHandle {
    const handle: WorkspaceHandle = {
      runId,
      name: env.name,
      path: env.path,
      baseRevision: this.options.baseRevision,
      baseSha: env.baseSha,
    };
    this.handles.set(runId, handle);
    return handle;
  }

  private assertActive(handle: WorkspaceHandle): void {
    if (this.released.has(handle.runId)) {
      throw new Error(`Workspace for run ${handle.runId} has already been released.`);
    }
  }
}

function toEnvironment(handle: WorkspaceHandle): WorkspaceEnvironment {
  return { name: handle.name, path: handle.path, baseSha: handle.baseSha };
}
