import type { AppContext } from "../app/context.js";
import {
  buildRunContext,
  loadRunGraph,
  type RunContext,
  type RunPorts,
} from "../app/orchestrator/run-context-builder.js";
import { integrateRun } from "../app/orchestrator/run/integration.js";
import type { ReleaseMode } from "../app/orchestrator/workspace/workspace-manager.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { seedTaskStatuses } from "../core/state.js";

import { normalizeCommandError } from "./command-errors.js";

export type ReleaseCommandOptions = {
  parent: string;
  mode: ReleaseMode;
  skipFinalReview?: boolean;
};

const RELEASE_FAILURE_TITLE = "Release command failed.";
const REJECTED_EXIT_CODE = 2;

// =============================================================================
// RELEASE
// =============================================================================

export async function releaseCommand(
  appContext: AppContext,
  opts: ReleaseCommandOptions,
  ports?: Partial<RunPorts>,
): Promise<void> {
  try {
    const ctx = buildRunContext({ appContext, parentId: opts.parent, ports });
    try {
      await releaseWorkspace(ctx, opts);
    } finally {
      ctx.logger.close();
    }
  } catch (error) {
    throw normalizeCommandError(error, RELEASE_FAILURE_TITLE);
  }
}

async function releaseWorkspace(ctx: RunContext, opts: ReleaseCommandOptions): Promise<void> {
  const handle = await ctx.workspace.find(ctx.parentId);
  if (!handle) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.workspace,
      title: RELEASE_FAILURE_TITLE,
      message: `No workspace ${ctx.workspace.workspaceName(ctx.parentId)} found for run ${ctx.parentId}.`,
      next: `planloom status --parent ${ctx.parentId}`,
    });
  }

  if (opts.mode === "discard") {
    await ctx.workspace.release(handle, "discard");
    console.log(`Discarded workspace ${handle.path} and branch ${handle.name}.`);
    return;
  }

  const graph = await loadRunGraph(ctx);
  seedTaskStatuses(graph, await ctx.synchronizer.loadStatuses());
  const parent = await ctx.synchronizer.loadParent();

  const result = await integrateRun(graph, ctx.integration, {
    handle,
    parent,
    skipFinalReview: opts.skipFinalReview,
  });
  if (!result.integrated) {
    console.log(`Final review rejected run ${ctx.parentId}: ${result.verdict.detail}`);
    console.log(`Workspace kept at ${handle.path}.`);
    process.exitCode = REJECTED_EXIT_CODE;
    return;
  }

  console.log(`Integrated ${handle.name} into ${handle.baseRevision}.`);
}
