/**
 * Integration hand-off for a finished run.
 * Purpose: review the run as a whole, then merge the run branch into the base branch.
 * Assumptions: only called for a clean run or an explicit operator release.
 */

import { logOrchestratorEvent, type JsonlLogger } from "../../../core/logger.js";
import type { TaskGraph } from "../../../core/task-graph.js";
import type { ParentTicket } from "../ports.js";
import type { ReviewGate, ReviewVerdict } from "../review/review-gate.js";
import type { WorkspaceHandle, WorkspaceManager } from "../workspace/workspace-manager.js";

export type IntegrationDeps = {
  review: ReviewGate;
  workspace: WorkspaceManager;
  logger: JsonlLogger;
};

export type IntegrationInput = {
  handle: WorkspaceHandle;
  parent: ParentTicket;
  skipFinalReview?: boolean;
};

export type IntegrationResult =
  | { integrated: true; verdict: ReviewVerdict | null }
  | { integrated: false; verdict: ReviewVerdict };

export async function integrateRun(
  graph: TaskGraph,
  deps: IntegrationDeps,
  input: IntegrationInput,
): Promise<IntegrationResult> {
  const { review, workspace, logger } = deps;
  const { handle, parent } = input;

  let verdict: ReviewVerdict | null = null;
  if (!input.skipFinalReview) {
    const changes = await workspace.describeChanges(handle);
    verdict = await review.runFinal(graph, changes, {
      runId: handle.runId,
      parent,
      workspacePath: handle.path,
    });
    logOrchestratorEvent(logger, "review.final", {
      passed: verdict.passed,
      detail: verdict.detail,
    });

    if (!verdict.passed) {
      return { integrated: false, verdict };
    }
  }

  await workspace.release(handle, "integrate");
  logOrchestratorEvent(logger, "workspace.release", {
    mode: "integrate",
    path: handle.path,
    branch: handle.name,
    base: handle.baseRevision,
  });

  return { integrated: true, verdict };
}
