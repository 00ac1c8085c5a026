/**
 * ReviewGate wraps the judgment service into pass/fail verdicts.
 * Purpose: review each task's changes after verification, and the whole run before integration.
 * Assumptions: a judgment that throws is a failed review; disabled review always passes.
 * Usage: const verdict = await gate.runPerTask(task, result, context).
 */

import type { Task, TaskGraph } from "../../../core/task-graph.js";
import type { ExecutionResult } from "../dispatch/executor-dispatcher.js";
import { formatErrorMessage } from "../helpers/errors.js";
import type { JudgmentService, ParentTicket, ReviewContext } from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReviewVerdict = {
  passed: boolean;
  detail: string;
};

export type ReviewGateOptions = {
  enabled: boolean;
  taskJudge?: JudgmentService;
  // Falls back to the per-task judge when unset.
  finalJudge?: JudgmentService;
};

export type ReviewScope = {
  runId: string;
  parent: ParentTicket;
  workspacePath: string;
};

export const REVIEW_DISABLED = "review disabled";

// =============================================================================
// GATE
// =============================================================================

export class ReviewGate {
  constructor(private readonly options: ReviewGateOptions) {}

  get enabled(): boolean {
    return this.options.enabled;
  }

  async runPerTask(
    task: Task,
    result: ExecutionResult,
    scope: ReviewScope,
  ): Promise<ReviewVerdict> {
    if (!this.options.enabled) return { passed: true, detail: REVIEW_DISABLED };

    return judge(this.options.taskJudge, result.changeSummary, {
      scope: "task",
      runId: scope.runId,
      taskId: task.id,
      title: task.title,
      description: task.description,
      parentContext: scope.parent.context,
      workspacePath: scope.workspacePath,
    });
  }

  async runFinal(graph: TaskGraph, changes: string, scope: ReviewScope): Promise<ReviewVerdict> {
    if (!this.options.enabled) return { passed: true, detail: REVIEW_DISABLED };

    const completed = graph.tasks.filter((task) => task.status === "completed");
    return judge(this.options.finalJudge ?? this.options.taskJudge, changes, {
      scope: "run",
      runId: scope.runId,
      title: scope.parent.title,
      description: completed.map((task) => `- ${task.id}: ${task.title}`).join("\n"),
      parentContext: scope.parent.context,
      workspacePath: scope.workspacePath,
    });
  }
}

async function judge(
  service: JudgmentService | undefined,
  changeSummary: string,
  context: ReviewContext,
): Promise<ReviewVerdict> {
  if (!service) {
    return { passed: false, detail: "Review is enabled but no judgment service is configured" };
  }

  try {
    const judgment = await service.evaluate(changeSummary, context);
    const fallback = judgment.passed ? "approved" : "rejected";
    return {
      passed: judgment.passed,
      detail: judgment.findings.trim().length > 0 ? judgment.findings : fallback,
    };
  } catch (err) {
    return { passed: false, detail: `Review failed: ${formatErrorMessage(err)}` };
  }
}
