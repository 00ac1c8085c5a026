/**
 * RunEngine drives one run: the child tasks of a parent ticket, one at a time.
 * Purpose: own the task graph, the workspace, and every status transition of the run.
 * Assumptions: strictly sequential; every collaborator call is awaited before the loop moves on.
 * Usage: const { summary } = await runScheduler(graph, deps, { runId, maxRetries });
 */

import { WorkspaceAcquisitionError } from "../../../core/errors.js";
import {
  logOrchestratorEvent,
  logRunResume,
  logTaskReset,
  type JsonlLogger,
} from "../../../core/logger.js";
import {
  markTaskCompleted,
  markTaskRunning,
  recordTaskFailure,
  seedTaskStatuses,
} from "../../../core/state.js";
import { markBlocked, readyTasks, type Task, type TaskGraph } from "../../../core/task-graph.js";
import { tailText } from "../../../core/utils.js";
import type { ExecutorDispatcher } from "../dispatch/executor-dispatcher.js";
import { describeAbort, formatErrorMessage } from "../helpers/errors.js";
import type { ParentTicket } from "../ports.js";
import type { ReviewGate } from "../review/review-gate.js";
import type { StateSynchronizer } from "../state/state-synchronizer.js";
import type { VerificationGate } from "../validation/verification-gate.js";
import type { WorkspaceHandle, WorkspaceManager } from "../workspace/workspace-manager.js";

import {
  blockNote,
  createAttemptSignal,
  retryNote,
  skipNote,
  skipWarning,
} from "./failure-policy.js";
import { buildRunSummary, type RunSummary } from "./run-summary.js";

// =============================================================================
// TYPES
// =============================================================================

export type SchedulerDeps = {
  dispatcher: ExecutorDispatcher;
  verification: VerificationGate;
  review: ReviewGate;
  synchronizer: StateSynchronizer;
  workspace: WorkspaceManager;
  logger: JsonlLogger;
};

export type AbortDisposition = "discard" | "keep";

export type SchedulerOptions = {
  runId: string;
  maxRetries: number;
  // Per-attempt limit handed to the dispatcher as an abort signal.
  taskTimeoutMs?: number;
  // Checked between tasks only; an attempt in flight always finishes.
  stopSignal?: AbortSignal;
  onAbort?: AbortDisposition;
  retrySkipped?: boolean;
};

export type SchedulerResult = {
  summary: RunSummary;
  parent: ParentTicket;
  // Null once the workspace was discarded after an abort.
  workspace: WorkspaceHandle | null;
};

const OUTPUT_LOG_CHARS = 2000;

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Runs every ready task until none is left (or a stop is requested), then
 * blocks whatever can no longer run.
 *
 * @throws ConfigError when a label has no strategy, WorkspaceAcquisitionError
 * when the workspace is unusable, and ticket store errors while loading state.
 * Nothing has been dispatched when any of these is thrown, except a
 * WorkspaceAcquisitionError from a failed reset between attempts.
 */
export async function runScheduler(
  graph: TaskGraph,
  deps: SchedulerDeps,
  options: SchedulerOptions,
): Promise<SchedulerResult> {
  const engine = new RunEngine(graph, deps, options);
  return engine.run();
}

// =============================================================================
// ENGINE
// =============================================================================

class RunEngine {
  private readonly attempts = new Map<string, number>();
  private dispatches = 0;

  constructor(
    private readonly graph: TaskGraph,
    private readonly deps: SchedulerDeps,
    private readonly options: SchedulerOptions,
  ) {}

  async run(): Promise<SchedulerResult> {
    const { dispatcher, logger, workspace } = this.deps;
    const { runId, maxRetries } = this.options;

    dispatcher.assertCovers(this.graph);

    logOrchestratorEvent(logger, "run.start", {
      tasks: this.graph.tasks.length,
      max_retries: maxRetries,
      task_timeout_ms: this.options.taskTimeoutMs ?? null,
    });

    await this.seedFromStore();

    const acquired = await workspace.acquire(runId);
    const handle = acquired.handle;
    logOrchestratorEvent(logger, "workspace.acquire", {
      name: handle.name,
      path: handle.path,
      base_sha: handle.baseSha,
      reused: acquired.reused,
    });

    const parent = await this.deps.synchronizer.loadParent();

    let abortReason: string | undefined;
    for (;;) {
      const [task] = readyTasks(this.graph);
      if (!task) break;

      const stopSignal = this.options.stopSignal;
      if (stopSignal?.aborted) {
        abortReason = describeAbort(stopSignal);
        logOrchestratorEvent(logger, "run.stop", { reason: abortReason, next_task: task.id });
        break;
      }

      await this.runTask(task, handle, parent);
    }

    const aborted = abortReason !== undefined;
    if (!aborted) {
      await this.blockStalledTasks();
    }

    const summary = buildRunSummary(this.graph, {
      runId,
      attempts: this.attempts,
      unsynced: this.deps.synchronizer.unsynced(),
      dispatches: this.dispatches,
      aborted,
      abortReason,
    });

    logOrchestratorEvent(logger, "run.complete", {
      completed: summary.completed.length,
      skipped: summary.skipped.length,
      blocked: summary.blocked.length,
      pending: summary.pending.length,
      unsynced: summary.unsynced.length,
      dispatches: summary.dispatches,
      aborted,
    });

    if (aborted && this.options.onAbort === "discard") {
      await workspace.release(handle, "discard");
      logOrchestratorEvent(logger, "workspace.release", { mode: "discard", path: handle.path });
      return { summary, parent, workspace: null };
    }

    return { summary, parent, workspace: handle };
  }

  // ---------------------------------------------------------------------------
  // Setup
  // ---------------------------------------------------------------------------

  private async seedFromStore(): Promise<void> {
    const { synchronizer, logger } = this.deps;

    const persisted = await synchronizer.loadStatuses();
    const seeded = seedTaskStatuses(this.graph, persisted, {
      retrySkipped: this.options.retrySkipped,
    });

    for (const reset of seeded.reset) {
      const task = this.graph.byId.get(reset.taskId);
      if (!task) continue;
      logTaskReset(logger, task.id, reset.previousStatus);
      await synchronizer.persist(task);
    }

    if (seeded.completed.length + seeded.skipped.length + seeded.reset.length > 0) {
      logRunResume(logger, {
        completed: seeded.completed.length,
        skipped: seeded.skipped.length,
        resetTasks: seeded.reset.length,
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Attempt
  // ---------------------------------------------------------------------------

  private async runTask(task: Task, handle: WorkspaceHandle, parent: ParentTicket): Promise<void> {
    const { logger, synchronizer, workspace } = this.deps;
    const attempt = task.retryCount + 1;

    // Every attempt starts from the last completed task's checkpoint. The task
    // is only marked running once the reset succeeded, so a failed reset leaves it pending.
    try {
      await workspace.resetAttempt(handle);
    } catch (err) {
      throw new WorkspaceAcquisitionError(
        `Could not reset workspace ${handle.path} before attempt ${attempt} of task ${task.id}: ${formatErrorMessage(err)}`,
        this.options.runId,
        err,
      );
    }

    markTaskRunning(task);
    logOrchestratorEvent(logger, "task.start", {
      taskId: task.id,
      attempt,
      label: task.label,
    });
    await synchronizer.persist(task);

    const failure = await this.attempt(task, attempt, handle, parent);
    if (failure === null) {
      const checkpoint = await this.checkpoint(task, handle);
      if (checkpoint.ok) {
        markTaskCompleted(task);
        logOrchestratorEvent(logger, "task.complete", {
          taskId: task.id,
          attempt,
          checkpoint: checkpoint.sha,
        });
        await synchronizer.persist(task);
        return;
      }
      await this.fail(task, attempt, checkpoint.reason);
      return;
    }

    await this.fail(task, attempt, failure);
  }

  /** Returns null when the attempt passed every gate, otherwise the failure reason. */
  private async attempt(
    task: Task,
    attempt: number,
    handle: WorkspaceHandle,
    parent: ParentTicket,
  ): Promise<string | null> {
    const { dispatcher, verification, review, logger } = this.deps;

    const attemptSignal = createAttemptSignal(this.options.taskTimeoutMs);
    this.dispatches += 1;
    this.attempts.set(task.id, (this.attempts.get(task.id) ?? 0) + 1);

    const result = await dispatcher
      .run(task, {
        runId: this.options.runId,
        workspacePath: handle.path,
        parent,
        attempt,
        maxAttempts: this.options.maxRetries,
        signal: attemptSignal.signal,
      })
      .finally(() => attemptSignal.dispose());

    logOrchestratorEvent(logger, "task.dispatch", {
      taskId: task.id,
      attempt,
      success: result.success,
      output: tailText(result.output, OUTPUT_LOG_CHARS),
    });
    if (!result.success) return result.output;

    const verified = await verification.run(handle.path);
    for (const check of verified.checks) {
      logOrchestratorEvent(logger, "verification.check", {
        taskId: task.id,
        attempt,
        check: check.name,
        passed: check.passed,
        skipped: check.skipped,
        duration_ms: check.durationMs,
      });
    }
    if (!verified.passed) return `Verification failed: ${verified.detail}`;

    const verdict = await review.runPerTask(task, result, {
      runId: this.options.runId,
      parent,
      workspacePath: handle.path,
    });
    logOrchestratorEvent(logger, "review.verdict", {
      taskId: task.id,
      attempt,
      passed: verdict.passed,
      detail: tailText(verdict.detail, OUTPUT_LOG_CHARS),
    });
    if (!verdict.passed) return `Review rejected: ${verdict.detail}`;

    return null;
  }

  private async checkpoint(
    task: Task,
    handle: WorkspaceHandle,
  ): Promise<{ ok: true; sha: string | null } | { ok: false; reason: string }> {
    try {
      const sha = await this.deps.workspace.checkpoint(handle, `${task.id}: ${task.title}`);
      return { ok: true, sha };
    } catch (err) {
      return { ok: false, reason: `Checkpoint failed: ${formatErrorMessage(err)}` };
    }
  }

  private async fail(task: Task, attempt: number, reason: string): Promise<void> {
    const { logger, synchronizer } = this.deps;
    const { maxRetries } = this.options;

    const outcome = recordTaskFailure(task, reason, maxRetries);
    if (outcome === "retry") {
      logOrchestratorEvent(logger, "task.retry", {
        taskId: task.id,
        attempt,
        retry_count: task.retryCount,
        reason: tailText(reason, OUTPUT_LOG_CHARS),
      });
      await synchronizer.persist(task, retryNote(attempt, maxRetries, reason));
      return;
    }

    console.warn(skipWarning(task.id, task.title, task.retryCount, reason));
    logOrchestratorEvent(logger, "task.skipped", {
      taskId: task.id,
      attempts: task.retryCount,
      reason: tailText(reason, OUTPUT_LOG_CHARS),
    });
    await synchronizer.persist(task, skipNote(task.retryCount, reason));
  }

  // ---------------------------------------------------------------------------
  // Stall
  // ---------------------------------------------------------------------------

  private async blockStalledTasks(): Promise<void> {
    const { logger, synchronizer } = this.deps;

    for (const task of markBlocked(this.graph)) {
      const blockedBy = task.blockedBy ?? [];
      logOrchestratorEvent(logger, "task.blocked", { taskId: task.id, blocked_by: blockedBy });
      await synchronizer.persist(task, blockNote(blockedBy));
    }
  }
}
