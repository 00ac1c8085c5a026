import { TaskError } from "./errors.js";
import type { Task, TaskGraph, TaskStatus } from "./task-graph.js";

// =============================================================================
// TYPES
// =============================================================================

export type FailureOutcome = "retry" | "skipped";

export type SeedResult = {
  completed: string[];
  skipped: string[];
  reset: Array<{ taskId: string; previousStatus: TaskStatus }>;
};

// =============================================================================
// TRANSITIONS
// =============================================================================

export function markTaskRunning(task: Task): void {
  if (task.status !== "pending") {
    throw new TaskError(`Cannot start task ${task.id} from status ${task.status}`);
  }

  task.status = "running";
}

export function markTaskCompleted(task: Task): void {
  if (task.status !== "running") {
    throw new TaskError(`Cannot mark task ${task.id} completed from status ${task.status}`);
  }

  task.status = "completed";
  task.lastError = undefined;
}

/**
 * Records a failed attempt: running -> failed, then back to pending while the
 * retry budget lasts, otherwise skipped.
 */
export function recordTaskFailure(task: Task, reason: string, maxRetries: number): FailureOutcome {
  if (task.status !== "running") {
    throw new TaskError(`Cannot record a failure for task ${task.id} from status ${task.status}`);
  }

  task.status = "failed";
  task.lastError = reason;
  task.retryCount += 1;

  if (task.retryCount >= maxRetries) {
    task.status = "skipped";
    return "skipped";
  }

  task.status = "pending";
  return "retry";
}

export function markTaskBlocked(task: Task, blockers: string[]): void {
  if (task.status !== "pending") {
    throw new TaskError(`Cannot block task ${task.id} from status ${task.status}`);
  }

  task.status = "blocked";
  task.blockedBy = blockers;
}

// =============================================================================
// RESUME
// =============================================================================

/**
 * Applies statuses read back from the ticket store. Only `completed` (and
 * `skipped`, unless retrying skipped work) survive a restart; anything whose
 * outcome was never confirmed goes back to pending.
 */
export function seedTaskStatuses(
  graph: TaskGraph,
  persisted: ReadonlyMap<string, TaskStatus>,
  options: { retrySkipped?: boolean } = {},
): SeedResult {
  const result: SeedResult = { completed: [], skipped: [], reset: [] };

  for (const task of graph.tasks) {
    const previous = persisted.get(task.id);
    if (previous === undefined || previous === "pending") continue;

    if (previous === "completed") {
      task.status = "completed";
      result.completed.push(task.id);
      continue;
    }

    if (previous === "skipped" && !options.retrySkipped) {
      task.status = "skipped";
      task.lastError = "Skipped in a previous run";
      result.skipped.push(task.id);
      continue;
    }

    task.status = "pending";
    result.reset.push({ taskId: task.id, previousStatus: previous });
  }

  return result;
}
