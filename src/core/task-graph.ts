import { z } from "zod";

import { CycleError, DanglingReferenceError, DuplicateTaskError } from "./errors.js";
import { markTaskBlocked } from "./state.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const TASK_LABELS = ["Feature", "Bugfix", "Chore"] as const;

export const TaskLabelSchema = z.enum(TASK_LABELS);
export type TaskLabel = z.infer<typeof TaskLabelSchema>;

export const TaskStatusSchema = z.enum([
  "pending",
  "ready",
  "running",
  "completed",
  "failed",
  "skipped",
  "blocked",
]);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const TaskRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  description: z.string().default(""),
  label: TaskLabelSchema,
  dependencies: z.array(z.string().min(1)).default([]),
  status: TaskStatusSchema.default("pending"),
});
export type TaskRecord = z.infer<typeof TaskRecordSchema>;

// =============================================================================
// TYPES
// =============================================================================

export type Task = {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly label: TaskLabel;
  readonly dependencies: readonly string[];
  readonly order: number;
  status: TaskStatus;
  retryCount: number;
  lastError?: string;
  blockedBy?: string[];
};

export type TaskGraph = {
  readonly tasks: readonly Task[];
  readonly byId: ReadonlyMap<string, Task>;
};

// =============================================================================
// LOAD
// =============================================================================

/**
 * Builds the run's task graph. Every task starts `pending`; persisted statuses
 * are applied later by the scheduler (see `seedTaskStatuses`).
 *
 * @throws DuplicateTaskError, DanglingReferenceError or CycleError.
 */
export function loadTaskGraph(records: readonly TaskRecord[]): TaskGraph {
  assertUniqueIds(records);

  const tasks: Task[] = records.map((record, order) => ({
    id: record.id,
    title: record.title,
    description: record.description,
    label: record.label,
    dependencies: [...new Set(record.dependencies)],
    order,
    status: "pending",
    retryCount: 0,
  }));
  const byId = new Map(tasks.map((task) => [task.id, task]));

  assertReferencesResolve(tasks, byId);
  assertAcyclic(tasks);

  return { tasks, byId };
}

function assertUniqueIds(records: readonly TaskRecord[]): void {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const record of records) {
    if (seen.has(record.id)) duplicates.add(record.id);
    seen.add(record.id);
  }

  if (duplicates.size > 0) {
    throw new DuplicateTaskError([...duplicates]);
  }
}

function assertReferencesResolve(tasks: Task[], byId: Map<string, Task>): void {
  const dangling = tasks.flatMap((task) =>
    task.dependencies
      .filter((dependency) => !byId.has(dependency))
      .map((dependency) => ({ taskId: task.id, dependency })),
  );

  if (dangling.length > 0) {
    throw new DanglingReferenceError(dangling);
  }
}

// Kahn's algorithm: whatever never reaches indegree zero sits on or behind a cycle.
function assertAcyclic(tasks: Task[]): void {
  const indegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const task of tasks) {
    indegree.set(task.id, task.dependencies.length);
    for (const dependency of task.dependencies) {
      const list = dependents.get(dependency) ?? [];
      list.push(task.id);
      dependents.set(dependency, list);
    }
  }

  const queue = tasks.filter((task) => task.dependencies.length === 0).map((task) => task.id);
  const visited = new Set<string>();

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    visited.add(id);

    for (const dependent of dependents.get(id) ?? []) {
      const remaining = (indegree.get(dependent) ?? 0) - 1;
      indegree.set(dependent, remaining);
      if (remaining === 0) queue.push(dependent);
    }
  }

  if (visited.size < tasks.length) {
    const leftover = new Map(
      tasks.filter((task) => !visited.has(task.id)).map((task): [string, Task] => [task.id, task]),
    );
    // Leftovers also include tasks that only hang off a cycle; report the cycle members.
    const onCycle = [...leftover.values()].filter((task) => reachesItself(task, leftover));
    throw new CycleError(onCycle.map((task) => task.id));
  }
}

function reachesItself(start: Task, leftover: ReadonlyMap<string, Task>): boolean {
  const seen = new Set<string>();
  const stack = [...start.dependencies];

  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    if (id === start.id) return true;
    if (seen.has(id)) continue;
    seen.add(id);

    const task = leftover.get(id);
    if (task) stack.push(...task.dependencies);
  }

  return false;
}

// =============================================================================
// QUERIES
// =============================================================================

export function readyTasks(graph: TaskGraph): Task[] {
  return graph.tasks
    .filter(
      (task) =>
        task.status === "pending" &&
        task.dependencies.every((dep) => graph.byId.get(dep)?.status === "completed"),
    )
    .sort((a, b) => a.order - b.order);
}

const BLOCKING_STATUSES: ReadonlySet<TaskStatus> = new Set(["skipped", "failed", "blocked"]);

/**
 * Relabels every pending task that can no longer become ready. Runs to a
 * fixpoint so dependents of newly blocked tasks are blocked as well.
 */
export function markBlocked(graph: TaskGraph): Task[] {
  const newlyBlocked: Task[] = [];
  let changed = true;

  while (changed) {
    changed = false;
    for (const task of graph.tasks) {
      if (task.status !== "pending") continue;

      const blockers = task.dependencies.filter((dep) => {
        const status = graph.byId.get(dep)?.status;
        return status !== undefined && BLOCKING_STATUSES.has(status);
      });
      if (blockers.length === 0) continue;

      markTaskBlocked(task, blockers);
      newlyBlocked.push(task);
      changed = true;
    }
  }

  return newlyBlocked;
}

/**
 * Dispatch order if every remaining task succeeded on its first attempt.
 * Does not mutate the graph.
 */
export function planExecutionOrder(graph: TaskGraph): Task[] {
  const done = new Set(
    graph.tasks.filter((task) => task.status === "completed").map((task) => task.id),
  );
  const pending = graph.tasks
    .filter((task) => task.status === "pending")
    .sort((a, b) => a.order - b.order);
  const order: Task[] = [];

  let next = pending.find((task) => task.dependencies.every((dep) => done.has(dep)));
  while (next) {
    order.push(next);
    done.add(next.id);
    next = pending.find(
      (task) => !done.has(task.id) && task.dependencies.every((dep) => done.has(dep)),
    );
  }

  return order;
}
