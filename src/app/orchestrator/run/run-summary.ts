/**
 * Run summary: final disposition of every task of a run.
 * Purpose: one report for the CLI, the log, and the exit code.
 */

import type { Task, TaskGraph, TaskStatus } from "../../../core/task-graph.js";
import type { UnsyncedTask } from "../state/state-synchronizer.js";

// =============================================================================
// TYPES
// =============================================================================

export type SummaryEntry = {
  id: string;
  title: string;
  status: TaskStatus;
  // Dispatches in this session.
  attempts: number;
  reason?: string;
};

export type RunSummary = {
  runId: string;
  completed: SummaryEntry[];
  skipped: SummaryEntry[];
  blocked: SummaryEntry[];
  pending: SummaryEntry[];
  unsynced: UnsyncedTask[];
  dispatches: number;
  aborted: boolean;
  abortReason?: string;
};

export type SummaryInput = {
  runId: string;
  attempts: ReadonlyMap<string, number>;
  unsynced: UnsyncedTask[];
  dispatches: number;
  aborted: boolean;
  abortReason?: string;
};

// =============================================================================
// BUILD
// =============================================================================

export function buildRunSummary(graph: TaskGraph, input: SummaryInput): RunSummary {
  const summary: RunSummary = {
    runId: input.runId,
    completed: [],
    skipped: [],
    blocked: [],
    pending: [],
    unsynced: input.unsynced,
    dispatches: input.dispatches,
    aborted: input.aborted,
  };
  if (input.abortReason !== undefined) {
    summary.abortReason = input.abortReason;
  }

  for (const task of graph.tasks) {
    const entry = toEntry(task, input.attempts.get(task.id) ?? 0);
    switch (task.status) {
      case "completed":
        summary.completed.push(entry);
        break;
      case "skipped":
        summary.skipped.push(entry);
        break;
      case "blocked":
        summary.blocked.push(entry);
        break;
      default:
        // Anything unresolved (only possible after an abort) is still pending.
        summary.pending.push({ ...entry, status: "pending" });
    }
  }

  return summary;
}

function toEntry(task: Task, attempts: number): SummaryEntry {
  const entry: SummaryEntry = { id: task.id, title: task.title, status: task.status, attempts };

  if (task.status === "blocked" && task.blockedBy && task.blockedBy.length > 0) {
    entry.reason = `blocked by ${task.blockedBy.join(", ")}`;
  } else if (task.status === "skipped" && task.lastError) {
    entry.reason = task.lastError;
  }

  return entry;
}

// =============================================================================
// PRESENTATION
// =============================================================================

export function isRunClean(summary: RunSummary): boolean {
  return (
    !summary.aborted &&
    summary.skipped.length === 0 &&
    summary.blocked.length === 0 &&
    summary.pending.length === 0
  );
}

/** 0 when every task completed, 2 when work was skipped, blocked or left pending. */
export function summaryExitCode(summary: RunSummary): 0 | 2 {
  return isRunClean(summary) ? 0 : 2;
}

export function formatRunSummary(summary: RunSummary): string {
  const total =
    summary.completed.length +
    summary.skipped.length +
    summary.blocked.length +
    summary.pending.length;

  const lines = [
    `Run ${summary.runId}: ${summary.completed.length}/${total} completed, ` +
      `${summary.skipped.length} skipped, ${summary.blocked.length} blocked` +
      (summary.pending.length > 0 ? `, ${summary.pending.length} pending` : "") +
      ` (${summary.dispatches} dispatch${summary.dispatches === 1 ? "" : "es"})`,
  ];

  if (summary.aborted) {
    lines.push(`Stopped early: ${summary.abortReason ?? "stop requested"}`);
  }

  appendSection(lines, "Completed", summary.completed);
  appendSection(lines, "Skipped", summary.skipped);
  appendSection(lines, "Blocked", summary.blocked);
  appendSection(lines, "Pending", summary.pending);

  if (summary.unsynced.length > 0) {
    lines.push("Not saved to the ticket store:");
    for (const item of summary.unsynced) {
      lines.push(`  - ${item.taskId} (${item.status}): ${item.error}`);
    }
  }

  return lines.join("\n");
}

function appendSection(lines: string[], heading: string, entries: SummaryEntry[]): void {
  if (entries.length === 0) return;

  lines.push(`${heading}:`);
  for (const entry of entries) {
    const reason = entry.reason ? ` - ${firstLine(entry.reason)}` : "";
    lines.push(`  - ${entry.id} ${entry.title}${reason}`);
  }
}

function firstLine(text: string): string {
  return text.split(/\r?\n/, 1)[0] ?? "";
}
