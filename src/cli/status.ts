import type { AppContext } from "../app/context.js";
import { createDefaultPorts, type RunPorts } from "../app/orchestrator/run-context-builder.js";
import { WorkspaceManager } from "../app/orchestrator/workspace/workspace-manager.js";
import { TaskStatusSchema, type TaskRecord, type TaskStatus } from "../core/task-graph.js";

import { normalizeCommandError } from "./command-errors.js";

// =============================================================================
// STATUS
// =============================================================================

export type StatusCommandOptions = {
  parent: string;
};

export async function statusCommand(
  appContext: AppContext,
  opts: StatusCommandOptions,
  ports?: Partial<Pick<RunPorts, "store" | "provider">>,
): Promise<void> {
  try {
    const { config } = appContext;
    const defaults = createDefaultPorts(config);
    const store = ports?.store ?? defaults.store;
    const workspace = new WorkspaceManager({
      provider: ports?.provider ?? defaults.provider,
      baseRevision: config.base_branch,
      branchPrefix: config.branch_prefix,
    });

    const parent = await store.getParent(opts.parent);
    const records = await store.getChildTasks(opts.parent);
    const handle = await workspace.find(opts.parent);

    console.log(`Parent ${parent.id}: ${parent.title}`);
    for (const line of formatTaskRows(records)) {
      console.log(line);
    }
    console.log(formatStatusCounts(records));
    console.log(
      handle
        ? `Workspace: ${handle.path} (branch ${handle.name})`
        : `Workspace: none (${workspace.workspaceName(opts.parent)} not found)`,
    );
  } catch (error) {
    throw normalizeCommandError(error, "Status command failed.");
  }
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatTaskRows(records: readonly TaskRecord[]): string[] {
  if (records.length === 0) return ["  (no child tasks)"];

  const idWidth = Math.max(...records.map((record) => record.id.length));
  const statusWidth = Math.max(...records.map((record) => record.status.length));
  return records.map((record) => {
    const deps = record.dependencies.length > 0 ? ` <- ${record.dependencies.join(", ")}` : "";
    return `  ${record.id.padEnd(idWidth)}  ${record.status.padEnd(statusWidth)}  [${record.label}] ${record.title}${deps}`;
  });
}

export function formatStatusCounts(records: readonly TaskRecord[]): string {
  const counts = new Map<TaskStatus, number>();
  for (const record of records) {
    counts.set(record.status, (counts.get(record.status) ?? 0) + 1);
  }

  const parts = TaskStatusSchema.options
    .filter((status) => counts.has(status))
    .map((status) => `${status} ${counts.get(status) ?? 0}`);
  return `Tasks: ${records.length}${parts.length > 0 ? ` (${parts.join(", ")})` : ""}`;
}
