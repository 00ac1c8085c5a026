import type { AppContext } from "../app/context.js";
import {
  buildRunContext,
  loadRunGraph,
  schedulerOptions,
  type RunContext,
  type RunPorts,
} from "../app/orchestrator/run-context-builder.js";
import { integrateRun } from "../app/orchestrator/run/integration.js";
import type { AbortDisposition, SchedulerResult } from "../app/orchestrator/run/run-engine.js";
import {
  formatRunSummary,
  isRunClean,
  summaryExitCode,
} from "../app/orchestrator/run/run-summary.js";
import { runScheduler } from "../app/orchestrator/run/run-engine.js";
import { seedTaskStatuses } from "../core/state.js";
import { planExecutionOrder } from "../core/task-graph.js";

import { normalizeCommandError } from "./command-errors.js";
import { createRunStopSignalHandler } from "./signal-handlers.js";

export type RunCommandOptions = {
  parent: string;
  maxRetries?: number;
  retrySkipped?: boolean;
  integrate?: boolean;
  onAbort?: AbortDisposition;
  dryRun?: boolean;
};

const RUN_COMMAND_FAILURE_TITLE = "Run command failed.";
// Stall, skip and a rejected final review share the "not clean" exit code.
const NOT_CLEAN_EXIT_CODE = 2;

export async function runCommand(
  appContext: AppContext,
  opts: RunCommandOptions,
  ports?: Partial<RunPorts>,
): Promise<void> {
  try {
    const ctx = buildRunContext({ appContext, parentId: opts.parent, ports });
    try {
      if (opts.dryRun) {
        await printDryRun(ctx, opts);
        return;
      }
      await executeRun(ctx, opts);
    } finally {
      ctx.logger.close();
    }
  } catch (error) {
    throw normalizeCommandError(error, RUN_COMMAND_FAILURE_TITLE);
  }
}

// =============================================================================
// RUN
// =============================================================================

async function executeRun(ctx: RunContext, opts: RunCommandOptions): Promise<void> {
  const graph = await loadRunGraph(ctx);

  const stopHandler = createRunStopSignalHandler({
    onSignal: (signal) => {
      console.log(
        `Received ${signal}. Finishing the current task, then stopping run ${ctx.parentId}. Press Ctrl+C again to exit now.`,
      );
    },
  });

  let result: SchedulerResult;
  try {
    result = await runScheduler(
      graph,
      ctx.deps,
      schedulerOptions(ctx, {
        maxRetries: opts.maxRetries,
        retrySkipped: opts.retrySkipped,
        onAbort: opts.onAbort,
        stopSignal: stopHandler.signal,
      }),
    );
  } finally {
    stopHandler.cleanup();
  }

  const { summary, workspace, parent } = result;
  console.log(formatRunSummary(summary));
  console.log(`Log: ${ctx.logPath}`);
  process.exitCode = summaryExitCode(summary);

  if (!workspace) {
    console.log("Workspace discarded.");
    return;
  }

  if (!opts.integrate) {
    console.log(`Workspace kept at ${workspace.path} (branch ${workspace.name}).`);
    console.log(`Integrate with: planloom release --parent ${ctx.parentId} --mode integrate`);
    return;
  }

  if (!isRunClean(summary)) {
    console.log(
      `Not integrating: run ${ctx.parentId} did not complete every task. Workspace kept at ${workspace.path}.`,
    );
    return;
  }

  const integration = await integrateRun(graph, ctx.integration, { handle: workspace, parent });
  if (!integration.integrated) {
    console.log(`Final review rejected run ${ctx.parentId}: ${integration.verdict.detail}`);
    console.log(`Workspace kept at ${workspace.path}.`);
    process.exitCode = NOT_CLEAN_EXIT_CODE;
    return;
  }

  console.log(`Integrated ${workspace.name} into ${workspace.baseRevision}.`);
}

// =============================================================================
// DRY RUN
// =============================================================================

async function printDryRun(ctx: RunContext, opts: RunCommandOptions): Promise<void> {
  const graph = await loadRunGraph(ctx);
  const statuses = await ctx.synchronizer.loadStatuses();
  seedTaskStatuses(graph, statuses, { retrySkipped: opts.retrySkipped });

  const missing = ctx.deps.dispatcher.missingStrategies(graph);
  const order = planExecutionOrder(graph);
  if (order.length === 0) {
    console.log(`Dry run ${ctx.parentId}: no runnable tasks.`);
  } else {
    console.log(`Dry run ${ctx.parentId}: ${order.length} task(s) in dispatch order.`);
    order.forEach((task, index) => {
      console.log(`  ${index + 1}. ${task.id} [${task.label}] ${task.title}`);
    });
  }

  const unreachable = graph.tasks.filter(
    (task) => task.status === "pending" && !order.includes(task),
  );
  if (unreachable.length > 0) {
    console.log(`Would be blocked: ${unreachable.map((task) => task.id).join(", ")}`);
  }
  if (missing.length > 0) {
    console.log(`Missing strategies for label(s): ${missing.join(", ")}`);
  }
}
