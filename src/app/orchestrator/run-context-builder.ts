/**
 * RunContext builder for scheduler runs.
 * Purpose: turn the project config into the adapters, gates and options one run needs.
 * Assumptions: config is already validated; callers may swap any port (tests, embedding).
 * Usage: const ctx = buildRunContext({ appContext, parentId }); runScheduler(graph, ctx.deps, opts).
 */

import type { ProjectConfig } from "../../core/config.js";
import { JsonlLogger } from "../../core/logger.js";
import { orchestratorLogPath } from "../../core/paths.js";
import { TASK_LABELS, loadTaskGraph, type TaskGraph } from "../../core/task-graph.js";
import { FileTicketStore } from "../../core/ticket-store.js";
import type { AppContext } from "../context.js";

import { ExecutorDispatcher, type StrategyRegistry } from "./dispatch/executor-dispatcher.js";
import type {
  CheckRunner,
  JudgmentService,
  TicketStore,
  WorkspaceProvider,
} from "./ports.js";
import { CommandJudgmentService } from "./review/command-judgment-service.js";
import { ReviewGate } from "./review/review-gate.js";
import type { IntegrationDeps } from "./run/integration.js";
import type { AbortDisposition, SchedulerDeps, SchedulerOptions } from "./run/run-engine.js";
import { StateSynchronizer } from "./state/state-synchronizer.js";
import { JustCheckRunner } from "./validation/just-check-runner.js";
import { VerificationGate } from "./validation/verification-gate.js";
import { GitWorktreeProvider } from "./vcs/git-workspace-provider.js";
import { CommandExecutionStrategy } from "./workers/command-execution-strategy.js";
import { WorkspaceManager } from "./workspace/workspace-manager.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunPorts = {
  store: TicketStore;
  provider: WorkspaceProvider;
  strategies: StrategyRegistry;
  checks: CheckRunner;
  taskJudge?: JudgmentService;
  finalJudge?: JudgmentService;
};

export type RunContext = {
  parentId: string;
  config: ProjectConfig;
  logPath: string;
  logger: JsonlLogger;
  synchronizer: StateSynchronizer;
  workspace: WorkspaceManager;
  deps: SchedulerDeps;
  integration: IntegrationDeps;
};

export type BuildRunContextInput = {
  appContext: AppContext;
  parentId: string;
  ports?: Partial<RunPorts>;
};

export type RunOverrides = {
  maxRetries?: number;
  retrySkipped?: boolean;
  onAbort?: AbortDisposition;
  stopSignal?: AbortSignal;
};

const MS_PER_MINUTE = 60_000;

// =============================================================================
// PUBLIC API
// =============================================================================

export function createDefaultPorts(config: ProjectConfig): RunPorts {
  const strategies: StrategyRegistry = {};
  for (const label of TASK_LABELS) {
    const strategy = config.strategies[label];
    if (!strategy) continue;
    strategies[label] = new CommandExecutionStrategy({
      command: strategy.command,
      timeoutMs: minutesToMs(strategy.timeout_minutes),
    });
  }

  const reviewTimeoutMs = minutesToMs(config.review.timeout_minutes);
  return {
    store: new FileTicketStore(config.tickets_dir),
    provider: new GitWorktreeProvider({
      repoPath: config.repo_path,
      workspaceRoot: config.workspace.root,
    }),
    strategies,
    checks: new JustCheckRunner(config.verification.checks),
    taskJudge: config.review.command
      ? new CommandJudgmentService({ command: config.review.command, timeoutMs: reviewTimeoutMs })
      : undefined,
    finalJudge: config.review.final_command
      ? new CommandJudgmentService({
          command: config.review.final_command,
          timeoutMs: reviewTimeoutMs,
        })
      : undefined,
  };
}

export function buildRunContext(input: BuildRunContextInput): RunContext {
  const { appContext, parentId } = input;
  const config = appContext.config;
  const ports: RunPorts = { ...createDefaultPorts(config), ...input.ports };

  const logPath = orchestratorLogPath(parentId, appContext.paths);
  const logger = new JsonlLogger(logPath, { runId: parentId });

  const synchronizer = new StateSynchronizer(ports.store, parentId, logger);
  const workspace = new WorkspaceManager({
    provider: ports.provider,
    baseRevision: config.base_branch,
    branchPrefix: config.branch_prefix,
  });
  const review = new ReviewGate({
    enabled: config.review.enabled,
    taskJudge: ports.taskJudge,
    finalJudge: ports.finalJudge,
  });
  const verification = new VerificationGate(
    ports.checks,
    config.verification.checks.map((check) => check.name),
  );

  return {
    parentId,
    config,
    logPath,
    logger,
    synchronizer,
    workspace,
    deps: {
      dispatcher: new ExecutorDispatcher(ports.strategies),
      verification,
      review,
      synchronizer,
      workspace,
      logger,
    },
    integration: { review, workspace, logger },
  };
}

export async function loadRunGraph(ctx: RunContext): Promise<TaskGraph> {
  const records = await ctx.synchronizer.loadTaskRecords();
  return loadTaskGraph(records);
}

export function schedulerOptions(ctx: RunContext, overrides: RunOverrides = {}): SchedulerOptions {
  return {
    runId: ctx.parentId,
    maxRetries: overrides.maxRetries ?? ctx.config.max_retries,
    taskTimeoutMs: minutesToMs(ctx.config.task_timeout_minutes),
    stopSignal: overrides.stopSignal,
    onAbort: overrides.onAbort ?? "keep",
    retrySkipped: overrides.retrySkipped ?? false,
  };
}

function minutesToMs(minutes: number | undefined): number | undefined {
  return minutes === undefined ? undefined : minutes * MS_PER_MINUTE;
}
