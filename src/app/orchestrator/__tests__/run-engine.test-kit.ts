/**
 * Shared setup for the run-engine suites.
 * Purpose: wire the real scheduler components around in-memory fakes.
 * Usage: const harness = createHarness({ records: [task("A")] }); await harness.run();
 */

import fs from "node:fs";
import path from "node:path";

import { afterEach } from "vitest";

import { JsonlLogger } from "../../../core/logger.js";
import { createPathsContext, orchestratorLogPath } from "../../../core/paths.js";
import {
  TASK_LABELS,
  loadTaskGraph,
  type TaskGraph,
  type TaskLabel,
  type TaskRecord,
  type TaskStatus,
} from "../../../core/task-graph.js";
import { ExecutorDispatcher, type StrategyRegistry } from "../dispatch/executor-dispatcher.js";
import { ReviewGate } from "../review/review-gate.js";
import {
  runScheduler,
  type SchedulerDeps,
  type SchedulerOptions,
  type SchedulerResult,
} from "../run/run-engine.js";
import { StateSynchronizer } from "../state/state-synchronizer.js";
import { VerificationGate } from "../validation/verification-gate.js";
import { WorkspaceManager } from "../workspace/workspace-manager.js";

import {
  FakeCheckRunner,
  FakeJudge,
  FakeWorkspaceProvider,
  InMemoryTicketStore,
  ScriptedStrategy,
} from "./fakes.js";

export const PARENT = { id: "P-1", title: "Checkout flow", context: "Build the checkout flow." };

export function task(
  id: string,
  dependencies: string[] = [],
  options: { label?: TaskLabel; status?: TaskStatus } = {},
): TaskRecord {
  return {
    id,
    title: `Task ${id}`,
    description: `Implement ${id}`,
    label: options.label ?? "Feature",
    dependencies,
    status: options.status ?? "pending",
  };
}

export type HarnessOptions = {
  records: TaskRecord[];
  reviewEnabled?: boolean;
  strategyLabels?: TaskLabel[];
};

export type Harness = {
  graph: TaskGraph;
  store: InMemoryTicketStore;
  strategy: ScriptedStrategy;
  checks: FakeCheckRunner;
  judge: FakeJudge;
  provider: FakeWorkspaceProvider;
  workspace: WorkspaceManager;
  synchronizer: StateSynchronizer;
  deps: SchedulerDeps;
  logPath: string;
  run: (options?: Partial<SchedulerOptions>) => Promise<SchedulerResult>;
  events: () => Array<Record<string, unknown>>;
  eventTypes: () => string[];
};

const openLoggers: JsonlLogger[] = [];

afterEach(() => {
  for (const logger of openLoggers.splice(0)) {
    logger.close();
  }
});

export function createHarness(options: HarnessOptions): Harness {
  const store = new InMemoryTicketStore(PARENT, options.records);
  const strategy = new ScriptedStrategy();
  const checks = new FakeCheckRunner();
  const judge = new FakeJudge();
  const provider = new FakeWorkspaceProvider();

  const logPath = orchestratorLogPath(PARENT.id, createPathsContext({}));
  const logger = new JsonlLogger(logPath, { runId: PARENT.id });
  openLoggers.push(logger);

  const registry: StrategyRegistry = {};
  for (const label of options.strategyLabels ?? TASK_LABELS) {
    registry[label] = strategy;
  }
  const dispatcher = new ExecutorDispatcher(registry);
  const synchronizer = new StateSynchronizer(store, PARENT.id, logger);
  const workspace = new WorkspaceManager({
    provider,
    baseRevision: "main",
    branchPrefix: "planloom/",
  });

  const deps: SchedulerDeps = {
    dispatcher,
    verification: new VerificationGate(checks),
    review: new ReviewGate({ enabled: options.reviewEnabled ?? false, taskJudge: judge }),
    synchronizer,
    workspace,
    logger,
  };

  const graph = loadTaskGraph(options.records);

  const events = (): Array<Record<string, unknown>> => {
    if (!fs.existsSync(logPath)) return [];
    return fs
      .readFileSync(logPath, "utf8")
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line): Record<string, unknown> => JSON.parse(line));
  };

  return {
    graph,
    store,
    strategy,
    checks,
    judge,
    provider,
    workspace,
    synchronizer,
    deps,
    logPath: path.resolve(logPath),
    run: (overrides = {}) =>
      runScheduler(graph, deps, { runId: PARENT.id, maxRetries: 3, ...overrides }),
    events,
    eventTypes: () => events().map((event) => String(event.type)),
  };
}
