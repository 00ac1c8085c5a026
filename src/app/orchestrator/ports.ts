/**
 * Orchestrator ports define the boundary between the scheduler and its collaborators.
 * Purpose: keep ticketing, execution, checks, review and workspaces replaceable for testing.
 * Assumptions: every call may be slow or fail; the scheduler awaits each one before moving on.
 * Usage: adapters live beside the component that consumes them; tests use in-memory fakes.
 */

import type { TaskLabel, TaskRecord, TaskStatus } from "../../core/task-graph.js";

// =============================================================================
// TICKET STORE
// =============================================================================

export type ParentTicket = {
  id: string;
  title: string;
  // Specification and plan text handed to every task.
  context: string;
};

export interface TicketStore {
  getParent(parentId: string): Promise<ParentTicket>;
  getChildTasks(parentId: string): Promise<TaskRecord[]>;
  updateStatus(taskId: string, status: TaskStatus): Promise<void>;
  appendNote(taskId: string, text: string): Promise<void>;
}

// =============================================================================
// EXECUTION
// =============================================================================

export type TaskContext = {
  runId: string;
  task: {
    id: string;
    title: string;
    description: string;
    label: TaskLabel;
  };
  parent: ParentTicket;
  attempt: number;
  maxAttempts: number;
  previousError?: string;
  workspacePath: string;
  signal: AbortSignal;
};

export type StrategyResult = {
  success: boolean;
  changeSummary: string;
};

export interface ExecutionStrategy {
  execute(context: TaskContext): Promise<StrategyResult>;
}

// =============================================================================
// CHECKS
// =============================================================================

export type CheckResult = {
  passed: boolean;
  output: string;
  skipped?: boolean;
};

export interface CheckRunner {
  runCheck(name: string, workspacePath: string): Promise<CheckResult>;
}

// =============================================================================
// REVIEW
// =============================================================================

export type ReviewContext = {
  scope: "task" | "run";
  runId: string;
  taskId?: string;
  title: string;
  description: string;
  parentContext: string;
  workspacePath: string;
};

export type Judgment = {
  passed: boolean;
  findings: string;
};

export interface JudgmentService {
  evaluate(changeSummary: string, context: ReviewContext): Promise<Judgment>;
}

// =============================================================================
// WORKSPACE
// =============================================================================

export type WorkspaceEnvironment = {
  name: string;
  path: string;
  baseSha: string;
};

export type EnvironmentValidation = { valid: true } | { valid: false; reason: string };

export interface WorkspaceProvider {
  createIsolatedEnvironment(baseRevision: string, name: string): Promise<WorkspaceEnvironment>;
  findEnvironment(name: string, baseRevision: string): Promise<WorkspaceEnvironment | null>;
  validateEnvironment(
    env: WorkspaceEnvironment,
    baseRevision: string,
  ): Promise<EnvironmentValidation>;
  resetEnvironment(env: WorkspaceEnvironment): Promise<void>;
  checkpointEnvironment(env: WorkspaceEnvironment, message: string): Promise<string | null>;
  describeChanges(env: WorkspaceEnvironment): Promise<string>;
  integrateEnvironment(env: WorkspaceEnvironment, baseRevision: string): Promise<void>;
  teardownEnvironment(env: WorkspaceEnvironment): Promise<void>;
}
