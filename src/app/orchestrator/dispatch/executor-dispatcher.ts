/**
 * ExecutorDispatcher routes a task to the execution strategy registered for its label.
 * Purpose: turn every outcome of a strategy (success, failure, throw, cancellation) into a result.
 * Assumptions: timeouts are the caller's policy and arrive through `signal`.
 * Usage: const result = await dispatcher.run(task, { workspacePath, parent, attempt, signal }).
 */

import { ConfigError } from "../../../core/errors.js";
import type { Task, TaskGraph, TaskLabel } from "../../../core/task-graph.js";
import { tailText } from "../../../core/utils.js";
import { describeAbort, formatErrorMessage } from "../helpers/errors.js";
import type { ExecutionStrategy, ParentTicket, StrategyResult } from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExecutionResult = {
  success: boolean;
  output: string;
  changeSummary: string;
};

export type DispatchInput = {
  runId: string;
  workspacePath: string;
  parent: ParentTicket;
  attempt: number;
  maxAttempts: number;
  signal: AbortSignal;
};

export type StrategyRegistry = Partial<Record<TaskLabel, ExecutionStrategy>>;

// =============================================================================
// DISPATCHER
// =============================================================================

export class ExecutorDispatcher {
  constructor(private readonly strategies: StrategyRegistry) {}

  /** Labels used by the graph that have no registered strategy. */
  missingStrategies(graph: TaskGraph): TaskLabel[] {
    const labels = new Set(graph.tasks.map((task) => task.label));
    return [...labels].filter((label) => this.strategies[label] === undefined).sort();
  }

  assertCovers(graph: TaskGraph): void {
    const missing = this.missingStrategies(graph);
    if (missing.length > 0) {
      throw new ConfigError(
        `No execution strategy configured for label(s): ${missing.join(", ")}. Add them under \`strategies\` in the project config.`,
      );
    }
  }

  async run(task: Task, input: DispatchInput): Promise<ExecutionResult> {
    const strategy = this.strategies[task.label];
    if (!strategy) {
      return failure(`No execution strategy registered for label ${task.label}`);
    }
    if (input.signal.aborted) {
      return failure(`Execution cancelled before start: ${describeAbort(input.signal)}`);
    }

    try {
      const execution = strategy.execute({
        runId: input.runId,
        task: {
          id: task.id,
          title: task.title,
          description: task.description,
          label: task.label,
        },
        parent: input.parent,
        attempt: input.attempt,
        maxAttempts: input.maxAttempts,
        previousError: task.lastError,
        workspacePath: input.workspacePath,
        signal: input.signal,
      });
      const result = await raceAbort(execution, input.signal);
      if (result === ABORTED) {
        return failure(`Execution cancelled: ${describeAbort(input.signal)}`);
      }
      return toExecutionResult(result);
    } catch (err) {
      return failure(`Execution strategy for ${task.label} threw: ${formatErrorMessage(err)}`);
    }
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

const ABORTED = Symbol("aborted");

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T | typeof ABORTED> {
  return new Promise<T | typeof ABORTED>((resolve, reject) => {
    const onAbort = (): void => resolve(ABORTED);
    signal.addEventListener("abort", onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

function toExecutionResult(result: StrategyResult): ExecutionResult {
  if (result.success) {
    return { success: true, output: "Execution succeeded", changeSummary: result.changeSummary };
  }

  const detail = tailText(result.changeSummary, 2000);
  return failure(
    detail.length > 0
      ? `Execution strategy reported failure: ${detail}`
      : "Execution strategy reported failure",
  );
}

function failure(output: string): ExecutionResult {
  return { success: false, output, changeSummary: "" };
}
