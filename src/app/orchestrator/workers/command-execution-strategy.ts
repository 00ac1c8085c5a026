/**
 * CommandExecutionStrategy hands a task to an external agent command.
 * Purpose: one configured command per task label, run inside the run workspace.
 * Assumptions: the command reads the task request as JSON on stdin and edits files in place;
 * exit code 0 means the task was carried out.
 * Usage: new CommandExecutionStrategy({ command: "./agents/feature.sh" }).
 */

import { describeCommandFailure, runShellCommand } from "../../../core/command.js";
import { tailText } from "../../../core/utils.js";
import type { ExecutionStrategy, StrategyResult, TaskContext } from "../ports.js";

const SUMMARY_CHARS = 4000;

export type CommandStrategyOptions = {
  command: string;
  timeoutMs?: number;
};

export class CommandExecutionStrategy implements ExecutionStrategy {
  constructor(private readonly options: CommandStrategyOptions) {}

  async execute(context: TaskContext): Promise<StrategyResult> {
    const { command, timeoutMs } = this.options;

    const res = await runShellCommand(command, {
      cwd: context.workspacePath,
      input: JSON.stringify(buildRequest(context)),
      env: buildEnv(context),
      timeoutMs,
      signal: context.signal,
    });

    if (res.exitCode === 0 && !res.timedOut && !res.canceled) {
      const summary = res.stdout.trim().length > 0 ? res.stdout : res.output;
      return {
        success: true,
        changeSummary: tailText(summary, SUMMARY_CHARS) || `${command} reported no output`,
      };
    }

    const failure = describeCommandFailure(command, res);
    const output = tailText(res.output, SUMMARY_CHARS);
    return { success: false, changeSummary: output ? `${failure}\n${output}` : failure };
  }
}

// =============================================================================
// REQUEST
// =============================================================================

export function buildRequest(context: TaskContext): Record<string, unknown> {
  return {
    run_id: context.runId,
    task: {
      id: context.task.id,
      title: context.task.title,
      description: context.task.description,
      label: context.task.label,
    },
    parent: {
      id: context.parent.id,
      title: context.parent.title,
      context: context.parent.context,
    },
    attempt: context.attempt,
    max_attempts: context.maxAttempts,
    previous_error: context.previousError ?? null,
    workspace_path: context.workspacePath,
  };
}

function buildEnv(context: TaskContext): Record<string, string> {
  return {
    PLANLOOM_RUN_ID: context.runId,
    PLANLOOM_TASK_ID: context.task.id,
    PLANLOOM_TASK_LABEL: context.task.label,
    PLANLOOM_ATTEMPT: String(context.attempt),
    PLANLOOM_MAX_ATTEMPTS: String(context.maxAttempts),
    PLANLOOM_WORKSPACE: context.workspacePath,
  };
}
