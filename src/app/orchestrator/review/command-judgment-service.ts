/**
 * CommandJudgmentService asks an external reviewer command for a verdict.
 * Purpose: keep the review policy (a model, a script, a human gate) outside the orchestrator.
 * Assumptions: the command reads a JSON request on stdin and may print a JSON verdict on stdout.
 * Usage: new CommandJudgmentService({ command: "./scripts/review.sh" }).evaluate(summary, context).
 */

import { z } from "zod";

import { describeCommandFailure, runShellCommand } from "../../../core/command.js";
import { tailText } from "../../../core/utils.js";
import type { Judgment, JudgmentService, ReviewContext } from "../ports.js";

const VerdictSchema = z.object({
  passed: z.boolean(),
  findings: z
    .union([z.string(), z.array(z.string())])
    .default("")
    .transform((findings) => (Array.isArray(findings) ? findings.join("\n") : findings)),
});

export type CommandJudgmentOptions = {
  command: string;
  timeoutMs?: number;
};

export class CommandJudgmentService implements JudgmentService {
  constructor(private readonly options: CommandJudgmentOptions) {}

  async evaluate(changeSummary: string, context: ReviewContext): Promise<Judgment> {
    const request = {
      scope: context.scope,
      run_id: context.runId,
      task_id: context.taskId ?? null,
      title: context.title,
      description: context.description,
      parent_context: context.parentContext,
      change_summary: changeSummary,
    };

    const res = await runShellCommand(this.options.command, {
      cwd: context.workspacePath,
      input: JSON.stringify(request),
      timeoutMs: this.options.timeoutMs,
      env: {
        PLANLOOM_REVIEW_SCOPE: context.scope,
        PLANLOOM_RUN_ID: context.runId,
        ...(context.taskId ? { PLANLOOM_TASK_ID: context.taskId } : {}),
      },
    });

    if (res.timedOut || res.canceled || res.error) {
      return { passed: false, findings: describeCommandFailure(this.options.command, res) };
    }

    const verdict = parseVerdict(res.stdout);
    if (verdict) return verdict;

    // No structured verdict: the exit code decides.
    const passed = res.exitCode === 0;
    const output = tailText(res.output, 2000);
    return {
      passed,
      findings: passed ? output : output || describeCommandFailure(this.options.command, res),
    };
  }
}

/** Accepts the whole stdout as JSON, or the last line that parses as a verdict. */
export function parseVerdict(stdout: string): Judgment | null {
  const candidates = [stdout.trim(), ...lastLines(stdout)];
  for (const candidate of candidates) {
    if (!candidate.startsWith("{")) continue;

    let json: unknown;
    try {
      json = JSON.parse(candidate);
    } catch {
      continue;
    }

    const parsed = VerdictSchema.safeParse(json);
    if (parsed.success) return parsed.data;
  }
  return null;
}

function lastLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .reverse();
}
