/**
 * VerificationGate runs the configured checks against the run workspace.
 * Purpose: decide whether a task's changes pass test/lint/build before review.
 * Assumptions: checks run in config order; the first failure ends the pass.
 * Usage: const result = await gate.run(workspacePath).
 */

import { tailText } from "../../../core/utils.js";
import { formatErrorMessage } from "../helpers/errors.js";
import type { CheckResult, CheckRunner } from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type CheckOutcome = {
  name: string;
  passed: boolean;
  skipped: boolean;
  durationMs: number;
  output: string;
};

export type VerificationResult = {
  passed: boolean;
  detail: string;
  failedCheck?: string;
  checks: CheckOutcome[];
};

export const DEFAULT_CHECKS = ["test", "lint", "build"] as const;

const OUTPUT_TAIL_CHARS = 2000;

// =============================================================================
// GATE
// =============================================================================

export class VerificationGate {
  constructor(
    private readonly runner: CheckRunner,
    private readonly checks: readonly string[] = DEFAULT_CHECKS,
  ) {}

  async run(workspacePath: string): Promise<VerificationResult> {
    const outcomes: CheckOutcome[] = [];

    for (const name of this.checks) {
      const outcome = await this.runOne(name, workspacePath);
      outcomes.push(outcome);

      if (!outcome.passed) {
        const tail = tailText(outcome.output, OUTPUT_TAIL_CHARS);
        return {
          passed: false,
          failedCheck: name,
          detail: tail.length > 0 ? `Check "${name}" failed:\n${tail}` : `Check "${name}" failed`,
          checks: outcomes,
        };
      }
    }

    return { passed: true, detail: describePass(outcomes), checks: outcomes };
  }

  private async runOne(name: string, workspacePath: string): Promise<CheckOutcome> {
    const startedAt = Date.now();
    let result: CheckResult;
    try {
      result = await this.runner.runCheck(name, workspacePath);
    } catch (err) {
      result = { passed: false, output: `Check runner error: ${formatErrorMessage(err)}` };
    }

    return {
      name,
      passed: result.passed,
      skipped: result.skipped ?? false,
      durationMs: Date.now() - startedAt,
      output: result.output,
    };
  }
}

function describePass(outcomes: CheckOutcome[]): string {
  if (outcomes.length === 0) return "No checks configured";

  const ran = outcomes.filter((outcome) => !outcome.skipped).map((outcome) => outcome.name);
  const skipped = outcomes.filter((outcome) => outcome.skipped).map((outcome) => outcome.name);
  const parts = [ran.length > 0 ? `Checks passed: ${ran.join(", ")}` : "No checks ran"];
  if (skipped.length > 0) {
    parts.push(`skipped: ${skipped.join(", ")}`);
  }
  return parts.join("; ");
}
