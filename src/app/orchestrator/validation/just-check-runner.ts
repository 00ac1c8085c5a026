/**
 * JustCheckRunner runs verification checks inside the run workspace.
 * Purpose: map a check name to `just <name>` (or an explicit shell command) and report pass/fail.
 * Assumptions: the justfile sits at the workspace root; a missing recipe is not a failure.
 * Usage: new JustCheckRunner(config.verification.checks).runCheck("test", workspacePath).
 */

import path from "node:path";

import fse from "fs-extra";

import {
  describeCommandFailure,
  runCommand,
  runShellCommand,
  type ShellCommandResult,
} from "../../../core/command.js";
import type { CheckConfig } from "../../../core/config.js";
import type { CheckResult, CheckRunner } from "../ports.js";

const JUSTFILE_NAMES = ["justfile", "Justfile", ".justfile"] as const;

export class JustCheckRunner implements CheckRunner {
  private readonly checks: Map<string, CheckConfig>;

  constructor(checks: readonly CheckConfig[]) {
    this.checks = new Map(checks.map((check) => [check.name, check]));
  }

  async runCheck(name: string, workspacePath: string): Promise<CheckResult> {
    const check = this.checks.get(name);
    const timeoutMs = check?.timeout_seconds ? check.timeout_seconds * 1000 : undefined;

    if (check?.command) {
      const res = await runShellCommand(check.command, { cwd: workspacePath, timeoutMs });
      return toCheckResult(check.command, res, check.allow_timeout);
    }

    if (!(await hasJustfile(workspacePath))) {
      return skipped(`No justfile in ${workspacePath}; skipped "${name}"`);
    }

    const recipes = await listRecipes(workspacePath);
    if (!recipes.has(name)) {
      return skipped(`No '${name}' recipe in justfile; skipped`);
    }

    const res = await runCommand("just", [name], { cwd: workspacePath, timeoutMs });
    return toCheckResult(`just ${name}`, res, check?.allow_timeout ?? false);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function hasJustfile(workspacePath: string): Promise<boolean> {
  for (const name of JUSTFILE_NAMES) {
    if (await fse.pathExists(path.join(workspacePath, name))) return true;
  }
  return false;
}

async function listRecipes(workspacePath: string): Promise<Set<string>> {
  const res = await runCommand("just", ["--summary"], { cwd: workspacePath });
  if (res.exitCode !== 0) {
    const failure = describeCommandFailure("just --summary", res);
    throw new Error(`Could not list justfile recipes: ${failure}\n${res.output}`.trim());
  }

  return new Set(
    res.stdout
      .split(/\s+/)
      .map((recipe) => recipe.trim())
      .filter((recipe) => recipe.length > 0),
  );
}

function toCheckResult(
  command: string,
  res: ShellCommandResult,
  allowTimeout: boolean,
): CheckResult {
  if (res.timedOut && allowTimeout) {
    return {
      passed: true,
      output: `Warning: ${describeCommandFailure(command, res)}; treated as passed\n${res.output}`,
    };
  }

  if (res.exitCode === 0 && !res.timedOut) {
    return { passed: true, output: res.output };
  }

  const failure = describeCommandFailure(command, res);
  return { passed: false, output: res.output.length > 0 ? `${failure}\n${res.output}` : failure };
}

function skipped(output: string): CheckResult {
  return { passed: true, skipped: true, output };
}
