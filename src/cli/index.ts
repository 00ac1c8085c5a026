import { Command } from "commander";

import { loadAppContext } from "../app/config/load-app-context.js";
import type { AppContext } from "../app/context.js";

import { normalizeCommandError } from "./command-errors.js";
import { initCommand } from "./init.js";
import {
  GlobalOptionsSchema,
  InitOptionsSchema,
  ReleaseOptionsSchema,
  RunOptionsSchema,
  StatusOptionsSchema,
  parseCommandOptions,
} from "./options.js";
import { releaseCommand } from "./release.js";
import { runCommand } from "./run.js";
import { statusCommand } from "./status.js";

export function buildCli(): Command {
  const program = new Command();
  // Subcommands copy these settings when they are added; main() renders every error.
  program.exitOverride();
  program.configureOutput({ outputError: () => undefined });

  const resolveAppContext = (): AppContext => {
    const globals = parseCommandOptions(GlobalOptionsSchema, program.opts(), "");
    try {
      return loadAppContext({ explicitConfigPath: globals.config });
    } catch (error) {
      throw normalizeCommandError(error, "Could not load planloom config.");
    }
  };

  program
    .name("planloom")
    .description("Run a parent ticket's task graph in an isolated git worktree")
    .version("0.1.0")
    .option("--config <path>", "Override project config path (defaults to repo .planloom/config.yaml)")
    .option("--debug", "Show error codes, causes and stack traces");

  program
    .command("init")
    .description("Create .planloom/config.yaml and the tickets directory in this repository")
    .option("--force", "Overwrite an existing config", false)
    .action(async (raw: unknown) => {
      const opts = parseCommandOptions(InitOptionsSchema, raw, "init");
      await initCommand({ force: opts.force });
    });

  program
    .command("run")
    .description("Run the child tasks of a parent ticket in dependency order")
    .requiredOption("--parent <id>", "Parent ticket id (also the run id)")
    .option("--max-retries <n>", "Attempts per task before it is skipped")
    .option("--retry-skipped", "Retry tasks skipped in a previous run", false)
    .option("--integrate", "Review and merge the run branch when every task completed", false)
    .option("--on-abort <mode>", "Workspace handling after a stop request: keep|discard", "keep")
    .option("--dry-run", "Print the dispatch order without running anything", false)
    .action(async (raw: unknown) => {
      const opts = parseCommandOptions(RunOptionsSchema, raw, "run");
      await runCommand(resolveAppContext(), opts);
    });

  program
    .command("status")
    .description("Show task statuses and the workspace of a parent ticket")
    .requiredOption("--parent <id>", "Parent ticket id")
    .action(async (raw: unknown) => {
      const opts = parseCommandOptions(StatusOptionsSchema, raw, "status");
      await statusCommand(resolveAppContext(), opts);
    });

  program
    .command("release")
    .description("Integrate or discard the workspace of a run")
    .requiredOption("--parent <id>", "Parent ticket id")
    .requiredOption("--mode <mode>", "integrate|discard")
    .option("--skip-final-review", "Integrate without the final review", false)
    .action(async (raw: unknown) => {
      const opts = parseCommandOptions(ReleaseOptionsSchema, raw, "release");
      await releaseCommand(resolveAppContext(), opts);
    });

  return program;
}
