import { initRepoConfig, type InitResult } from "../core/config-discovery.js";

import { normalizeCommandError } from "./command-errors.js";

// =============================================================================
// INIT (repo-scoped scaffolding)
// =============================================================================

export async function initCommand(opts: {
  force?: boolean;
  cwd?: string;
}): Promise<{ created: boolean; configPath: string }> {
  const result = initOrThrow(opts);

  if (result.status === "created") {
    console.log(`Created planloom config at ${result.configPath}`);
  } else if (result.status === "overwritten") {
    console.log(`Overwrote planloom config at ${result.configPath}`);
  } else {
    console.log(`planloom config already exists at ${result.configPath} (use --force to overwrite)`);
  }

  if (result.status !== "exists") {
    console.log("Set `strategies` for each task label before running.");
  }

  return { created: result.status !== "exists", configPath: result.configPath };
}

function initOrThrow(opts: { force?: boolean; cwd?: string }): InitResult {
  try {
    return initRepoConfig({ cwd: opts.cwd, force: opts.force ?? false });
  } catch (error) {
    throw normalizeCommandError(error, "Init command failed.");
  }
}
