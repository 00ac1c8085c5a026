/**
 * AppContext resolves repo-scoped config + paths without mutating globals.
 * Purpose: make the repository and PLANLOOM_HOME explicit for CLI and orchestrator consumers.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createAppContext({ configPath, config }).
 */

import path from "node:path";

import type { ProjectConfig } from "../core/config.js";
import { createPathsContext, resolvePlanloomHome, type PathsContext } from "../core/paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  configPath: string;
  config: ProjectConfig;
  repoPath: string;
  planloomHome: string;
  paths: PathsContext;
};

export type CreateAppContextInput = {
  configPath: string;
  config: ProjectConfig;
  planloomHome?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const repoPath = path.resolve(input.config.repo_path);
  const planloomHome = resolvePlanloomHome({
    repoPath,
    planloomHome: input.planloomHome,
  });

  return {
    configPath: path.resolve(input.configPath),
    config: input.config,
    repoPath,
    planloomHome,
    paths: createPathsContext({ planloomHome }),
  };
}
