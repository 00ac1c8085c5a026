import fs from "node:fs";
import path from "node:path";

import { DEFAULT_CONFIG_TEMPLATE } from "./config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { REPO_CONFIG_DIR, repoConfigPath } from "./paths.js";

// =============================================================================
// CONSTANTS
// =============================================================================

const DEFAULT_TICKETS_DIR = `${REPO_CONFIG_DIR}/tickets`;
// Run logs stay out of commits.
const LOCAL_GITIGNORE = "logs/\n";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "repo";

export type ConfigResolution = {
  configPath: string;
  source: ConfigSource;
};

export type InitResult = {
  repoRoot: string;
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveProjectConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
}): ConfigResolution {
  if (args.explicitPath) {
    return { configPath: path.resolve(args.explicitPath), source: "explicit" };
  }

  const cwd = args.cwd ?? process.cwd();
  const repoRoot = findRepoRoot(cwd);
  if (!repoRoot) {
    throw createMissingRepoError(cwd);
  }

  return { configPath: repoConfigPath(repoRoot), source: "repo" };
}

export function initRepoConfig(args: { cwd?: string; force?: boolean }): InitResult {
  const cwd = args.cwd ?? process.cwd();
  const repoRoot = findRepoRoot(cwd);
  if (!repoRoot) {
    throw createMissingRepoError(cwd);
  }

  const configPath = repoConfigPath(repoRoot);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  ensureRepoLayout(repoRoot, path.dirname(configPath), { force });

  if (hasConfig && !force) {
    return { repoRoot, configPath, status: "exists" };
  }

  fs.writeFileSync(configPath, DEFAULT_CONFIG_TEMPLATE, "utf8");
  return { repoRoot, configPath, status: hasConfig ? "overwritten" : "created" };
}

export function findRepoRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(path.join(current, ".git"))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function createMissingRepoError(cwd: string): UserFacingError {
  const resolvedCwd = path.resolve(cwd);
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Repository not found.",
    message: `No git repository found in ${resolvedCwd} or its parent directories.`,
    hint: "Run this command inside a git repo (or pass --config <path>).",
  });
}

function ensureRepoLayout(repoRoot: string, configDir: string, opts: { force: boolean }): void {
  fs.mkdirSync(configDir, { recursive: true });
  fs.mkdirSync(path.join(repoRoot, DEFAULT_TICKETS_DIR), { recursive: true });

  const ignorePath = path.join(configDir, ".gitignore");
  if (fs.existsSync(ignorePath) && !opts.force) return;
  fs.writeFileSync(ignorePath, LOCAL_GITIGNORE, "utf8");
}
