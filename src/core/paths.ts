import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  planloomHome: string;
};

export type ResolvePlanloomHomeOptions = {
  planloomHome?: string;
  repoPath?: string;
};

// =============================================================================
// CONTEXT
// =============================================================================

export const REPO_CONFIG_DIR = ".planloom";
export const REPO_CONFIG_FILE = "config.yaml";

export function resolvePlanloomHome(opts: ResolvePlanloomHomeOptions = {}): string {
  if (opts.planloomHome) {
    return path.resolve(opts.planloomHome);
  }

  if (process.env.PLANLOOM_HOME) {
    return path.resolve(process.env.PLANLOOM_HOME);
  }

  if (opts.repoPath) {
    return path.join(path.resolve(opts.repoPath), REPO_CONFIG_DIR);
  }

  return path.join(os.homedir(), REPO_CONFIG_DIR);
}

export function createPathsContext(opts: ResolvePlanloomHomeOptions): PathsContext {
  return { planloomHome: resolvePlanloomHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function repoConfigPath(repoPath: string): string {
  return path.join(repoPath, REPO_CONFIG_DIR, REPO_CONFIG_FILE);
}

export function logsBaseDir(paths: PathsContext): string {
  return path.join(paths.planloomHome, "logs");
}

export function runLogsDir(runId: string, paths: PathsContext): string {
  return path.join(logsBaseDir(paths), safeSegment(runId));
}

export function orchestratorLogPath(runId: string, paths: PathsContext): string {
  return path.join(runLogsDir(runId, paths), "orchestrator.jsonl");
}

export function ticketFilePath(ticketsDir: string, parentId: string): string {
  return path.join(ticketsDir, `${safeSegment(parentId)}.yaml`);
}

function safeSegment(value: string): string {
  return value.replace(/[\\/:]+/g, "-");
}
