/**
 * loadAppContext resolves project config + paths for app entrypoints.
 * Purpose: centralize config discovery without mutating process.env.
 * Assumptions: config loader validates schema and resolves repo_path.
 * Usage: const appContext = loadAppContext({ explicitConfigPath: opts.config }).
 */

import { resolveProjectConfigPath } from "../../core/config-discovery.js";
import { loadProjectConfig } from "../../core/config-loader.js";
import { createAppContext, type AppContext } from "../context.js";

export type LoadAppContextArgs = {
  explicitConfigPath?: string;
  cwd?: string;
  planloomHome?: string;
};

export function loadAppContext(args: LoadAppContextArgs = {}): AppContext {
  const resolved = resolveProjectConfigPath({
    explicitPath: args.explicitConfigPath,
    cwd: args.cwd,
  });

  const config = loadProjectConfig(resolved.configPath);
  return createAppContext({
    configPath: resolved.configPath,
    config,
    planloomHome: args.planloomHome,
  });
}
