import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { REPO_CONFIG_DIR } from "./paths.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Run `planloom init` in the repo or pass --config <path>.";
const INVALID_CONFIG_HINT =
  "Fix the config file and rerun. For a fresh config, run `planloom init --force`.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const { line, column } = error.mark;
  return { line: line + 1, column: column + 1 };
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Project config missing.",
    message: `Project config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Project config invalid.",
    message: `Project config at ${configPath} is invalid.\n${cause.message}`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Relative paths in the config resolve against the repository that owns it:
 * the parent of `.planloom/` for a repo config, the config's own directory otherwise.
 */
export function resolveConfigRoot(configPath: string): string {
  const configDir = path.dirname(path.resolve(configPath));
  return path.basename(configDir) === REPO_CONFIG_DIR ? path.dirname(configDir) : configDir;
}

export function loadProjectConfig(configPath: string): ProjectConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read project config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });

    const parsed = ProjectConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid project config at ${absolutePath}:\n${details}`, parsed.error);
    }

    const cfg = parsed.data;
    const configRoot = resolveConfigRoot(absolutePath);
    const repoPath = path.resolve(configRoot, cfg.repo_path);

    return {
      ...cfg,
      repo_path: repoPath,
      tickets_dir: path.resolve(repoPath, cfg.tickets_dir),
    };
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}
