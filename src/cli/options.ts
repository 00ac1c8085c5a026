import { z } from "zod";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

// =============================================================================
// SCHEMAS
// =============================================================================

const ParentIdSchema = z.string().trim().min(1, "--parent must not be empty");

export const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  debug: z.boolean().optional(),
});

export const InitOptionsSchema = z.object({
  force: z.boolean().default(false),
});

export const RunOptionsSchema = z.object({
  parent: ParentIdSchema,
  maxRetries: z.coerce.number().int().min(1).optional(),
  retrySkipped: z.boolean().default(false),
  integrate: z.boolean().default(false),
  onAbort: z.enum(["discard", "keep"]).default("keep"),
  dryRun: z.boolean().default(false),
});

export const StatusOptionsSchema = z.object({
  parent: ParentIdSchema,
});

export const ReleaseOptionsSchema = z.object({
  parent: ParentIdSchema,
  mode: z.enum(["integrate", "discard"]),
  skipFinalReview: z.boolean().default(false),
});

// =============================================================================
// PARSING
// =============================================================================

export function parseCommandOptions<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  command: string,
): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;

  const details = parsed.error.issues
    .map((issue) => `${issue.path.map(String).join(".") || "<root>"}: ${issue.message}`)
    .join("\n");
  const invocation = `planloom ${command}`.trim();
  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: `Invalid options for \`${invocation}\`.`,
    message: details,
    next: `${invocation} --help`,
  });
}
