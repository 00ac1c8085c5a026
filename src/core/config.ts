import { z } from "zod";

import { TASK_LABELS, TaskLabelSchema } from "./task-graph.js";

const CheckSchema = z.object({
  name: z.string().min(1),
  // Shell command; when omitted the check runs `just <name>`.
  command: z.string().min(1).optional(),
  timeout_seconds: z.number().int().positive().optional(),
  // A timed-out check passes with a warning instead of failing the task.
  allow_timeout: z.boolean().default(false),
});

const StrategySchema = z.object({
  command: z.string().min(1),
  timeout_minutes: z.number().int().positive().optional(),
});

const VerificationSchema = z.object({
  checks: z
    .array(CheckSchema)
    .default([
      { name: "test", allow_timeout: false },
      { name: "lint", allow_timeout: false },
      { name: "build", timeout_seconds: 600, allow_timeout: false },
    ]),
});

const ReviewSchema = z
  .object({
    enabled: z.boolean().default(false),
    command: z.string().min(1).optional(),
    final_command: z.string().min(1).optional(),
    timeout_minutes: z.number().int().positive().optional(),
  })
  .refine((review) => !review.enabled || review.command !== undefined, {
    message: "review.command is required when review.enabled is true",
    path: ["command"],
  });

const WorkspaceSchema = z.object({
  root: z.string().min(1).default(".worktrees"),
});

export const ProjectConfigSchema = z.object({
  repo_path: z.string().min(1).default("."),
  base_branch: z.string().min(1).default("main"),
  branch_prefix: z.string().min(1).default("planloom/"),

  tickets_dir: z.string().min(1).default(".planloom/tickets"),

  max_retries: z.number().int().positive().default(3),
  task_timeout_minutes: z.number().int().positive().optional(),

  workspace: WorkspaceSchema.default({}),
  verification: VerificationSchema.default({}),
  strategies: z.record(TaskLabelSchema, StrategySchema).default({}),
  review: ReviewSchema.default({}),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type CheckConfig = z.infer<typeof CheckSchema>;
export type StrategyConfig = z.infer<typeof StrategySchema>;
export type ReviewConfig = z.infer<typeof ReviewSchema>;

export const DEFAULT_CONFIG_TEMPLATE = `# planloom project config
repo_path: .
base_branch: main
branch_prefix: planloom/

# One YAML file per parent ticket: <tickets_dir>/<parent-id>.yaml
tickets_dir: .planloom/tickets

max_retries: 3
# task_timeout_minutes: 60

workspace:
  root: .worktrees

verification:
  checks:
    - name: test
    - name: lint
    - name: build
      timeout_seconds: 600

# Each label runs its own command inside the run's worktree. The task context
# arrives as JSON on stdin.
strategies:
${TASK_LABELS.map((label) => `  ${label}:\n    command: "echo 'configure a ${label} strategy' && exit 1"`).join("\n")}

review:
  enabled: false
  # command: ./scripts/review-task.sh
  # final_command: ./scripts/review-run.sh
`;
