// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  task: "TASK_ERROR",
  workspace: "WORKSPACE_ERROR",
  git: "GIT_ERROR",
  ticketStore: "TICKET_STORE_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

// =============================================================================
// ORCHESTRATOR ERRORS
// =============================================================================

export class OrchestratorError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class TaskError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TaskError";
  }
}

export class GitError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export class TicketStoreError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TicketStoreError";
  }
}

export class WorkspaceAcquisitionError extends OrchestratorError {
  constructor(
    message: string,
    public readonly runId: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "WorkspaceAcquisitionError";
  }
}

// Task graph configuration errors carry the offending task ids.

export class CycleError extends ConfigError {
  constructor(public readonly taskIds: string[]) {
    super(`Task dependencies contain a cycle: ${taskIds.join(", ")}`);
    this.name = "CycleError";
  }
}

export class DanglingReferenceError extends ConfigError {
  constructor(public readonly references: Array<{ taskId: string; dependency: string }>) {
    super(
      `Tasks depend on unknown task ids: ${references
        .map((ref) => `${ref.taskId} -> ${ref.dependency}`)
        .join(", ")}`,
    );
    this.name = "DanglingReferenceError";
  }
}

export class DuplicateTaskError extends ConfigError {
  constructor(public readonly taskIds: string[]) {
    super(`Duplicate task ids: ${taskIds.join(", ")}`);
    this.name = "DuplicateTaskError";
  }
}
