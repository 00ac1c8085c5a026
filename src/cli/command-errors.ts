import { formatErrorMessage } from "../core/error-format.js";
import {
  ConfigError,
  GitError,
  TaskError,
  TicketStoreError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  WorkspaceAcquisitionError,
  type UserFacingErrorCode,
} from "../core/errors.js";

// =============================================================================
// HINTS
// =============================================================================

const HINTS: Partial<Record<UserFacingErrorCode, string>> = {
  [USER_FACING_ERROR_CODES.config]:
    "Fix .planloom/config.yaml (or the task graph in the ticket) and rerun.",
  [USER_FACING_ERROR_CODES.workspace]:
    "Inspect the worktree, or discard it with `planloom release --parent <id> --mode discard`.",
  [USER_FACING_ERROR_CODES.git]: "Resolve the git problem in the main checkout and rerun.",
  [USER_FACING_ERROR_CODES.ticketStore]: "Check `tickets_dir` and the parent ticket file.",
};

// =============================================================================
// PUBLIC API
// =============================================================================

/** Wraps any thrown value into a UserFacingError titled for the failing command. */
export function normalizeCommandError(error: unknown, title: string): UserFacingError {
  if (error instanceof UserFacingError) {
    return new UserFacingError({
      code: error.code,
      title,
      message: error.message,
      hint: error.hint ?? HINTS[error.code],
      next: error.next,
      cause: error.cause ?? error,
    });
  }

  const code = resolveCommandErrorCode(error);
  return new UserFacingError({
    code,
    title,
    message: formatErrorMessage(error),
    hint: HINTS[code],
    cause: error,
  });
}

export function resolveCommandErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof UserFacingError) return error.code;
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof WorkspaceAcquisitionError) return USER_FACING_ERROR_CODES.workspace;
  if (error instanceof GitError) return USER_FACING_ERROR_CODES.git;
  if (error instanceof TicketStoreError) return USER_FACING_ERROR_CODES.ticketStore;
  if (error instanceof TaskError) return USER_FACING_ERROR_CODES.task;
  return USER_FACING_ERROR_CODES.unknown;
}
