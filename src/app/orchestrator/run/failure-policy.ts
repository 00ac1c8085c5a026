/**
 * Attempt failure helpers.
 * Purpose: keep timeout signals and failure wording out of the scheduler loop.
 */

// =============================================================================
// ATTEMPT TIMEOUT
// =============================================================================

export type AttemptSignal = {
  signal: AbortSignal;
  dispose: () => void;
};

/**
 * Signal for one dispatch. Fires when the attempt outlives `timeoutMs`;
 * never fires when no timeout is configured.
 */
export function createAttemptSignal(timeoutMs?: number): AttemptSignal {
  const controller = new AbortController();
  if (timeoutMs === undefined) {
    return { signal: controller.signal, dispose: () => undefined };
  }

  const timer = setTimeout(() => {
    controller.abort(`Task attempt timed out after ${formatDuration(timeoutMs)}`);
  }, timeoutMs);

  return { signal: controller.signal, dispose: () => clearTimeout(timer) };
}

export function formatDuration(ms: number): string {
  if (ms >= 60_000 && ms % 60_000 === 0) return `${ms / 60_000} minute(s)`;
  if (ms >= 1000 && ms % 1000 === 0) return `${ms / 1000} second(s)`;
  return `${ms}ms`;
}

// =============================================================================
// NOTES
// =============================================================================

export function retryNote(attempt: number, maxRetries: number, reason: string): string {
  return `Attempt ${attempt}/${maxRetries} failed: ${reason}`;
}

export function skipNote(attempts: number, reason: string): string {
  return `Skipped after ${attempts} failed attempt(s). Last error: ${reason}`;
}

export function blockNote(blockedBy: readonly string[]): string {
  return `Blocked: depends on ${blockedBy.join(", ")}, which did not complete`;
}

export function skipWarning(
  taskId: string,
  title: string,
  attempts: number,
  reason: string,
): string {
  const detail = firstLine(reason);
  return `Warning: task ${taskId} (${title}) skipped after ${attempts} failed attempt(s): ${detail}`;
}

function firstLine(text: string): string {
  return text.split(/\r?\n/, 1)[0] ?? "";
}
