/*
Pure error helpers shared by the scheduler and its gates.
Assumes callers only need string representations for logs, notes and summaries.
*/

export { formatErrorMessage } from "../../../core/error-format.js";

const DEFAULT_ABORT_REASON = "aborted";

export function normalizeAbortReason(reason: unknown): string | undefined {
  if (reason === undefined || reason === null) return undefined;
  if (typeof reason === "string") return reason;
  if (reason instanceof Error) return reason.message;

  if (typeof reason === "object") {
    if ("signal" in reason && typeof reason.signal === "string") return reason.signal;
    if ("type" in reason && typeof reason.type === "string") return reason.type;
  }

  return String(reason);
}

export function describeAbort(signal: AbortSignal): string {
  return normalizeAbortReason(signal.reason) ?? DEFAULT_ABORT_REASON;
}
