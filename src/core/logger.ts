import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  run_id: string;
  task_id?: string;
};

export type LogEventInput = JsonObject & {
  type: string;
  runId?: string;
  taskId?: string;
};

type EventDefaults = {
  runId?: string;
  taskId?: string;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveDebugFlagFromArgv(process.argv) ?? false;
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.defaults));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { runId: providedRunId, taskId, type, ...rest } = event;

  const runId = providedRunId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const result: LogEvent = {
    ...rest,
    ts: isoNow(),
    type,
    run_id: runId,
  };

  const resolvedTaskId = taskId ?? defaults.taskId;
  if (resolvedTaskId) {
    result.task_id = resolvedTaskId;
  }

  return result;
}

export function logOrchestratorEvent(
  logger: JsonlLogger,
  type: string,
  fields: JsonObject & { taskId?: string } = {},
): void {
  const { taskId, ...rest } = fields;
  const event: LogEventInput = { type, ...rest };

  if (taskId !== undefined) {
    event.taskId = taskId;
  }

  logger.log(event);
}

export function logRunResume(
  logger: JsonlLogger,
  details: { completed: number; skipped: number; resetTasks: number },
): void {
  logOrchestratorEvent(logger, "run.resume", {
    completed: details.completed,
    skipped: details.skipped,
    reset_tasks: details.resetTasks,
  });
}

export function logTaskReset(logger: JsonlLogger, taskId: string, previousStatus: string): void {
  logOrchestratorEvent(logger, "task.reset", { taskId, previous_status: previousStatus });
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find(
    (line) => line.kind === "stack",
  );
  return stackLine ? `${message}\n${stackLine.text}` : message;
}

export function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }

    if (arg === "--no-debug") {
      debugFlag = false;
    }
  }

  return debugFlag;
}
