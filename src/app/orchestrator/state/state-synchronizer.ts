/**
 * StateSynchronizer mirrors in-memory task status to the ticket store.
 * Purpose: make a run resumable without letting a flaky store stop the scheduler.
 * Assumptions: the in-memory graph is the source of truth while a run is active.
 * Usage: const ok = await sync.persist(task, "Attempt 2 failed: lint");
 */

import { TicketStoreError } from "../../../core/errors.js";
import { logOrchestratorEvent, type JsonlLogger } from "../../../core/logger.js";
import {
  TaskRecordSchema,
  type Task,
  type TaskRecord,
  type TaskStatus,
} from "../../../core/task-graph.js";
import { formatErrorMessage } from "../helpers/errors.js";
import type { ParentTicket, TicketStore } from "../ports.js";

export type UnsyncedTask = {
  taskId: string;
  status: TaskStatus;
  error: string;
};

export class StateSynchronizer {
  private readonly unsyncedTasks = new Map<string, UnsyncedTask>();

  constructor(
    private readonly store: TicketStore,
    private readonly parentId: string,
    private readonly logger?: JsonlLogger,
  ) {}

  async loadParent(): Promise<ParentTicket> {
    return this.store.getParent(this.parentId);
  }

  async loadTaskRecords(): Promise<TaskRecord[]> {
    const records = await this.store.getChildTasks(this.parentId);
    return records.map((record) => {
      const parsed = TaskRecordSchema.safeParse(record);
      if (!parsed.success) {
        throw new TicketStoreError(
          `Ticket store returned an invalid task under ${this.parentId}: ${parsed.error.message}`,
          parsed.error,
        );
      }
      return parsed.data;
    });
  }

  async loadStatuses(): Promise<Map<string, TaskStatus>> {
    const records = await this.loadTaskRecords();
    return new Map(records.map((record) => [record.id, record.status]));
  }

  /**
   * Writes the task's current status, then the note if one is given.
   * Returns false when the status write failed; the task stays unsynced until
   * a later persist succeeds.
   */
  async persist(task: Task, note?: string): Promise<boolean> {
    const status = task.status;
    let synced = true;

    try {
      await this.store.updateStatus(task.id, status);
      this.unsyncedTasks.delete(task.id);
    } catch (err) {
      synced = false;
      const error = formatErrorMessage(err);
      this.unsyncedTasks.set(task.id, { taskId: task.id, status, error });
      this.log("state.persist.failed", { taskId: task.id, status, message: error });
    }

    if (note !== undefined) {
      await this.appendNote(task.id, note);
    }

    return synced;
  }

  async appendNote(taskId: string, note: string): Promise<void> {
    try {
      await this.store.appendNote(taskId, note);
    } catch (err) {
      this.log("state.note.failed", { taskId, message: formatErrorMessage(err) });
    }
  }

  unsynced(): UnsyncedTask[] {
    return [...this.unsyncedTasks.values()];
  }

  private log(
    type: string,
    fields: { taskId: string; status?: TaskStatus; message: string },
  ): void {
    if (!this.logger) return;
    const { status, ...rest } = fields;
    logOrchestratorEvent(this.logger, type, status === undefined ? rest : { ...rest, status });
  }
}
