import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";
import yaml from "js-yaml";
import { z } from "zod";

import type { ParentTicket, TicketStore } from "../app/orchestrator/ports.js";

import { TicketStoreError } from "./errors.js";
import { ticketFilePath } from "./paths.js";
import { TaskRecordSchema, type TaskRecord, type TaskStatus } from "./task-graph.js";
import { isoNow } from "./utils.js";

// =============================================================================
// SCHEMA
// =============================================================================

const TicketNoteSchema = z.object({
  at: z.string(),
  text: z.string(),
});

const TicketTaskSchema = TaskRecordSchema.extend({
  notes: z.array(TicketNoteSchema).default([]),
});

export const TicketFileSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  spec: z.string().optional(),
  plan: z.string().optional(),
  tasks: z.array(TicketTaskSchema).default([]),
});

export type TicketFile = z.infer<typeof TicketFileSchema>;

// =============================================================================
// STORE
// =============================================================================

/**
 * Ticket store backed by one YAML file per parent ticket. Child tasks are
 * listed in creation order; status and note updates rewrite the file atomically.
 */
export class FileTicketStore implements TicketStore {
  private readonly parentByTask = new Map<string, string>();

  constructor(public readonly ticketsDir: string) {}

  async getParent(parentId: string): Promise<ParentTicket> {
    const ticket = await this.readTicket(parentId);
    return { id: ticket.id, title: ticket.title, context: buildParentContext(ticket) };
  }

  async getChildTasks(parentId: string): Promise<TaskRecord[]> {
    const ticket = await this.readTicket(parentId);
    return ticket.tasks.map(({ notes: _notes, ...record }) => record);
  }

  async updateStatus(taskId: string, status: TaskStatus): Promise<void> {
    await this.updateTask(taskId, (task) => {
      task.status = status;
    });
  }

  async appendNote(taskId: string, text: string): Promise<void> {
    await this.updateTask(taskId, (task) => {
      task.notes.push({ at: isoNow(), text });
    });
  }

  async readTicket(parentId: string): Promise<TicketFile> {
    const filePath = ticketFilePath(this.ticketsDir, parentId);
    if (!(await fse.pathExists(filePath))) {
      throw new TicketStoreError(`Parent ticket ${parentId} not found at ${filePath}`);
    }

    const ticket = await readTicketFile(filePath);
    if (ticket.id !== parentId) {
      throw new TicketStoreError(
        `Ticket file ${filePath} belongs to ${ticket.id}, expected ${parentId}`,
      );
    }

    this.indexTasks(ticket);
    return ticket;
  }

  async writeTicket(ticket: TicketFile): Promise<void> {
    const filePath = ticketFilePath(this.ticketsDir, ticket.id);
    await writeTicketFile(filePath, ticket);
    this.indexTasks(ticket);
  }

  private async updateTask(
    taskId: string,
    mutate: (task: TicketFile["tasks"][number]) => void,
  ): Promise<void> {
    const parentId = await this.resolveParentId(taskId);
    const ticket = await this.readTicket(parentId);
    const task = ticket.tasks.find((candidate) => candidate.id === taskId);
    if (!task) {
      throw new TicketStoreError(`Task ${taskId} is no longer listed under parent ${parentId}`);
    }

    mutate(task);
    await this.writeTicket(ticket);
  }

  private async resolveParentId(taskId: string): Promise<string> {
    const known = this.parentByTask.get(taskId);
    if (known) return known;

    for (const filePath of await listTicketFiles(this.ticketsDir)) {
      const ticket = await readTicketFile(filePath);
      this.indexTasks(ticket);
    }

    const found = this.parentByTask.get(taskId);
    if (!found) {
      throw new TicketStoreError(`Task ${taskId} not found in ${this.ticketsDir}`);
    }
    return found;
  }

  private indexTasks(ticket: TicketFile): void {
    for (const task of ticket.tasks) {
      this.parentByTask.set(task.id, ticket.id);
    }
  }
}

// =============================================================================
// FILE IO
// =============================================================================

export function buildParentContext(ticket: TicketFile): string {
  const sections: string[] = [];
  if (ticket.spec?.trim()) sections.push(`## Specification\n\n${ticket.spec.trim()}`);
  if (ticket.plan?.trim()) sections.push(`## Plan\n\n${ticket.plan.trim()}`);
  return sections.join("\n\n");
}

async function listTicketFiles(ticketsDir: string): Promise<string[]> {
  if (!(await fse.pathExists(ticketsDir))) return [];

  const entries = await fs.readdir(ticketsDir);
  return entries
    .filter((entry) => entry.endsWith(".yaml") || entry.endsWith(".yml"))
    .sort()
    .map((entry) => path.join(ticketsDir, entry));
}

async function readTicketFile(filePath: string): Promise<TicketFile> {
  let doc: unknown;
  try {
    doc = yaml.load(await fse.readFile(filePath, "utf8"));
  } catch (err) {
    throw new TicketStoreError(`Failed to read ticket file ${filePath}`, err);
  }

  const parsed = TicketFileSchema.safeParse(doc);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("\n");
    throw new TicketStoreError(`Invalid ticket file ${filePath}:\n${details}`, parsed.error);
  }

  return parsed.data;
}

async function writeTicketFile(filePath: string, ticket: TicketFile): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));

  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    const contents = yaml.dump(ticket, { lineWidth: 100, noRefs: true, skipInvalid: true });
    await handle.writeFile(contents, "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw new TicketStoreError(`Failed to write ticket file ${filePath}`, err);
  }
}
