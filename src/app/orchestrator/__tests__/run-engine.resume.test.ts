import { describe, expect, it } from "vitest";

import type { StrategyResult } from "../ports.js";

import { createHarness, task } from "./run-engine.test-kit.js";

function ids(entries: ReadonlyArray<{ id: string }>): string[] {
  return entries.map((entry) => entry.id);
}

describe("runScheduler resume", () => {
  it("skips completed work and resets tasks left running by a crash", async () => {
    const harness = createHarness({
      records: [
        task("A", [], { status: "completed" }),
        task("B", ["A"], { status: "completed" }),
        task("C", ["A"], { status: "running" }),
        task("D", ["B", "C"]),
      ],
    });

    const { summary } = await harness.run();

    expect(harness.store.statusUpdates[0]).toEqual({ taskId: "C", status: "pending" });
    expect(harness.strategy.dispatchedTaskIds()).toEqual(["C", "D"]);
    expect(ids(summary.completed)).toEqual(["A", "B", "C", "D"]);
    expect(summary.completed.map((entry) => entry.attempts)).toEqual([0, 0, 1, 1]);

    const events = harness.events();
    expect(events.find((event) => event.type === "task.reset")).toMatchObject({
      task_id: "C",
      previous_status: "running",
    });
    expect(events.find((event) => event.type === "run.resume")).toMatchObject({
      completed: 2,
      skipped: 0,
      reset_tasks: 1,
    });
  });

  it("logs no resume for a fresh run", async () => {
    const harness = createHarness({ records: [task("A")] });

    await harness.run();

    expect(harness.eventTypes()).not.toContain("run.resume");
  });

  it("keeps skipped work skipped and blocks its dependents", async () => {
    const harness = createHarness({
      records: [task("A", [], { status: "skipped" }), task("B", ["A"])],
    });

    const { summary } = await harness.run();

    expect(summary.dispatches).toBe(0);
    expect(summary.skipped).toEqual([
      {
        id: "A",
        title: "Task A",
        status: "skipped",
        attempts: 0,
        reason: "Skipped in a previous run",
      },
    ]);
    expect(ids(summary.blocked)).toEqual(["B"]);
    expect(harness.store.statusOf("B")).toBe("blocked");
  });

  it("retries skipped work when asked to", async () => {
    const harness = createHarness({
      records: [task("A", [], { status: "skipped" }), task("B", ["A"])],
    });

    const { summary } = await harness.run({ retrySkipped: true });

    expect(harness.strategy.dispatchedTaskIds()).toEqual(["A", "B"]);
    expect(ids(summary.completed)).toEqual(["A", "B"]);
    expect(harness.store.statusHistory("A")[0]).toBe("pending");
  });

  it("gives previously blocked tasks another chance", async () => {
    const harness = createHarness({
      records: [task("A", [], { status: "failed" }), task("B", ["A"], { status: "blocked" })],
    });

    const { summary } = await harness.run();

    expect(harness.store.statusUpdates.slice(0, 2)).toEqual([
      { taskId: "A", status: "pending" },
      { taskId: "B", status: "pending" },
    ]);
    expect(harness.strategy.dispatchedTaskIds()).toEqual(["A", "B"]);
    expect(ids(summary.completed)).toEqual(["A", "B"]);
  });

  it("reuses the workspace left by the interrupted run", async () => {
    const harness = createHarness({
      records: [task("A", [], { status: "completed" }), task("B", ["A"])],
    });
    harness.provider.seedEnvironment("planloom/p-1");

    const { workspace } = await harness.run();

    expect(workspace?.path).toBe("/worktrees/planloom/p-1");
    expect(harness.provider.operations.slice(0, 2)).toEqual([
      "find planloom/p-1",
      "validate planloom/p-1",
    ]);
    expect(harness.events().find((event) => event.type === "workspace.acquire")).toMatchObject({
      reused: true,
    });
  });
});

describe("runScheduler stop requests", () => {
  function stopDuring(controller: AbortController): () => Promise<StrategyResult> {
    return async () => {
      controller.abort("SIGINT");
      return { success: true, changeSummary: "finished despite stop" };
    };
  }

  it("finishes the task in flight, then stops without blocking anything", async () => {
    const controller = new AbortController();
    const harness = createHarness({ records: [task("A"), task("B", ["A"]), task("C")] });
    harness.strategy.queue("A", stopDuring(controller));

    const { summary, workspace } = await harness.run({ stopSignal: controller.signal });

    expect(harness.strategy.dispatchedTaskIds()).toEqual(["A"]);
    expect(summary.aborted).toBe(true);
    expect(summary.abortReason).toBe("SIGINT");
    expect(ids(summary.completed)).toEqual(["A"]);
    expect(ids(summary.pending)).toEqual(["B", "C"]);
    expect(summary.blocked).toEqual([]);
    expect(harness.store.statusOf("B")).toBe("pending");
    expect(workspace?.name).toBe("planloom/p-1");
    expect(harness.provider.operations).not.toContain("teardown planloom/p-1");
    expect(harness.events().find((event) => event.type === "run.stop")).toMatchObject({
      reason: "SIGINT",
      next_task: "B",
    });
  });

  it("discards the workspace on stop when configured to", async () => {
    const controller = new AbortController();
    const harness = createHarness({ records: [task("A"), task("B")] });
    harness.strategy.queue("A", stopDuring(controller));

    const { workspace } = await harness.run({
      stopSignal: controller.signal,
      onAbort: "discard",
    });

    expect(workspace).toBeNull();
    expect(harness.provider.operations.at(-1)).toBe("teardown planloom/p-1");
  });

  it("dispatches nothing when stopped before the first task", async () => {
    const controller = new AbortController();
    controller.abort("SIGTERM");
    const harness = createHarness({ records: [task("A")] });

    const { summary } = await harness.run({ stopSignal: controller.signal });

    expect(summary.dispatches).toBe(0);
    expect(ids(summary.pending)).toEqual(["A"]);
  });
});

describe("runScheduler persistence failures", () => {
  it("recovers when a later write for the task succeeds", async () => {
    const harness = createHarness({ records: [task("A")] });
    harness.store.failUpdates("A", 1);

    const { summary } = await harness.run();

    expect(summary.unsynced).toEqual([]);
    expect(harness.store.statusOf("A")).toBe("completed");
    expect(harness.events().find((event) => event.type === "state.persist.failed")).toMatchObject(
      { task_id: "A", message: "ticket store unavailable", status: "running" },
    );
  });

  it("reports tasks whose final status never reached the store", async () => {
    const harness = createHarness({ records: [task("A")] });
    harness.store.failUpdates("A", 2);

    const { summary } = await harness.run();

    expect(summary.completed.map((entry) => entry.id)).toEqual(["A"]);
    expect(summary.unsynced).toEqual([
      { taskId: "A", status: "completed", error: "ticket store unavailable" },
    ]);
    expect(harness.store.statusOf("A")).toBe("pending");
  });

  it("keeps going when notes cannot be written", async () => {
    const harness = createHarness({ records: [task("A")] });
    harness.store.failNotes = true;
    harness.strategy.queue("A", { success: false, changeSummary: "flaky" });

    const { summary } = await harness.run();

    expect(ids(summary.completed)).toEqual(["A"]);
    expect(harness.eventTypes()).toContain("state.note.failed");
  });
});
