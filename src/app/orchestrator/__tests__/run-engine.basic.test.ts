import { describe, expect, it } from "vitest";

import { createHarness, task } from "./run-engine.test-kit.js";

function ids(entries: ReadonlyArray<{ id: string }>): string[] {
  return entries.map((entry) => entry.id);
}

describe("runScheduler", () => {
  it("runs a diamond graph in dependency order and completes every task", async () => {
    const harness = createHarness({
      records: [task("A"), task("B", ["A"]), task("C", ["A"]), task("D", ["B", "C"])],
    });

    const { summary, workspace } = await harness.run();

    expect(harness.strategy.dispatchedTaskIds()).toEqual(["A", "B", "C", "D"]);
    expect(ids(summary.completed)).toEqual(["A", "B", "C", "D"]);
    expect(summary.skipped).toEqual([]);
    expect(summary.blocked).toEqual([]);
    expect(summary.pending).toEqual([]);
    expect(summary.dispatches).toBe(4);
    expect(summary.aborted).toBe(false);
    expect(workspace?.path).toBe("/worktrees/planloom/p-1");
  });

  it("persists running and completed for every task", async () => {
    const harness = createHarness({ records: [task("A"), task("B", ["A"])] });

    await harness.run();

    expect(harness.store.statusUpdates).toEqual([
      { taskId: "A", status: "running" },
      { taskId: "A", status: "completed" },
      { taskId: "B", status: "running" },
      { taskId: "B", status: "completed" },
    ]);
  });

  it("resets the workspace before each attempt and checkpoints completed work", async () => {
    const harness = createHarness({ records: [task("A"), task("B", ["A"])] });

    await harness.run();

    expect(harness.provider.operations).toEqual([
      "find planloom/p-1",
      "create planloom/p-1 from main",
      "reset planloom/p-1",
      "checkpoint A: Task A",
      "reset planloom/p-1",
      "checkpoint B: Task B",
    ]);
  });

  it("hands each strategy the task, the parent context and the workspace", async () => {
    const harness = createHarness({ records: [task("A", [], { label: "Chore" })] });

    await harness.run();

    expect(harness.strategy.calls[0]).toMatchObject({
      runId: "P-1",
      task: { id: "A", title: "Task A", description: "Implement A", label: "Chore" },
      parent: { id: "P-1", title: "Checkout flow", context: "Build the checkout flow." },
      attempt: 1,
      maxAttempts: 3,
      workspacePath: "/worktrees/planloom/p-1",
    });
  });

  it("breaks ties among ready tasks by creation order", async () => {
    const harness = createHarness({
      records: [task("Z"), task("M"), task("A"), task("B", ["Z"])],
    });

    await harness.run();

    expect(harness.strategy.dispatchedTaskIds()).toEqual(["Z", "M", "A", "B"]);
  });

  it("verifies with test, lint and build after each dispatch", async () => {
    const harness = createHarness({ records: [task("A")] });

    await harness.run();

    expect(harness.checks.calls).toEqual(["test", "lint", "build"]);
  });

  it("logs the run lifecycle", async () => {
    const harness = createHarness({ records: [task("A")] });

    await harness.run();

    expect(harness.eventTypes()).toEqual([
      "run.start",
      "workspace.acquire",
      "task.start",
      "task.dispatch",
      "verification.check",
      "verification.check",
      "verification.check",
      "review.verdict",
      "task.complete",
      "run.complete",
    ]);
    const complete = harness.events().find((event) => event.type === "task.complete");
    expect(complete).toMatchObject({ run_id: "P-1", task_id: "A", attempt: 1, checkpoint: "sha-1" });
  });

  it("reuses a valid workspace left by an earlier run", async () => {
    const harness = createHarness({ records: [task("A")] });
    harness.provider.seedEnvironment("planloom/p-1");

    await harness.run();

    expect(harness.provider.operations.slice(0, 3)).toEqual([
      "find planloom/p-1",
      "validate planloom/p-1",
      "reset planloom/p-1",
    ]);
    const acquire = harness.events().find((event) => event.type === "workspace.acquire");
    expect(acquire).toMatchObject({ reused: true, path: "/worktrees/planloom/p-1" });
  });

  it("returns immediately for a parent without tasks", async () => {
    const harness = createHarness({ records: [] });

    const { summary } = await harness.run();

    expect(summary.dispatches).toBe(0);
    expect(summary.completed).toEqual([]);
    expect(harness.provider.operations).toEqual([
      "find planloom/p-1",
      "create planloom/p-1 from main",
    ]);
  });
});
