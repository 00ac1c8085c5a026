import { describe, expect, it, vi } from "vitest";

import { ConfigError, WorkspaceAcquisitionError } from "../../../core/errors.js";

import { failingStep, hangingStep } from "./fakes.js";
import { createHarness, task } from "./run-engine.test-kit.js";

function ids(entries: ReadonlyArray<{ id: string }>): string[] {
  return entries.map((entry) => entry.id);
}

function silenceWarnings() {
  return vi.spyOn(console, "warn").mockImplementation(() => undefined);
}

describe("runScheduler failure policy", () => {
  it("skips a task after maxRetries failures and blocks its dependents", async () => {
    const warn = silenceWarnings();
    const harness = createHarness({
      records: [task("A"), task("B", ["A"]), task("C", ["A"]), task("D", ["B", "C"])],
    });
    harness.strategy.queue(
      "C",
      failingStep("tests red"),
      failingStep("tests red"),
      failingStep("tests red"),
    );

    const { summary } = await harness.run();

    expect(harness.strategy.dispatchedTaskIds()).toEqual(["A", "B", "C", "C", "C"]);
    expect(ids(summary.completed)).toEqual(["A", "B"]);
    expect(summary.skipped).toEqual([
      {
        id: "C",
        title: "Task C",
        status: "skipped",
        attempts: 3,
        reason: "Execution strategy reported failure: tests red",
      },
    ]);
    expect(summary.blocked).toEqual([
      { id: "D", title: "Task D", status: "blocked", attempts: 0, reason: "blocked by C" },
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "Warning: task C (Task C) skipped after 3 failed attempt(s): Execution strategy reported failure: tests red",
    );
  });

  it("records every failed attempt and the final disposition in the ticket store", async () => {
    silenceWarnings();
    const harness = createHarness({ records: [task("C"), task("D", ["C"])] });
    harness.strategy.queue("C", failingStep("red"), failingStep("red"), failingStep("red"));

    await harness.run();

    expect(harness.store.statusHistory("C")).toEqual([
      "running",
      "pending",
      "running",
      "pending",
      "running",
      "skipped",
    ]);
    expect(harness.store.notesOf("C")).toEqual([
      "Attempt 1/3 failed: Execution strategy reported failure: red",
      "Attempt 2/3 failed: Execution strategy reported failure: red",
      "Skipped after 3 failed attempt(s). Last error: Execution strategy reported failure: red",
    ]);
    expect(harness.store.statusHistory("D")).toEqual(["blocked"]);
    expect(harness.store.notesOf("D")).toEqual(["Blocked: depends on C, which did not complete"]);
  });

  it("keeps running independent work after a permanent failure", async () => {
    silenceWarnings();
    const harness = createHarness({ records: [task("A"), task("B"), task("C", ["A"])] });
    harness.strategy.queue("A", new Error("crash"), new Error("crash"), new Error("crash"));

    const { summary } = await harness.run();

    expect(harness.strategy.dispatchedTaskIds()).toEqual(["A", "A", "A", "B"]);
    expect(ids(summary.completed)).toEqual(["B"]);
    expect(ids(summary.skipped)).toEqual(["A"]);
    expect(ids(summary.blocked)).toEqual(["C"]);
    expect(summary.skipped[0]?.reason).toBe("Execution strategy for Feature threw: crash");
  });

  it("completes a task that succeeds on retry and hands it the previous error", async () => {
    const harness = createHarness({ records: [task("A")] });
    harness.strategy.queue("A", failingStep("flaky"));

    const { summary } = await harness.run();

    expect(summary.completed).toEqual([
      { id: "A", title: "Task A", status: "completed", attempts: 2 },
    ]);
    expect(harness.strategy.calls[1]).toMatchObject({
      attempt: 2,
      previousError: "Execution strategy reported failure: flaky",
    });
    expect(harness.graph.byId.get("A")).toMatchObject({ retryCount: 1, lastError: undefined });
    expect(harness.provider.operations.filter((op) => op.startsWith("reset"))).toHaveLength(2);
  });

  it("treats a failed check as a failed attempt", async () => {
    const harness = createHarness({ records: [task("A")] });
    harness.checks.queue("lint", { passed: false, output: "unused import" });

    const { summary } = await harness.run();

    expect(harness.checks.calls).toEqual(["test", "lint", "test", "lint", "build"]);
    expect(summary.dispatches).toBe(2);
    expect(harness.store.notesOf("A")).toEqual([
      'Attempt 1/3 failed: Verification failed: Check "lint" failed:\nunused import',
    ]);
    expect(harness.provider.operations.filter((op) => op.startsWith("checkpoint"))).toEqual([
      "checkpoint A: Task A",
    ]);
  });

  it("treats a rejected review as a failed attempt", async () => {
    const harness = createHarness({ records: [task("A")], reviewEnabled: true });
    harness.judge.queue({ passed: false, findings: "missing tests" });

    const { summary } = await harness.run();

    expect(summary.dispatches).toBe(2);
    expect(harness.judge.contexts).toHaveLength(2);
    expect(harness.store.notesOf("A")).toEqual([
      "Attempt 1/3 failed: Review rejected: missing tests",
    ]);
  });

  it("fails the attempt when the checkpoint cannot be committed", async () => {
    silenceWarnings();
    const harness = createHarness({ records: [task("A")] });
    harness.provider.checkpointError = new Error("pre-commit hook rejected");

    const { summary } = await harness.run({ maxRetries: 1 });

    expect(summary.skipped[0]?.reason).toBe("Checkpoint failed: pre-commit hook rejected");
  });

  it("cancels an attempt that outlives the task timeout", async () => {
    silenceWarnings();
    const harness = createHarness({ records: [task("A")] });
    harness.strategy.queue("A", hangingStep());

    const { summary } = await harness.run({ maxRetries: 1, taskTimeoutMs: 20 });

    expect(summary.skipped[0]?.reason).toBe(
      "Execution cancelled: Task attempt timed out after 20ms",
    );
  });

  it("never dispatches more than N * maxRetries times", async () => {
    silenceWarnings();
    const records = [task("A"), task("B"), task("C", ["A"]), task("D")];
    const harness = createHarness({ records });
    for (const record of records) {
      harness.strategy.queue(record.id, failingStep("no"), failingStep("no"));
    }

    const { summary } = await harness.run({ maxRetries: 2 });

    expect(summary.dispatches).toBe(6);
    expect(summary.dispatches).toBeLessThanOrEqual(records.length * 2);
    expect(ids(summary.skipped)).toEqual(["A", "B", "D"]);
    expect(ids(summary.blocked)).toEqual(["C"]);
  });
});

describe("runScheduler fatal errors", () => {
  it("refuses to start when a label has no strategy", async () => {
    const harness = createHarness({
      records: [task("A"), task("B", [], { label: "Chore" })],
      strategyLabels: ["Feature"],
    });

    await expect(harness.run()).rejects.toThrow(ConfigError);
    await expect(harness.run()).rejects.toThrow(
      "No execution strategy configured for label(s): Chore.",
    );
    expect(harness.strategy.calls).toEqual([]);
    expect(harness.provider.operations).toEqual([]);
  });

  it("aborts before any task when the workspace cannot be created", async () => {
    const harness = createHarness({ records: [task("A")] });
    harness.provider.createError = new Error("unknown revision main");

    await expect(harness.run()).rejects.toThrow(WorkspaceAcquisitionError);
    expect(harness.strategy.calls).toEqual([]);
    expect(harness.store.statusUpdates).toEqual([]);
  });

  it("aborts when a leftover workspace is not usable", async () => {
    const harness = createHarness({ records: [task("A")] });
    harness.provider.seedEnvironment("planloom/p-1");
    harness.provider.invalidReason = "branch is feature/x, expected planloom/p-1";

    await expect(harness.run()).rejects.toThrow(
      "Workspace /worktrees/planloom/p-1 for run P-1 is not usable: branch is feature/x, expected planloom/p-1.",
    );
    expect(harness.strategy.calls).toEqual([]);
  });

  it("names the task and attempt when the workspace cannot be reset, leaving the task pending", async () => {
    const harness = createHarness({ records: [task("A")] });
    const cause = new Error("index.lock exists");
    harness.provider.resetError = cause;

    const running = harness.run();

    await expect(running).rejects.toBeInstanceOf(WorkspaceAcquisitionError);
    await expect(running).rejects.toMatchObject({
      message:
        "Could not reset workspace /worktrees/planloom/p-1 before attempt 1 of task A: index.lock exists",
      runId: "P-1",
      cause,
    });
    expect(harness.strategy.calls).toEqual([]);
    expect(harness.store.statusHistory("A")).toEqual([]);
    expect(harness.graph.byId.get("A")?.status).toBe("pending");
    expect(harness.eventTypes()).not.toContain("task.start");
  });
});
