import { describe, expect, it } from "vitest";

import { WorkspaceAcquisitionError } from "../../../core/errors.js";
import { FakeWorkspaceProvider } from "../__tests__/fakes.js";

import { WorkspaceManager } from "./workspace-manager.js";

function createManager(provider = new FakeWorkspaceProvider()): WorkspaceManager {
  return new WorkspaceManager({ provider, baseRevision: "main", branchPrefix: "planloom/" });
}

describe("WorkspaceManager", () => {
  it("derives the workspace name from the run id", () => {
    const manager = createManager();

    expect(manager.workspaceName("PROJ-12 Checkout")).toBe("planloom/proj-12-checkout");
    expect(manager.workspaceName("***")).toBe("planloom/run");
  });

  it("creates the workspace once and hands out the same handle afterwards", async () => {
    const provider = new FakeWorkspaceProvider();
    const manager = createManager(provider);

    const first = await manager.acquire("P-1");
    const second = await manager.acquire("P-1");

    expect(first).toEqual({
      handle: {
        runId: "P-1",
        name: "planloom/p-1",
        path: "/worktrees/planloom/p-1",
        baseRevision: "main",
        baseSha: "base-sha",
      },
      reused: false,
    });
    expect(second).toEqual({ handle: first.handle, reused: true });
    expect(provider.operations).toEqual(["find planloom/p-1", "create planloom/p-1 from main"]);
  });

  it("reuses a valid leftover workspace", async () => {
    const provider = new FakeWorkspaceProvider();
    provider.seedEnvironment("planloom/p-1");
    const manager = createManager(provider);

    const { reused } = await manager.acquire("P-1");

    expect(reused).toBe(true);
    expect(provider.operations).toEqual(["find planloom/p-1", "validate planloom/p-1"]);
  });

  it("refuses a leftover workspace that fails validation", async () => {
    const provider = new FakeWorkspaceProvider();
    provider.seedEnvironment("planloom/p-1");
    provider.invalidReason = "base main is not an ancestor";
    const manager = createManager(provider);

    const acquiring = manager.acquire("P-1");

    await expect(acquiring).rejects.toBeInstanceOf(WorkspaceAcquisitionError);
    await expect(acquiring).rejects.toThrow("is not usable: base main is not an ancestor.");
  });

  it("wraps a validation failure", async () => {
    const provider = new FakeWorkspaceProvider();
    provider.seedEnvironment("planloom/p-1");
    provider.validateError = new Error("fatal: not a git repository");
    const manager = createManager(provider);

    const acquiring = manager.acquire("P-1");

    await expect(acquiring).rejects.toBeInstanceOf(WorkspaceAcquisitionError);
    await expect(acquiring).rejects.toThrow(
      "Could not validate workspace /worktrees/planloom/p-1 for run P-1: fatal: not a git repository",
    );
  });

  it("wraps a creation failure", async () => {
    const provider = new FakeWorkspaceProvider();
    provider.createError = new Error("fatal: invalid reference: main");
    const manager = createManager(provider);

    await expect(manager.acquire("P-1")).rejects.toThrow(
      "Could not create workspace planloom/p-1 from main for run P-1: fatal: invalid reference: main",
    );
  });

  it("forwards resets, checkpoints and change descriptions to the provider", async () => {
    const provider = new FakeWorkspaceProvider();
    const manager = createManager(provider);
    const { handle } = await manager.acquire("P-1");

    await manager.resetAttempt(handle);
    const sha = await manager.checkpoint(handle, "A: Add cart");
    const changes = await manager.describeChanges(handle);

    expect(sha).toBe("sha-1");
    expect(changes).toBe("1 commit(s) on planloom/p-1");
    expect(provider.operations.slice(2)).toEqual([
      "reset planloom/p-1",
      "checkpoint A: Add cart",
      "describe planloom/p-1",
    ]);
  });

  it("integrates before teardown and rejects use after release", async () => {
    const provider = new FakeWorkspaceProvider();
    const manager = createManager(provider);
    const { handle } = await manager.acquire("P-1");

    await manager.release(handle, "integrate");

    expect(provider.operations.slice(2)).toEqual([
      "integrate planloom/p-1 into main",
      "teardown planloom/p-1",
    ]);
    await expect(manager.resetAttempt(handle)).rejects.toThrow(
      "Workspace for run P-1 has already been released.",
    );
    await expect(manager.acquire("P-1")).rejects.toThrow(
      "Workspace for run P-1 was already released in this session.",
    );
  });

  it("discards without integrating", async () => {
    const provider = new FakeWorkspaceProvider();
    const manager = createManager(provider);
    const { handle } = await manager.acquire("P-1");

    await manager.release(handle, "discard");

    expect(provider.operations.slice(2)).toEqual(["teardown planloom/p-1"]);
  });

  it("finds an existing workspace without creating one", async () => {
    const provider = new FakeWorkspaceProvider();
    const manager = createManager(provider);

    await expect(manager.find("P-2")).resolves.toBeNull();
    provider.seedEnvironment("planloom/p-2");
    await expect(manager.find("P-2")).resolves.toMatchObject({ path: "/worktrees/planloom/p-2" });
  });
});
