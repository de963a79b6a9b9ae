/**
 * workflow.test.ts — Timed workflow state machine and compensating cleanup
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  DEFAULT_FAST_CLOSE_DELAY_MS,
  MAX_WAIT_MS,
  TimedWorkflowEngine,
  WorkflowAlreadyRunningError,
  clampDelayMs,
  describeRef,
} from "../index.js";
import type { WorkflowState } from "../index.js";
import { InstantClock, RecordingArtifactPort } from "./helpers.js";

const CONTAINER = "quickdraw-1704067200";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  return () => {
    vi.restoreAllMocks();
  };
});

describe("fast-close workflow", () => {
  it("walks the full success path and cleans up in reverse", async () => {
    const artifacts = new RecordingArtifactPort();
    const clock = new InstantClock();
    const engine = new TimedWorkflowEngine({ artifacts, clock });

    const run = await engine.run("fast-close");

    expect(run.history).toEqual(["idle", "provisioning", "waiting", "finalizing", "cleaning-up", "succeeded"]);
    expect(run.state).toBe("succeeded");
    expect(run.result).toEqual({ status: "success" });
    expect(clock.sleeps).toEqual([DEFAULT_FAST_CLOSE_DELAY_MS]);
    expect(artifacts.calls).toEqual([
      `createContainer ${CONTAINER}`,
      "createIssue Documentation improvement suggestion",
      "commentOnIssue #1",
      "closeIssue #1",
      "discard:issue #1",
      `deleteContainer tester/${CONTAINER}`,
    ]);
    expect(run.cleanup.map((status) => status.outcome)).toEqual(["removed", "removed"]);
    expect(run.startedAt).toBe("2024-01-01T00:00:00.000Z");
    expect(run.finishedAt).toBe("2024-01-01T00:00:30.000Z");
  });

  it("skips the comment when it is disabled", async () => {
    const artifacts = new RecordingArtifactPort();
    const engine = new TimedWorkflowEngine({ artifacts, clock: new InstantClock(), fastClose: { comment: null } });

    await engine.run("fast-close");

    expect(artifacts.calls).not.toContain("commentOnIssue #1");
    expect(artifacts.calls).toContain("closeIssue #1");
  });

  it("uses the configured delay and container prefix", async () => {
    const artifacts = new RecordingArtifactPort();
    const clock = new InstantClock();
    const engine = new TimedWorkflowEngine({
      artifacts,
      clock,
      fastClose: { delayMs: 5_000, containerPrefix: "speedy" },
    });

    await engine.run("fast-close");

    expect(clock.sleeps).toEqual([5_000]);
    expect(artifacts.calls[0]).toBe("createContainer speedy-1704067200");
  });

  it("does not sleep with a zero delay", async () => {
    const clock = new InstantClock();
    const engine = new TimedWorkflowEngine({
      artifacts: new RecordingArtifactPort(),
      clock,
      fastClose: { delayMs: 0 },
    });

    const run = await engine.run("fast-close");

    expect(clock.sleeps).toEqual([]);
    expect(run.history).toContain("waiting");
  });

  it("cleans only the container when issue creation fails", async () => {
    const artifacts = new RecordingArtifactPort().failOn("createIssue", new Error("issues disabled"));
    const engine = new TimedWorkflowEngine({ artifacts, clock: new InstantClock() });

    const run = await engine.run("fast-close");

    expect(run.history).toEqual(["idle", "provisioning", "cleaning-up", "failed"]);
    expect(run.result).toEqual({
      status: "failure",
      reason: { stage: "provisioning", step: "create-issue", message: "issues disabled" },
    });
    expect(run.createdArtifactRefs.map((ref) => ref.kind)).toEqual(["container"]);
    expect(artifacts.calls.slice(2)).toEqual([`deleteContainer tester/${CONTAINER}`]);
  });

  it("records nothing to clean when the container cannot be created", async () => {
    const artifacts = new RecordingArtifactPort().failOn("createContainer");
    const engine = new TimedWorkflowEngine({ artifacts, clock: new InstantClock() });

    const run = await engine.run("fast-close");

    expect(run.state).toBe("failed");
    expect(run.cleanup).toEqual([]);
    expect(artifacts.calls).toEqual([`createContainer ${CONTAINER}`]);
  });

  it("reports a close failure as a finalizing failure and still cleans up", async () => {
    const artifacts = new RecordingArtifactPort().failOn("closeIssue", new Error("forbidden"));
    const engine = new TimedWorkflowEngine({ artifacts, clock: new InstantClock() });

    const run = await engine.run("fast-close");

    expect(run.history).toEqual(["idle", "provisioning", "waiting", "finalizing", "cleaning-up", "failed"]);
    expect(run.result).toEqual({
      status: "failure",
      reason: { stage: "finalizing", step: "close-issue", message: "forbidden" },
    });
    expect(run.cleanup.map((status) => describeRef(status.ref))).toEqual([
      `issue #1 in tester/${CONTAINER}`,
      `repository tester/${CONTAINER}`,
    ]);
  });
});

describe("unreviewed-merge workflow", () => {
  const YOLO_CONTAINER = "tester/yolo-badge-1704067200";

  it("merges without waiting and leaves merged content to the repository deletion", async () => {
    const artifacts = new RecordingArtifactPort();
    const clock = new InstantClock();
    const engine = new TimedWorkflowEngine({ artifacts, clock });

    const run = await engine.run("unreviewed-merge");

    expect(run.state).toBe("succeeded");
    expect(clock.sleeps).toEqual([]);
    expect(artifacts.calls).toEqual([
      "createContainer yolo-badge-1704067200",
      "createBranch add-yolo-notes",
      "createFile YOLO.md",
      "createPullRequest Add YOLO notes",
      "mergePullRequest #1 unreviewed=true",
      "discard:pull-request #1",
      `deleteContainer ${YOLO_CONTAINER}`,
    ]);
    expect(run.cleanup.map((status) => [status.ref.kind, status.outcome])).toEqual([
      ["pull-request", "removed"],
      ["file", "skipped"],
      ["branch", "skipped"],
      ["container", "removed"],
    ]);
  });

  it("removes all four handles when the merge is refused", async () => {
    const artifacts = new RecordingArtifactPort().failOn("mergePullRequest", new Error("branch protected"));
    const engine = new TimedWorkflowEngine({ artifacts, clock: new InstantClock() });

    const run = await engine.run("unreviewed-merge");

    expect(run.history).toEqual(["idle", "provisioning", "waiting", "finalizing", "cleaning-up", "failed"]);
    expect(run.result).toEqual({
      status: "failure",
      reason: { stage: "finalizing", step: "merge-pull-request", message: "branch protected" },
    });
    expect(artifacts.calls.slice(5)).toEqual([
      "discard:pull-request #1",
      "discard:file YOLO.md",
      "discard:branch add-yolo-notes",
      `deleteContainer ${YOLO_CONTAINER}`,
    ]);
    expect(run.cleanup.map((status) => status.outcome)).toEqual(["removed", "removed", "removed", "removed"]);
  });

  it("cleans only the container when the branch cannot be created", async () => {
    const artifacts = new RecordingArtifactPort().failOn("createBranch");
    const engine = new TimedWorkflowEngine({ artifacts, clock: new InstantClock() });

    const run = await engine.run("unreviewed-merge");

    expect(run.history).toEqual(["idle", "provisioning", "cleaning-up", "failed"]);
    expect(run.result).toMatchObject({ reason: { stage: "provisioning", step: "create-branch" } });
    expect(run.cleanup.map((status) => describeRef(status.ref))).toEqual([`repository ${YOLO_CONTAINER}`]);
    expect(artifacts.calls.slice(2)).toEqual([`deleteContainer ${YOLO_CONTAINER}`]);
  });

  it("cleans file, branch and container when the pull request cannot be opened", async () => {
    const artifacts = new RecordingArtifactPort().failOn("createPullRequest");
    const engine = new TimedWorkflowEngine({ artifacts, clock: new InstantClock() });

    const run = await engine.run("unreviewed-merge");

    expect(run.result).toMatchObject({ reason: { stage: "provisioning", step: "create-pull-request" } });
    expect(run.createdArtifactRefs.map((ref) => ref.kind)).toEqual(["container", "branch", "file"]);
    expect(artifacts.calls.slice(4)).toEqual([
      "discard:file YOLO.md",
      "discard:branch add-yolo-notes",
      `deleteContainer ${YOLO_CONTAINER}`,
    ]);
  });

  it("tears down branch then container when the file cannot be written", async () => {
    const artifacts = new RecordingArtifactPort().failOn("createFile");
    const engine = new TimedWorkflowEngine({ artifacts, clock: new InstantClock() });

    const run = await engine.run("unreviewed-merge");

    expect(run.history).toEqual(["idle", "provisioning", "cleaning-up", "failed"]);
    expect(run.result).toEqual({
      status: "failure",
      reason: { stage: "provisioning", step: "create-file", message: "createFile rejected" },
    });
    expect(artifacts.calls.slice(3)).toEqual(["discard:branch add-yolo-notes", `deleteContainer ${YOLO_CONTAINER}`]);
  });

  it("keeps going when one cleanup step fails", async () => {
    const artifacts = new RecordingArtifactPort().failOn("discard:pull-request", new Error("locked"));
    const engine = new TimedWorkflowEngine({ artifacts, clock: new InstantClock() });

    const run = await engine.run("unreviewed-merge");

    expect(run.state).toBe("succeeded");
    expect(run.cleanup.map((status) => status.outcome)).toEqual(["failed", "skipped", "skipped", "removed"]);
    expect(run.cleanup[0]).toMatchObject({ outcome: "failed", message: "locked" });
    expect(artifacts.calls[artifacts.calls.length - 1]).toBe(`deleteContainer ${YOLO_CONTAINER}`);
  });
});

describe("TimedWorkflowEngine", () => {
  it("refuses to start a second run while one is active", async () => {
    const engine = new TimedWorkflowEngine({ artifacts: new RecordingArtifactPort(), clock: new InstantClock() });

    const first = engine.run("fast-close");
    await expect(engine.run("unreviewed-merge")).rejects.toBeInstanceOf(WorkflowAlreadyRunningError);
    await expect(first).resolves.toMatchObject({ state: "succeeded" });

    await expect(engine.run("unreviewed-merge")).resolves.toMatchObject({ state: "succeeded" });
  });

  it("reports each transition to the observer", async () => {
    const seen: Array<[WorkflowState, WorkflowState]> = [];
    const engine = new TimedWorkflowEngine({
      artifacts: new RecordingArtifactPort(),
      clock: new InstantClock(),
      onTransition: (_run, from, to) => seen.push([from, to]),
    });

    await engine.runUnreviewedMerge();

    expect(seen).toEqual([
      ["idle", "provisioning"],
      ["provisioning", "waiting"],
      ["waiting", "finalizing"],
      ["finalizing", "cleaning-up"],
      ["cleaning-up", "succeeded"],
    ]);
  });

  it("still cleans up when the observer throws", async () => {
    const artifacts = new RecordingArtifactPort();
    const engine = new TimedWorkflowEngine({
      artifacts,
      clock: new InstantClock(),
      onTransition: (_run, _from, to) => {
        if (to === "waiting") throw new Error("observer boom");
      },
    });

    const run = await engine.run("fast-close");

    expect(run.state).toBe("succeeded");
    expect(artifacts.calls[artifacts.calls.length - 1]).toBe(`deleteContainer tester/${CONTAINER}`);
    expect(console.warn).toHaveBeenCalledWith(
      "[workflow:fast-close] Transition observer failed on provisioning → waiting: observer boom",
    );
  });

  it("fails the run and cleans up when the timer rejects", async () => {
    const artifacts = new RecordingArtifactPort();
    const clock = new InstantClock();
    clock.sleep = async () => Promise.reject(new Error("timer aborted"));
    const engine = new TimedWorkflowEngine({ artifacts, clock });

    const run = await engine.run("fast-close");

    expect(run.history).toEqual(["idle", "provisioning", "waiting", "cleaning-up", "failed"]);
    expect(run.result).toEqual({
      status: "failure",
      reason: { stage: "waiting", step: "sleep", message: "timer aborted" },
    });
    expect(artifacts.calls).toEqual([
      `createContainer ${CONTAINER}`,
      "createIssue Documentation improvement suggestion",
      "discard:issue #1",
      `deleteContainer tester/${CONTAINER}`,
    ]);
  });

  it("never waits for fast-close longer than the window allows", () => {
    const engine = new TimedWorkflowEngine({
      artifacts: new RecordingArtifactPort(),
      fastClose: { delayMs: 10 * 60_000 },
    });
    expect(engine.delayFor("fast-close")).toBe(MAX_WAIT_MS);
    expect(engine.delayFor("unreviewed-merge")).toBe(0);
  });
});

describe("clampDelayMs", () => {
  it("bounds the delay to [0, MAX_WAIT_MS]", () => {
    expect(clampDelayMs(-5)).toBe(0);
    expect(clampDelayMs(Number.NaN)).toBe(0);
    expect(clampDelayMs(1_500.4)).toBe(1_500);
    expect(clampDelayMs(MAX_WAIT_MS + 1)).toBe(MAX_WAIT_MS);
  });
});
