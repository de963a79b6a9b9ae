/**
 * telemetry.test.ts — JSONL event log
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { existsSync, mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  TimedWorkflowEngine,
  buildEarningPlan,
  emitPlanBuilt,
  emitProgressChecked,
  emitTelemetry,
  emitWorkflowCompleted,
  readTelemetry,
  resetTelemetryWarnings,
} from "../index.js";
import { InstantClock, RecordingArtifactPort, START, TEST_ACTOR, makeProgress, unknownValue } from "./helpers.js";

function tempLog(): string {
  return join(mkdtempSync(join(tmpdir(), "badge-telemetry-")), "events.jsonl");
}

afterEach(() => {
  vi.restoreAllMocks();
  resetTelemetryWarnings();
});

describe("emitTelemetry", () => {
  it("writes nothing without a path", () => {
    const path = tempLog();
    emitProgressChecked(undefined, TEST_ACTOR, [makeProgress("YOLO", 0)]);
    expect(existsSync(path)).toBe(false);
  });

  it("appends one line per event", () => {
    const path = tempLog();
    emitProgressChecked(path, TEST_ACTOR, [makeProgress("Pull Shark", 20), makeProgress("YOLO", unknownValue())]);
    emitPlanBuilt(path, buildEarningPlan(TEST_ACTOR, [makeProgress("YOLO", 0)], { now: START }));

    const events = readTelemetry(path);
    expect(events.map((e) => e.type)).toEqual(["progress_checked", "plan_built"]);
    expect(events[0].data).toEqual({
      actor: TEST_ACTOR,
      achieved: 1,
      total: 2,
      unknown: 1,
      readings: [
        { name: "Pull Shark", status: "observed", value: 20 },
        { name: "YOLO", status: "unknown", value: null },
      ],
    });
    expect(events[1].data).toEqual({
      actor: TEST_ACTOR,
      counts: { completed: 0, immediate: 1, quick: 0, shortTerm: 0, longTerm: 0 },
    });
  });

  it("warns once and does not throw when the path is unwritable", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const blocker = tempLog();
    writeFileSync(blocker, "not a directory");
    const path = join(blocker, "nested", "events.jsonl");

    expect(() => emitTelemetry(path, "plan_built", { actor: TEST_ACTOR, counts: { completed: 0, immediate: 0, quick: 0, shortTerm: 0, longTerm: 0 } })).not.toThrow();
    emitPlanBuilt(path, buildEarningPlan(TEST_ACTOR, [], { now: START }));

    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("emitWorkflowCompleted", () => {
  it("logs cleanup failures before the completion event", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const path = tempLog();
    const artifacts = new RecordingArtifactPort().failOn("deleteContainer", new Error("admin rights required"));
    const run = await new TimedWorkflowEngine({ artifacts, clock: new InstantClock() }).run("fast-close");

    emitWorkflowCompleted(path, run);

    const events = readTelemetry(path);
    expect(events.map((e) => e.type)).toEqual(["cleanup_failed", "workflow_completed"]);
    expect(events[0].data).toEqual({
      runId: run.runId,
      kind: "fast-close",
      target: "repository tester/quickdraw-1704067200",
      message: "admin rights required",
    });
    expect(events[1].data).toEqual({
      runId: run.runId,
      kind: "fast-close",
      state: "succeeded",
      durationMs: 30_000,
      artifactsCreated: 2,
      cleanupFailures: 1,
    });
  });
});

describe("readTelemetry", () => {
  it("skips malformed lines", () => {
    const path = tempLog();
    writeFileSync(
      path,
      [
        "not json",
        JSON.stringify({ timestamp: START.toISOString(), type: "unexpected", data: {} }),
        JSON.stringify({ timestamp: START.toISOString(), type: "plan_built", data: { actor: TEST_ACTOR } }),
        "",
      ].join("\n"),
    );
    expect(readTelemetry(path)).toEqual([
      { timestamp: START.toISOString(), type: "plan_built", data: { actor: TEST_ACTOR } },
    ]);
  });

  it("returns an empty list for a missing file", () => {
    expect(readTelemetry(tempLog())).toEqual([]);
  });
});
