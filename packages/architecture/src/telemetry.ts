/**
 * telemetry.ts — structured telemetry for progress checks and workflow runs
 *
 * Append-only JSONL. Every emission is fire-and-forget: a telemetry write
 * must never throw into, or change the outcome of, the calling code path.
 * Nothing is written unless a path is configured.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import type {
  AchievementProgress,
  CleanupStatus,
  CompletedWorkflowRun,
  EarningPlan,
  EarningPlanBucket,
  WorkflowKind,
  WorkflowStage,
  WorkflowState,
} from "./domain.js";
import { describeRef } from "./workflow.js";

export interface ProgressCheckedTelemetryData {
  actor: string;
  achieved: number;
  total: number;
  unknown: number;
  readings: Array<{ name: string; status: "observed" | "unknown"; value: number | null }>;
}

export interface PlanBuiltTelemetryData {
  actor: string;
  counts: Record<EarningPlanBucket, number>;
}

export interface WorkflowTransitionTelemetryData {
  runId: string;
  kind: WorkflowKind;
  from: WorkflowState;
  to: WorkflowState;
}

export interface WorkflowCompletedTelemetryData {
  runId: string;
  kind: WorkflowKind;
  state: "succeeded" | "failed";
  durationMs: number;
  artifactsCreated: number;
  cleanupFailures: number;
  failureStage?: WorkflowStage;
  failureStep?: string;
  failureMessage?: string;
}

export interface CleanupFailedTelemetryData {
  runId: string;
  kind: WorkflowKind;
  target: string;
  message: string;
}

export interface TelemetryDataMap {
  progress_checked: ProgressCheckedTelemetryData;
  plan_built: PlanBuiltTelemetryData;
  workflow_transition: WorkflowTransitionTelemetryData;
  workflow_completed: WorkflowCompletedTelemetryData;
  cleanup_failed: CleanupFailedTelemetryData;
}

export type TelemetryEventType = keyof TelemetryDataMap;

let warnedPaths = new Set<string>();

export function emitTelemetry<K extends TelemetryEventType>(
  filePath: string | undefined,
  type: K,
  data: TelemetryDataMap[K],
): void {
  if (!filePath) return;
  try {
    mkdirSync(dirname(filePath), { recursive: true });
    appendFileSync(filePath, JSON.stringify({ timestamp: new Date().toISOString(), type, data }) + "\n");
  } catch (error: unknown) {
    // Warn once per path so a read-only location doesn't flood the output.
    if (!warnedPaths.has(filePath)) {
      warnedPaths.add(filePath);
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[telemetry] Could not write ${filePath}: ${message}`);
    }
  }
}

export function resetTelemetryWarnings(): void {
  warnedPaths = new Set<string>();
}

export function emitProgressChecked(
  filePath: string | undefined,
  actor: string,
  progressList: readonly AchievementProgress[],
): void {
  if (!filePath) return;
  emitTelemetry(filePath, "progress_checked", {
    actor,
    achieved: progressList.filter((p) => p.achievedTier !== null).length,
    total: progressList.length,
    unknown: progressList.filter((p) => p.reading.value.status === "unknown").length,
    readings: progressList.map((p) => ({
      name: p.definition.name,
      status: p.reading.value.status,
      value: p.reading.value.status === "observed" ? p.reading.value.value : null,
    })),
  });
}

export function emitPlanBuilt(filePath: string | undefined, plan: EarningPlan): void {
  emitTelemetry(filePath, "plan_built", {
    actor: plan.actor,
    counts: {
      completed: plan.entries.completed.length,
      immediate: plan.entries.immediate.length,
      quick: plan.entries.quick.length,
      shortTerm: plan.entries.shortTerm.length,
      longTerm: plan.entries.longTerm.length,
    },
  });
}

export function emitWorkflowTransition(
  filePath: string | undefined,
  data: WorkflowTransitionTelemetryData,
): void {
  emitTelemetry(filePath, "workflow_transition", data);
}

export function emitWorkflowCompleted(filePath: string | undefined, run: CompletedWorkflowRun): void {
  if (!filePath) return;
  const failures = run.cleanup.filter(
    (status): status is Extract<CleanupStatus, { outcome: "failed" }> => status.outcome === "failed",
  );
  for (const status of failures) {
    emitTelemetry(filePath, "cleanup_failed", {
      runId: run.runId,
      kind: run.kind,
      target: describeRef(status.ref),
      message: status.message,
    });
  }

  const data: WorkflowCompletedTelemetryData = {
    runId: run.runId,
    kind: run.kind,
    state: run.state,
    durationMs: Date.parse(run.finishedAt) - Date.parse(run.startedAt),
    artifactsCreated: run.createdArtifactRefs.length,
    cleanupFailures: failures.length,
  };
  if (run.result.status === "failure") {
    data.failureStage = run.result.reason.stage;
    data.failureStep = run.result.reason.step;
    data.failureMessage = run.result.reason.message;
  }
  emitTelemetry(filePath, "workflow_completed", data);
}

// ─── Reading ─────────────────────────────────────────────────────────────────

const eventEnvelopeSchema = z.object({
  timestamp: z.string(),
  type: z.enum(["progress_checked", "plan_built", "workflow_transition", "workflow_completed", "cleanup_failed"]),
  data: z.record(z.unknown()),
});

export type TelemetryEnvelope = z.infer<typeof eventEnvelopeSchema>;

/** Parses a telemetry log, skipping malformed lines. */
export function readTelemetry(filePath: string): TelemetryEnvelope[] {
  if (!existsSync(filePath)) return [];
  const events: TelemetryEnvelope[] = [];
  for (const line of readFileSync(filePath, "utf-8").split("\n")) {
    if (!line.trim()) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      continue;
    }
    const result = eventEnvelopeSchema.safeParse(parsed);
    if (result.success) events.push(result.data);
  }
  return events;
}
