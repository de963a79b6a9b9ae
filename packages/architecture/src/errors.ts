import type { AchievementName, MetricKind, WorkflowKind, WorkflowStage } from "./domain.js";

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export class TransientQueryFailure extends Error {
  readonly metricKind: MetricKind;

  constructor(metricKind: MetricKind, cause: unknown) {
    super(`${metricKind} query failed: ${describeCause(cause)}`, { cause });
    this.name = "TransientQueryFailure";
    this.metricKind = metricKind;
  }
}

export class UnobservableMetric extends Error {
  readonly metricKind: MetricKind;

  constructor(metricKind: MetricKind) {
    super(`${metricKind} is not exposed by the service`);
    this.name = "UnobservableMetric";
    this.metricKind = metricKind;
  }
}

abstract class WorkflowStepFailure extends Error {
  abstract readonly stage: WorkflowStage;
  readonly kind: WorkflowKind;
  readonly step: string;

  constructor(kind: WorkflowKind, step: string, cause: unknown) {
    super(`${kind} ${step} failed: ${describeCause(cause)}`, { cause });
    this.kind = kind;
    this.step = step;
  }
}

export class ProvisioningFailure extends WorkflowStepFailure {
  readonly stage = "provisioning" as const;

  constructor(kind: WorkflowKind, step: string, cause: unknown) {
    super(kind, step, cause);
    this.name = "ProvisioningFailure";
  }
}

export class FinalizationFailure extends WorkflowStepFailure {
  readonly stage = "finalizing" as const;

  constructor(kind: WorkflowKind, step: string, cause: unknown) {
    super(kind, step, cause);
    this.name = "FinalizationFailure";
  }
}

export class CleanupFailure extends Error {
  readonly target: string;

  constructor(target: string, cause: unknown) {
    super(`cleanup of ${target} failed: ${describeCause(cause)}`, { cause });
    this.name = "CleanupFailure";
    this.target = target;
  }
}

export class InvalidCoauthorError extends Error {
  readonly input: string;

  constructor(input: string, problem: string) {
    super(`Invalid co-author "${input}": ${problem}`);
    this.name = "InvalidCoauthorError";
    this.input = input;
  }
}

export class UnknownAchievementError extends Error {
  readonly achievementName: string;

  constructor(achievementName: string) {
    super(`Unknown achievement: "${achievementName}"`);
    this.name = "UnknownAchievementError";
    this.achievementName = achievementName;
  }
}

export class CatalogueInvariantError extends Error {
  readonly achievementName: AchievementName;

  constructor(achievementName: AchievementName, message: string) {
    super(`${achievementName}: ${message}`);
    this.name = "CatalogueInvariantError";
    this.achievementName = achievementName;
  }
}

export class WorkflowAlreadyRunningError extends Error {
  readonly activeKind: WorkflowKind;

  constructor(activeKind: WorkflowKind) {
    super(`A ${activeKind} workflow is already running; runs do not overlap`);
    this.name = "WorkflowAlreadyRunningError";
    this.activeKind = activeKind;
  }
}
