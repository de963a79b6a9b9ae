/**
 * workflow.ts — timed, compensating workflows
 *
 * Both workflow kinds share one state machine:
 *
 *   idle → provisioning → waiting → finalizing → cleaning-up → succeeded | failed
 *                      ↘──────────────────────────↗ (provisioning failure)
 *
 * Every created handle is recorded before the next call is made, so a failure
 * at any step knows exactly what to tear down. Cleanup runs on every path, in
 * reverse creation order, and never throws. A failing timer or transition
 * observer is a workflow failure like any other; it does not skip cleanup.
 */

import { randomUUID } from "crypto";
import type {
  ArtifactRef,
  CleanupStatus,
  CompletedWorkflowRun,
  ContainerHandle,
  TimedWorkflowRun,
  WorkflowFailureReason,
  WorkflowKind,
  WorkflowStage,
  WorkflowResult,
  WorkflowState,
} from "./domain.js";
import {
  CleanupFailure,
  FinalizationFailure,
  ProvisioningFailure,
  WorkflowAlreadyRunningError,
  describeCause,
} from "./errors.js";
import type { ArtifactPort, ClockPort } from "./ports.js";
import { systemClock } from "./clock.js";

// ─── Defaults ────────────────────────────────────────────────────────────────

export const DEFAULT_FAST_CLOSE_DELAY_MS = 30_000;
/** The close has to land inside a five-minute window; leave a minute of slack. */
export const MAX_WAIT_MS = 240_000;

export const DEFAULT_CLOSE_COMMENT =
  "Closing this issue as the suggestion will be implemented in future documentation updates.";

export const DEFAULT_CONTAINER_PREFIXES: Readonly<Record<WorkflowKind, string>> = Object.freeze({
  "fast-close": "quickdraw",
  "unreviewed-merge": "yolo-badge",
});

const ISSUE_DRAFT = {
  title: "Documentation improvement suggestion",
  body: [
    "## Summary",
    "Quick documentation improvement that can be addressed immediately.",
    "",
    "## Action",
    "This issue will be closed as it's addressed by existing documentation.",
    "",
  ].join("\n"),
};

const MERGE_BRANCH = "add-yolo-notes";

const MERGE_FILE = {
  path: "YOLO.md",
  message: "Add YOLO notes",
  content: [
    "# YOLO",
    "",
    "This repository exists to merge a pull request without requesting or waiting for review.",
    "It is deleted as soon as the merge lands.",
    "",
  ].join("\n"),
};

const MERGE_PULL_REQUEST = {
  title: "Add YOLO notes",
  body: "Adds YOLO.md. This pull request is merged without review.",
};

const TRANSITIONS: Readonly<Record<WorkflowState, readonly WorkflowState[]>> = {
  idle: ["provisioning"],
  provisioning: ["waiting", "cleaning-up"],
  waiting: ["finalizing", "cleaning-up"],
  finalizing: ["cleaning-up"],
  "cleaning-up": ["succeeded", "failed"],
  succeeded: [],
  failed: [],
};

// ─── Options ─────────────────────────────────────────────────────────────────

export interface FastCloseOptions {
  delayMs?: number;
  /** Posted before closing. `null` closes without a comment. */
  comment?: string | null;
  containerPrefix?: string;
}

export interface UnreviewedMergeOptions {
  containerPrefix?: string;
}

export type TransitionObserver = (
  run: Readonly<TimedWorkflowRun>,
  from: WorkflowState,
  to: WorkflowState,
) => void;

export interface TimedWorkflowEngineOptions {
  artifacts: ArtifactPort;
  clock?: ClockPort;
  fastClose?: FastCloseOptions;
  unreviewedMerge?: UnreviewedMergeOptions;
  onTransition?: TransitionObserver;
}

export function clampDelayMs(delayMs: number): number {
  if (!Number.isFinite(delayMs) || delayMs <= 0) return 0;
  return Math.min(Math.round(delayMs), MAX_WAIT_MS);
}

class InvalidTransitionError extends Error {
  constructor(from: WorkflowState, to: WorkflowState) {
    super(`Invalid workflow transition: ${from} → ${to}`);
    this.name = "InvalidTransitionError";
  }
}

// ─── Engine ──────────────────────────────────────────────────────────────────

interface Provisioned {
  /** Resolves with the refs the finalize step made moot; cleanup skips those. */
  finalize(): Promise<readonly ArtifactRef[]>;
}

type Settled = { refs: readonly ArtifactRef[]; result: WorkflowResult };

export class TimedWorkflowEngine {
  private readonly artifacts: ArtifactPort;
  private readonly clock: ClockPort;
  private readonly fastCloseDelayMs: number;
  private readonly closeComment: string | null;
  private readonly prefixes: Record<WorkflowKind, string>;
  private readonly onTransition?: TransitionObserver;
  private activeKind: WorkflowKind | null = null;

  constructor(options: TimedWorkflowEngineOptions) {
    this.artifacts = options.artifacts;
    this.clock = options.clock ?? systemClock;
    this.fastCloseDelayMs = clampDelayMs(options.fastClose?.delayMs ?? DEFAULT_FAST_CLOSE_DELAY_MS);
    this.closeComment =
      options.fastClose?.comment === undefined ? DEFAULT_CLOSE_COMMENT : options.fastClose.comment;
    this.prefixes = {
      "fast-close": options.fastClose?.containerPrefix ?? DEFAULT_CONTAINER_PREFIXES["fast-close"],
      "unreviewed-merge":
        options.unreviewedMerge?.containerPrefix ?? DEFAULT_CONTAINER_PREFIXES["unreviewed-merge"],
    };
    this.onTransition = options.onTransition;
  }

  delayFor(kind: WorkflowKind): number {
    return kind === "fast-close" ? this.fastCloseDelayMs : 0;
  }

  async run(kind: WorkflowKind): Promise<CompletedWorkflowRun> {
    if (this.activeKind !== null) throw new WorkflowAlreadyRunningError(this.activeKind);
    this.activeKind = kind;
    try {
      return await this.execute(kind);
    } finally {
      this.activeKind = null;
    }
  }

  runFastClose(): Promise<CompletedWorkflowRun> {
    return this.run("fast-close");
  }

  runUnreviewedMerge(): Promise<CompletedWorkflowRun> {
    return this.run("unreviewed-merge");
  }

  private async execute(kind: WorkflowKind): Promise<CompletedWorkflowRun> {
    const run: TimedWorkflowRun = {
      runId: randomUUID(),
      kind,
      state: "idle",
      history: ["idle"],
      createdArtifactRefs: [],
      startedAt: this.clock.now().toISOString(),
      result: null,
      cleanup: [],
    };
    const tag = `[workflow:${kind}]`;
    let settled: Settled;

    this.transition(run, "provisioning");
    const provisioning = await this.provision(run).then(
      (provisioned) => ({ ok: true as const, provisioned }),
      (error: unknown) => ({ ok: false as const, reason: failureReason(error, "provisioning") }),
    );

    if (provisioning.ok) {
      settled = await this.waitAndFinalize(run, provisioning.provisioned);
    } else {
      settled = { refs: [], result: { status: "failure", reason: provisioning.reason } };
      console.error(`${tag} Provisioning failed at ${provisioning.reason.step}: ${provisioning.reason.message}`);
    }

    const { result } = settled;
    run.result = result;
    this.transition(run, "cleaning-up");
    run.cleanup = await this.cleanUp(run, settled.refs);

    const terminal = result.status === "success" ? "succeeded" : "failed";
    this.transition(run, terminal);
    const finishedAt = this.clock.now().toISOString();
    run.finishedAt = finishedAt;

    return { ...run, state: terminal, finishedAt, result };
  }

  /** Everything between provisioning and cleanup; failures come back as a result. */
  private async waitAndFinalize(run: TimedWorkflowRun, provisioned: Provisioned): Promise<Settled> {
    const tag = `[workflow:${run.kind}]`;
    const fail = (error: unknown, stage: WorkflowStage, step: string): Settled => {
      const reason = failureReason(error, stage, step);
      console.error(`${tag} ${stage === "waiting" ? "Waiting" : "Finalizing"} failed: ${reason.message}`);
      return { refs: [], result: { status: "failure", reason } };
    };

    this.transition(run, "waiting");
    const delayMs = this.delayFor(run.kind);
    if (delayMs > 0) {
      console.log(`${tag} Waiting ${Math.round(delayMs / 1000)}s before finalizing...`);
      try {
        await this.clock.sleep(delayMs);
      } catch (error: unknown) {
        return fail(error, "waiting", "sleep");
      }
    }

    this.transition(run, "finalizing");
    try {
      const refs = await provisioned.finalize();
      return { refs, result: { status: "success" } };
    } catch (error: unknown) {
      return fail(error, "finalizing", "unknown");
    }
  }

  private provision(run: TimedWorkflowRun): Promise<Provisioned> {
    return run.kind === "fast-close" ? this.provisionFastClose(run) : this.provisionUnreviewedMerge(run);
  }

  private transition(run: TimedWorkflowRun, to: WorkflowState): void {
    const from = run.state;
    if (!TRANSITIONS[from].includes(to)) throw new InvalidTransitionError(from, to);
    run.state = to;
    run.history.push(to);
    if (!this.onTransition) return;
    try {
      this.onTransition(run, from, to);
    } catch (error: unknown) {
      console.warn(`[workflow:${run.kind}] Transition observer failed on ${from} → ${to}: ${describeCause(error)}`);
    }
  }

  private containerName(kind: WorkflowKind): string {
    return `${this.prefixes[kind]}-${Math.floor(this.clock.now().getTime() / 1000)}`;
  }

  private async createContainer(run: TimedWorkflowRun, description: string): Promise<ContainerHandle> {
    const container = await provisioningStep(run.kind, "create-container", () =>
      this.artifacts.createContainer(this.containerName(run.kind), description),
    );
    run.createdArtifactRefs.push({ kind: "container", handle: container });
    console.log(`[workflow:${run.kind}] Created repository ${container.fullName}`);
    return container;
  }

  private async provisionFastClose(run: TimedWorkflowRun): Promise<Provisioned> {
    const container = await this.createContainer(run, "Temporary repository for earning Quickdraw badge");

    const issue = await provisioningStep(run.kind, "create-issue", () =>
      this.artifacts.createIssue(container, ISSUE_DRAFT),
    );
    run.createdArtifactRefs.push({ kind: "issue", handle: issue });
    console.log(`[workflow:${run.kind}] Created issue #${issue.number}`);

    return {
      finalize: async () => {
        const comment = this.closeComment;
        if (comment) {
          await finalizationStep(run.kind, "comment-issue", () =>
            this.artifacts.commentOnIssue(issue, comment),
          );
        }
        await finalizationStep(run.kind, "close-issue", () => this.artifacts.closeIssue(issue));
        console.log(`[workflow:${run.kind}] Closed issue #${issue.number}`);
        return [];
      },
    };
  }

  private async provisionUnreviewedMerge(run: TimedWorkflowRun): Promise<Provisioned> {
    const container = await this.createContainer(run, "Temporary repository for earning YOLO badge");

    const branch = await provisioningStep(run.kind, "create-branch", () =>
      this.artifacts.createBranch(container, MERGE_BRANCH),
    );
    const branchRef: ArtifactRef = { kind: "branch", handle: branch };
    run.createdArtifactRefs.push(branchRef);

    const file = await provisioningStep(run.kind, "create-file", () =>
      this.artifacts.createFile(branch, MERGE_FILE),
    );
    const fileRef: ArtifactRef = { kind: "file", handle: file };
    run.createdArtifactRefs.push(fileRef);

    const pullRequest = await provisioningStep(run.kind, "create-pull-request", () =>
      this.artifacts.createPullRequest(branch, MERGE_PULL_REQUEST),
    );
    run.createdArtifactRefs.push({ kind: "pull-request", handle: pullRequest });
    console.log(`[workflow:${run.kind}] Opened pull request #${pullRequest.number}`);

    return {
      finalize: async () => {
        await finalizationStep(run.kind, "merge-pull-request", () =>
          this.artifacts.mergePullRequest(pullRequest, {
            allowUnreviewed: true,
            commitMessage: "Merge unreviewed pull request",
          }),
        );
        console.log(`[workflow:${run.kind}] Merged pull request #${pullRequest.number} without review`);
        // Once merged, deleting the file would only push another commit; the
        // repository deletion removes both.
        return [fileRef, branchRef];
      },
    };
  }

  private async cleanUp(run: TimedWorkflowRun, moot: readonly ArtifactRef[]): Promise<CleanupStatus[]> {
    const statuses: CleanupStatus[] = [];
    for (const ref of [...run.createdArtifactRefs].reverse()) {
      if (moot.includes(ref)) {
        statuses.push({ ref, outcome: "skipped", reason: "merged; removed with the repository" });
        continue;
      }
      try {
        if (ref.kind === "container") {
          await this.artifacts.deleteContainer(ref.handle);
        } else {
          await this.artifacts.discardArtifact(ref);
        }
        statuses.push({ ref, outcome: "removed" });
      } catch (error: unknown) {
        const failure = new CleanupFailure(describeRef(ref), error);
        console.warn(`[workflow:${run.kind}] ${failure.message}`);
        statuses.push({ ref, outcome: "failed", message: describeCause(error) });
      }
    }
    return statuses;
  }
}

// ─── Step helpers ────────────────────────────────────────────────────────────

async function provisioningStep<T>(kind: WorkflowKind, step: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error: unknown) {
    throw new ProvisioningFailure(kind, step, error);
  }
}

async function finalizationStep<T>(kind: WorkflowKind, step: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error: unknown) {
    throw new FinalizationFailure(kind, step, error);
  }
}

function failureReason(
  error: unknown,
  fallbackStage: WorkflowStage,
  fallbackStep = "unknown",
): WorkflowFailureReason {
  if (error instanceof ProvisioningFailure || error instanceof FinalizationFailure) {
    return { stage: error.stage, step: error.step, message: describeCause(error.cause) };
  }
  return { stage: fallbackStage, step: fallbackStep, message: describeCause(error) };
}

export function describeRef(ref: ArtifactRef): string {
  switch (ref.kind) {
    case "container":
      return `repository ${ref.handle.fullName}`;
    case "issue":
      return `issue #${ref.handle.number} in ${ref.handle.container.fullName}`;
    case "branch":
      return `branch ${ref.handle.name} in ${ref.handle.container.fullName}`;
    case "file":
      return `file ${ref.handle.path} on ${ref.handle.branch.name}`;
    case "pull-request":
      return `pull request #${ref.handle.number} in ${ref.handle.container.fullName}`;
  }
}
