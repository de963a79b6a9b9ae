/**
 * helpers.ts — Shared test factories and in-process fakes
 */

import { classifyValue, definitionOf } from "../index.js";
import type {
  AchievementDefinition,
  AchievementProgress,
  ArtifactPort,
  ArtifactRef,
  BranchHandle,
  ClockPort,
  ContainerHandle,
  FileDraft,
  FileHandle,
  IssueDraft,
  IssueHandle,
  MergeOptions,
  MetricKind,
  MetricSourcePort,
  MetricValue,
  PullRequestDraft,
  PullRequestHandle,
  Tier,
  Unknown,
} from "../index.js";

export const TEST_ACTOR = "test-user";
export const START = new Date("2024-01-01T00:00:00.000Z");

// ─── Clock ───────────────────────────────────────────────────────────────────

/** Never waits; each sleep advances the clock and is recorded. */
export class InstantClock implements ClockPort {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start: Date = START) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

// ─── Metric source ───────────────────────────────────────────────────────────

type CountKind = Exclude<MetricKind, "activeSponsorship">;

export type MetricScript = Partial<Record<CountKind, number | Unknown | Error>> & {
  activeSponsorship?: boolean | Unknown | Error;
};

/** Unscripted counts read 0; unscripted sponsorship reads false. */
export class FakeMetricSource implements MetricSourcePort {
  readonly calls: MetricKind[] = [];
  private readonly script: MetricScript;

  constructor(script: MetricScript = {}) {
    this.script = script;
  }

  private async count(kind: CountKind): Promise<number | Unknown> {
    this.calls.push(kind);
    const value = this.script[kind];
    if (value instanceof Error) throw value;
    return value ?? 0;
  }

  countMergedPullRequests(): Promise<number | Unknown> {
    return this.count("mergedPullRequests");
  }

  countDistinctRepositoriesWithMergedPullRequests(): Promise<number | Unknown> {
    return this.count("repositoriesWithMergedPullRequests");
  }

  maxStarsAcrossOwnedPublicRepositories(): Promise<number | Unknown> {
    return this.count("maxStars");
  }

  countFastClosedIssues(): Promise<number | Unknown> {
    return this.count("fastClosedIssues");
  }

  countCoAuthoredCommitsInMergedPullRequests(): Promise<number | Unknown> {
    return this.count("coAuthoredCommits");
  }

  countAcceptedDiscussionAnswers(): Promise<number | Unknown> {
    return this.count("acceptedDiscussionAnswers");
  }

  countUnreviewedMergedPullRequests(): Promise<number | Unknown> {
    return this.count("unreviewedMergedPullRequests");
  }

  async hasActiveSponsorship(): Promise<boolean | Unknown> {
    this.calls.push("activeSponsorship");
    const value = this.script.activeSponsorship;
    if (value instanceof Error) throw value;
    return value ?? false;
  }
}

// ─── Artifact port ───────────────────────────────────────────────────────────

export type ArtifactOperation = Exclude<keyof ArtifactPort, "discardArtifact"> | `discard:${ArtifactRef["kind"]}`;

/**
 * Records every call as one line ("createContainer quickdraw-1704067200")
 * and fails the operations it is told to.
 */
export class RecordingArtifactPort implements ArtifactPort {
  readonly calls: string[] = [];
  private readonly failures = new Map<ArtifactOperation, Error>();
  private nextNumber = 1;

  failOn(operation: ArtifactOperation, error: Error = new Error(`${operation} rejected`)): this {
    this.failures.set(operation, error);
    return this;
  }

  private record(operation: ArtifactOperation, detail: string): void {
    this.calls.push(`${operation} ${detail}`);
    const failure = this.failures.get(operation);
    if (failure) throw failure;
  }

  async createContainer(name: string): Promise<ContainerHandle> {
    this.record("createContainer", name);
    return { fullName: `tester/${name}`, defaultBranch: "main" };
  }

  async deleteContainer(container: ContainerHandle): Promise<void> {
    this.record("deleteContainer", container.fullName);
  }

  async createIssue(container: ContainerHandle, draft: IssueDraft): Promise<IssueHandle> {
    this.record("createIssue", draft.title);
    return { container, number: this.nextNumber++ };
  }

  async commentOnIssue(issue: IssueHandle): Promise<void> {
    this.record("commentOnIssue", `#${issue.number}`);
  }

  async closeIssue(issue: IssueHandle): Promise<void> {
    this.record("closeIssue", `#${issue.number}`);
  }

  async createBranch(container: ContainerHandle, name: string): Promise<BranchHandle> {
    this.record("createBranch", name);
    return { container, name, sha: "sha-branch" };
  }

  async createFile(branch: BranchHandle, draft: FileDraft): Promise<FileHandle> {
    this.record("createFile", draft.path);
    return { branch, path: draft.path, sha: "sha-file" };
  }

  async createPullRequest(branch: BranchHandle, draft: PullRequestDraft): Promise<PullRequestHandle> {
    this.record("createPullRequest", draft.title);
    return { container: branch.container, number: this.nextNumber++, head: branch.name };
  }

  async mergePullRequest(pullRequest: PullRequestHandle, options: MergeOptions): Promise<void> {
    this.record("mergePullRequest", `#${pullRequest.number} unreviewed=${String(options.allowUnreviewed)}`);
  }

  async discardArtifact(ref: Exclude<ArtifactRef, { kind: "container" }>): Promise<void> {
    const detail =
      ref.kind === "issue" || ref.kind === "pull-request"
        ? `#${ref.handle.number}`
        : ref.kind === "branch"
          ? ref.handle.name
          : ref.handle.path;
    this.record(`discard:${ref.kind}`, detail);
  }
}

// ─── Progress factories ──────────────────────────────────────────────────────

export function makeDefinition(overrides: Partial<AchievementDefinition> = {}): AchievementDefinition {
  const tiers: Tier[] = [
    { label: "Default", threshold: 1 },
    { label: "Bronze", threshold: 16 },
    { label: "Silver", threshold: 128 },
    { label: "Gold", threshold: 1024 },
  ];
  return {
    name: "Pull Shark",
    description: "Open pull requests that get merged",
    tiers,
    metricKind: "mergedPullRequests",
    ...overrides,
  };
}

export function observed(value: number): MetricValue {
  return { status: "observed", value };
}

export function unknownValue(detail = "not exposed"): MetricValue {
  return { status: "unknown", cause: "unobservable", detail };
}

export function makeProgress(
  definition: AchievementDefinition | string,
  value: number | MetricValue,
): AchievementProgress {
  const resolved = typeof definition === "string" ? definitionOf(definition) : definition;
  const metricValue = typeof value === "number" ? observed(value) : value;
  return {
    definition: resolved,
    reading: { achievementName: resolved.name, value: metricValue, asOf: START.toISOString() },
    ...classifyValue(resolved, metricValue),
  };
}
