export type ISODateTime = string;

// ─── Catalogue ───────────────────────────────────────────────────────────────

export type AchievementName =
  | "Heart On Your Sleeve"
  | "Open Sourcerer"
  | "Starstruck"
  | "Quickdraw"
  | "Pair Extraordinaire"
  | "Pull Shark"
  | "Galaxy Brain"
  | "YOLO"
  | "Public Sponsor";

export type TierLabel = "Default" | "Bronze" | "Silver" | "Gold";

export type MetricKind =
  | "mergedPullRequests"
  | "repositoriesWithMergedPullRequests"
  | "maxStars"
  | "fastClosedIssues"
  | "coAuthoredCommits"
  | "acceptedDiscussionAnswers"
  | "unreviewedMergedPullRequests"
  | "activeSponsorship";

export interface Tier {
  label: TierLabel;
  threshold: number;
}

export interface AchievementDefinition {
  readonly name: AchievementName;
  readonly description: string;
  /** Ascending by threshold. */
  readonly tiers: readonly Tier[];
  readonly metricKind: MetricKind;
}

// ─── Readings & progress ─────────────────────────────────────────────────────

export const UNKNOWN = "unknown" as const;
export type Unknown = typeof UNKNOWN;

export type UnknownCause = "unobservable" | "transient-failure";

export type MetricValue =
  | { status: "observed"; value: number }
  | { status: "unknown"; cause: UnknownCause; detail: string };

export interface MetricReading {
  achievementName: AchievementName;
  value: MetricValue;
  asOf: ISODateTime;
}

export interface NextTier {
  label: TierLabel;
  threshold: number;
  remaining: number;
}

export interface AchievementProgress {
  readonly definition: AchievementDefinition;
  readonly reading: MetricReading;
  readonly achievedTier: TierLabel | null;
  readonly nextTier: NextTier | null;
}

// ─── Planning ────────────────────────────────────────────────────────────────

export type CapabilityClass = "immediate" | "quick" | "shortTerm" | "longTerm";
export type EarningPlanBucket = "completed" | CapabilityClass;

export const EARNING_PLAN_BUCKETS: readonly EarningPlanBucket[] = [
  "completed",
  "immediate",
  "quick",
  "shortTerm",
  "longTerm",
];

export type EarningPlanBuckets = Record<EarningPlanBucket, AchievementProgress[]>;

export type PlanGuidance =
  | { kind: "automated"; workflow: WorkflowKind }
  | { kind: "manual-steps"; steps: string[] }
  | { kind: "tool-hint"; hint: string; command: string }
  | { kind: "strategy"; strategy: string; command?: string }
  | { kind: "none" };

export interface PlanEntry {
  progress: AchievementProgress;
  bucket: EarningPlanBucket;
  automated: boolean;
  guidance: PlanGuidance;
}

export interface EarningPlan {
  actor: string;
  builtAt: ISODateTime;
  entries: Record<EarningPlanBucket, PlanEntry[]>;
}

// ─── Timed workflows ─────────────────────────────────────────────────────────

export type WorkflowKind = "fast-close" | "unreviewed-merge";

export type WorkflowState =
  | "idle"
  | "provisioning"
  | "waiting"
  | "finalizing"
  | "cleaning-up"
  | "succeeded"
  | "failed";

export type TerminalWorkflowState = Extract<WorkflowState, "succeeded" | "failed">;

export interface ContainerHandle {
  /** owner/name */
  fullName: string;
  defaultBranch: string;
  url?: string;
}

export interface IssueHandle {
  container: ContainerHandle;
  number: number;
  url?: string;
}

export interface BranchHandle {
  container: ContainerHandle;
  name: string;
  sha: string;
}

export interface FileHandle {
  branch: BranchHandle;
  path: string;
  sha: string;
}

export interface PullRequestHandle {
  container: ContainerHandle;
  number: number;
  head: string;
  url?: string;
}

export type ArtifactRef =
  | { kind: "container"; handle: ContainerHandle }
  | { kind: "issue"; handle: IssueHandle }
  | { kind: "branch"; handle: BranchHandle }
  | { kind: "file"; handle: FileHandle }
  | { kind: "pull-request"; handle: PullRequestHandle };

export type WorkflowStage = "provisioning" | "waiting" | "finalizing";

export interface WorkflowFailureReason {
  stage: WorkflowStage;
  step: string;
  message: string;
}

export type WorkflowResult =
  | { status: "success" }
  | { status: "failure"; reason: WorkflowFailureReason };

export type CleanupStatus =
  | { ref: ArtifactRef; outcome: "removed" }
  | { ref: ArtifactRef; outcome: "skipped"; reason: string }
  | { ref: ArtifactRef; outcome: "failed"; message: string };

export interface TimedWorkflowRun {
  runId: string;
  kind: WorkflowKind;
  state: WorkflowState;
  history: WorkflowState[];
  createdArtifactRefs: ArtifactRef[];
  startedAt: ISODateTime;
  finishedAt?: ISODateTime;
  /** Null until the run leaves provisioning or finalizing. */
  result: WorkflowResult | null;
  cleanup: CleanupStatus[];
}

export interface CompletedWorkflowRun extends TimedWorkflowRun {
  state: TerminalWorkflowState;
  finishedAt: ISODateTime;
  result: WorkflowResult;
}

// ─── Drafts handed to the artifact port ──────────────────────────────────────

export interface IssueDraft {
  title: string;
  body: string;
}

export interface FileDraft {
  path: string;
  content: string;
  message: string;
}

export interface PullRequestDraft {
  title: string;
  body: string;
}
