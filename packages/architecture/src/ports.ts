import type {
  ArtifactRef,
  BranchHandle,
  ContainerHandle,
  FileDraft,
  FileHandle,
  IssueDraft,
  IssueHandle,
  PullRequestDraft,
  PullRequestHandle,
  Unknown,
} from "./domain.js";

/**
 * Read-only queries against the hosted service. Implementations return
 * "unknown" for signals the service does not expose and throw for transient
 * failures (network, rate limit); the progress model downgrades both.
 */
export interface MetricSourcePort {
  countMergedPullRequests(actor: string): Promise<number | Unknown>;
  countDistinctRepositoriesWithMergedPullRequests(actor: string): Promise<number | Unknown>;
  maxStarsAcrossOwnedPublicRepositories(actor: string): Promise<number | Unknown>;
  countFastClosedIssues(actor: string): Promise<number | Unknown>;
  countCoAuthoredCommitsInMergedPullRequests(actor: string): Promise<number | Unknown>;
  countAcceptedDiscussionAnswers(actor: string): Promise<number | Unknown>;
  countUnreviewedMergedPullRequests(actor: string): Promise<number | Unknown>;
  hasActiveSponsorship(actor: string): Promise<boolean | Unknown>;
}

export interface MergeOptions {
  allowUnreviewed: true;
  commitMessage?: string;
}

/** Lifecycle of the throwaway resources a timed workflow creates. */
export interface ArtifactPort {
  createContainer(name: string, description: string): Promise<ContainerHandle>;
  deleteContainer(container: ContainerHandle): Promise<void>;

  createIssue(container: ContainerHandle, draft: IssueDraft): Promise<IssueHandle>;
  commentOnIssue(issue: IssueHandle, body: string): Promise<void>;
  closeIssue(issue: IssueHandle): Promise<void>;

  createBranch(container: ContainerHandle, name: string): Promise<BranchHandle>;
  createFile(branch: BranchHandle, draft: FileDraft): Promise<FileHandle>;
  createPullRequest(branch: BranchHandle, draft: PullRequestDraft): Promise<PullRequestHandle>;
  mergePullRequest(pullRequest: PullRequestHandle, options: MergeOptions): Promise<void>;

  /** Undo one dependent artifact. Containers go through deleteContainer. */
  discardArtifact(ref: Exclude<ArtifactRef, { kind: "container" }>): Promise<void>;
}

export interface ClockPort {
  now(): Date;
  sleep(ms: number): Promise<void>;
}
