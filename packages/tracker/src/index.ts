#!/usr/bin/env node
/**
 * @badge-engine/tracker
 *
 * Command-line front end: checks GitHub achievement progress, plans what to
 * earn next, runs the two timed workflows (Quickdraw, YOLO) against
 * throwaway repositories, and helps with the tool-assisted badges. Talks to
 * GitHub through an authenticated `gh`.
 *
 * Usage:
 *   badge-engine check [--format text|json] [--output <file>]
 *   badge-engine summary
 *   badge-engine plan
 *   badge-engine earn [--execute] [--verify]
 *   badge-engine quickdraw [--delay <seconds>]
 *   badge-engine yolo
 *   badge-engine find-repos [--language <lang>] [--min-stars <n>] [--limit <n>]
 *   badge-engine discussions [--topic <t>] [--language <lang>]
 *   badge-engine coauthor [--title <t> --with "Name <email>"]
 *
 * Options:
 *   --config <path>      Config file (default: ./badge-engine.yaml)
 *   --telemetry <path>   Append JSONL telemetry to this file
 */

import { runCli } from "./cli.js";

export { runCli, parseCliArgs, UsageError, USAGE, EXIT_OK, EXIT_USAGE, EXIT_WORKFLOW_FAILED } from "./cli.js";
export type { CliArgs, CliCommand, CliDeps } from "./cli.js";
export { GhClient, GhCommandError, buildApiArgs, execGh } from "./gh.js";
export type { GhExec, GhRequest, HttpMethod } from "./gh.js";
export { GitHubMetricSource, mergedPullRequestQuery } from "./github-metric-source.js";
export { GitHubArtifacts } from "./github-artifacts.js";
export {
  CONTRIBUTION_IDEAS,
  GitHubRepositorySearch,
  contributionQuery,
  discussionQuery,
} from "./github-repository-search.js";
export type {
  ContributionSearchOptions,
  DiscussionSearchOptions,
  RepositoryCandidate,
} from "./github-repository-search.js";
export { BadgeOrchestrator } from "./orchestrator.js";
export type { BadgeOrchestratorOptions, EarnOptions, EarnResult } from "./orchestrator.js";

// ─── Main ─────────────────────────────────────────────────────────────────────

const isDirectExecution = process.argv[1]?.endsWith("index.js") ||
  process.argv[1]?.endsWith("index.ts") ||
  process.argv[1]?.endsWith("badge-engine");

if (isDirectExecution) {
  void (async () => {
    const code = await runCli(process.argv.slice(2));
    process.exit(code);
  })().catch((error: unknown) => {
    console.error("badge-engine failed", error);
    process.exit(1);
  });
}
