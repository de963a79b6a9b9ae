import { writeFileSync } from "fs";
import {
  BOT_COAUTHORS,
  InvalidCoauthorError,
  commitMessageWithCoauthors,
  loadEngineConfig,
  noreplyEmail,
  parseCoauthor,
  progressToJson,
  renderPlan,
  renderProgressReport,
  renderSummary,
  renderWorkflowRun,
  systemClock,
} from "@badge-engine/architecture";
import type {
  ArtifactPort,
  ClockPort,
  CompletedWorkflowRun,
  EngineConfig,
  MetricSourcePort,
  WorkflowKind,
} from "@badge-engine/architecture";
import { GhClient } from "./gh.js";
import { GitHubArtifacts } from "./github-artifacts.js";
import { GitHubMetricSource } from "./github-metric-source.js";
import { CONTRIBUTION_IDEAS, GitHubRepositorySearch } from "./github-repository-search.js";
import type { RepositoryCandidate } from "./github-repository-search.js";
import { BadgeOrchestrator } from "./orchestrator.js";

export const USAGE = `Usage: badge-engine <command> [options]

Commands:
  check [--format text|json] [--output <file>]   Progress report for every achievement
  summary                                       Achieved count and next easiest targets
  plan                                          Earning plan grouped by effort
  earn [--execute] [--verify]                   Plan, run the automated workflows, re-check
  quickdraw [--delay <seconds>]                 Open and quickly close an issue
  yolo                                          Merge a pull request without review
  find-repos [--language <lang>] [--min-stars <n>] [--limit <n>]
                                                Repositories with good first issues
  discussions [--topic <t>] [--language <lang>] [--min-stars <n>] [--limit <n>]
                                                Repositories with Discussions enabled
  coauthor [--user-id <id>]                     No-reply and bot addresses to credit
  coauthor --title <t> [--description <d>] --with "Name <email>" ...
                                                Commit message with Co-authored-by trailers

Options:
  --config <path>      Config file (default: ./badge-engine.yaml)
  --telemetry <path>   Append JSONL telemetry to this file
  --help               Show this message`;

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_WORKFLOW_FAILED = 2;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type CliCommand =
  | "check"
  | "summary"
  | "plan"
  | "earn"
  | "quickdraw"
  | "yolo"
  | "find-repos"
  | "discussions"
  | "coauthor";

const COMMANDS: readonly CliCommand[] = [
  "check",
  "summary",
  "plan",
  "earn",
  "quickdraw",
  "yolo",
  "find-repos",
  "discussions",
  "coauthor",
];

const MAX_LIMIT = 100;

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

export interface CliArgs {
  command: CliCommand | null;
  help: boolean;
  format: "text" | "json";
  output?: string;
  execute: boolean;
  verify: boolean;
  delaySeconds?: number;
  configPath?: string;
  telemetryPath?: string;
  language?: string;
  topic?: string;
  minStars?: number;
  limit?: number;
  title?: string;
  description?: string;
  /** Raw `--with` values, "Name <email>". */
  coauthors: string[];
  userId?: string;
}

function wholeNumber(flag: string, value: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `a whole number >= ${min}` : `a whole number from ${min} to ${max}`;
    throw new UsageError(`${flag} must be ${range}, got "${value}"`);
  }
  return parsed;
}

/** Parses everything after the executable and script path. */
export function parseCliArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = {
    command: null,
    help: false,
    format: "text",
    execute: false,
    verify: false,
    coauthors: [],
  };

  const valueAfter = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith("--")) throw new UsageError(`${flag} requires a value`);
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else if (arg === "--format") {
      const value = valueAfter(arg, i++);
      if (value !== "text" && value !== "json") {
        throw new UsageError(`unknown --format value: "${value}" (valid: text, json)`);
      }
      parsed.format = value;
    } else if (arg === "--output") {
      parsed.output = valueAfter(arg, i++);
    } else if (arg === "--execute") {
      parsed.execute = true;
    } else if (arg === "--verify") {
      parsed.verify = true;
    } else if (arg === "--delay") {
      const value = valueAfter(arg, i++);
      const seconds = Number(value);
      if (!Number.isFinite(seconds) || seconds < 0) {
        throw new UsageError(`--delay must be a non-negative number of seconds, got "${value}"`);
      }
      parsed.delaySeconds = seconds;
    } else if (arg === "--config") {
      parsed.configPath = valueAfter(arg, i++);
    } else if (arg === "--telemetry") {
      parsed.telemetryPath = valueAfter(arg, i++);
    } else if (arg === "--language") {
      parsed.language = valueAfter(arg, i++);
    } else if (arg === "--topic") {
      parsed.topic = valueAfter(arg, i++);
    } else if (arg === "--min-stars") {
      parsed.minStars = wholeNumber(arg, valueAfter(arg, i++), 0);
    } else if (arg === "--limit") {
      parsed.limit = wholeNumber(arg, valueAfter(arg, i++), 1, MAX_LIMIT);
    } else if (arg === "--title") {
      parsed.title = valueAfter(arg, i++);
    } else if (arg === "--description") {
      parsed.description = valueAfter(arg, i++);
    } else if (arg === "--with") {
      parsed.coauthors.push(valueAfter(arg, i++));
    } else if (arg === "--user-id") {
      parsed.userId = String(wholeNumber(arg, valueAfter(arg, i++), 1));
    } else if (arg.startsWith("-")) {
      throw new UsageError(`unknown option: "${arg}"`);
    } else if (parsed.command === null) {
      if (!isCommand(arg)) {
        throw new UsageError(`unknown command: "${arg}" (valid: ${COMMANDS.join(", ")})`);
      }
      parsed.command = arg;
    } else {
      throw new UsageError(`unexpected argument: "${arg}"`);
    }
  }

  if (parsed.verify && !parsed.execute) {
    throw new UsageError("--verify only applies together with --execute");
  }
  if (parsed.title !== undefined && !parsed.title.trim()) {
    throw new UsageError("--title may not be empty");
  }
  if (parsed.coauthors.length > 0 && parsed.title === undefined) {
    throw new UsageError("--with needs --title for the commit message");
  }
  if (parsed.title !== undefined && parsed.coauthors.length === 0) {
    throw new UsageError("--title needs at least one --with \"Name <email>\"");
  }
  return parsed;
}

export interface CliDeps {
  gh?: GhClient;
  metrics?: MetricSourcePort;
  artifacts?: ArtifactPort;
  clock?: ClockPort;
  cwd?: string;
  /** Resolves the acting login; defaults to `gh api user`. */
  resolveActor?: () => Promise<string>;
}

function resolveConfig(args: CliArgs, cwd: string | undefined): EngineConfig {
  const config = loadEngineConfig(args.configPath, cwd);
  if (args.telemetryPath) config.telemetryPath = args.telemetryPath;
  if (args.delaySeconds !== undefined) config.fastClose.delayMs = Math.round(args.delaySeconds * 1000);
  return config;
}

function printRuns(runs: readonly CompletedWorkflowRun[]): void {
  for (const run of runs) console.log(renderWorkflowRun(run));
}

async function runSingleWorkflow(orchestrator: BadgeOrchestrator, kind: WorkflowKind): Promise<number> {
  const run = await orchestrator.runWorkflow(kind);
  printRuns([run]);
  return run.state === "succeeded" ? EXIT_OK : EXIT_WORKFLOW_FAILED;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

function renderCandidates(heading: string, candidates: readonly RepositoryCandidate[], linkSuffix = ""): string {
  if (candidates.length === 0) {
    return "No matching repositories found. Try a lower --min-stars or a different --language.";
  }
  const lines = [`${heading} (${candidates.length}):`];
  candidates.forEach((candidate, index) => {
    lines.push(
      "",
      `${String(index + 1).padStart(2)}. ${candidate.fullName}`,
      `    ${candidate.stars} stars | ${candidate.openIssues} open issues | ${candidate.language ?? "mixed"}`,
    );
    if (candidate.description) lines.push(`    ${truncate(candidate.description, 80)}`);
    lines.push(`    ${candidate.url}${linkSuffix}`);
  });
  return lines.join("\n");
}

function renderCoauthorSuggestions(actor: string, userId: string | undefined): string {
  const lines = [`Co-author suggestions for ${actor}`, "", "Your no-reply addresses:", `  ${noreplyEmail(actor)}`];
  if (userId !== undefined) lines.push(`  ${noreplyEmail(actor, userId)}`);
  lines.push("", "Bots you can credit:");
  for (const bot of BOT_COAUTHORS) lines.push(`  Co-authored-by: ${bot.name} <${bot.email}>`);
  lines.push(
    "",
    "Co-authored commits count once their pull request is merged.",
    'Build a message: badge-engine coauthor --title "<title>" --with "Name <email>"',
  );
  return lines.join("\n");
}

/** Prints the commit message for `coauthor --title`; no GitHub access needed. */
function printCommitMessage(args: CliArgs, title: string): number {
  try {
    const coauthors = args.coauthors.map(parseCoauthor);
    console.log(commitMessageWithCoauthors({ title, description: args.description, coauthors }));
    return EXIT_OK;
  } catch (error: unknown) {
    if (!(error instanceof InvalidCoauthorError)) throw error;
    console.error(error.message);
    return EXIT_USAGE;
  }
}

function parseOrReport(args: readonly string[]): CliArgs | null {
  try {
    return parseCliArgs(args);
  } catch (error: unknown) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    console.error(USAGE);
    return null;
  }
}

/** Runs one CLI invocation and returns the process exit code. */
export async function runCli(args: readonly string[], deps: CliDeps = {}): Promise<number> {
  const parsed = parseOrReport(args);
  if (parsed === null) return EXIT_USAGE;

  if (parsed.help || parsed.command === null) {
    console.log(USAGE);
    return parsed.help ? EXIT_OK : EXIT_USAGE;
  }

  if (parsed.command === "coauthor" && parsed.title !== undefined) {
    return printCommitMessage(parsed, parsed.title);
  }

  const config = resolveConfig(parsed, deps.cwd);
  const clock = deps.clock ?? systemClock;
  const gh = deps.gh ?? new GhClient();
  const orchestrator = new BadgeOrchestrator({
    metrics: deps.metrics ?? new GitHubMetricSource(gh),
    artifacts: deps.artifacts ?? new GitHubArtifacts(gh),
    config,
    clock,
    verbose: parsed.format === "text",
  });

  if (parsed.command === "quickdraw") return runSingleWorkflow(orchestrator, "fast-close");
  if (parsed.command === "yolo") return runSingleWorkflow(orchestrator, "unreviewed-merge");

  let actor: string;
  try {
    actor = await (deps.resolveActor ? deps.resolveActor() : gh.currentLogin());
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Could not determine the GitHub user (is \`gh auth login\` done?): ${message}`);
    return EXIT_USAGE;
  }

  switch (parsed.command) {
    case "check": {
      const progressList = await orchestrator.checkProgress(actor);
      const rendered =
        parsed.format === "json"
          ? JSON.stringify(progressToJson(progressList), null, 2)
          : renderProgressReport(actor, progressList, clock.now());
      if (parsed.output) {
        writeFileSync(parsed.output, rendered + "\n", "utf-8");
        console.log(`Report written to ${parsed.output}`);
      } else {
        console.log(rendered);
      }
      return EXIT_OK;
    }
    case "summary": {
      const progressList = await orchestrator.checkProgress(actor);
      console.log(renderSummary(actor, progressList));
      return EXIT_OK;
    }
    case "plan": {
      const plan = await orchestrator.buildPlan(actor);
      console.log(renderPlan(plan));
      return EXIT_OK;
    }
    case "earn": {
      const result = await orchestrator.earn(actor, { execute: parsed.execute, verify: parsed.verify });
      console.log(renderPlan(result.plan));
      if (!parsed.execute) {
        console.log("\nRun with --execute to start the automated workflows.");
        return EXIT_OK;
      }
      printRuns(result.runs);
      if (result.verified) console.log(renderSummary(actor, result.verified));
      return EXIT_OK;
    }
    case "find-repos": {
      const candidates = await new GitHubRepositorySearch(gh).findContributionTargets(actor, {
        language: parsed.language,
        minStars: parsed.minStars,
        limit: parsed.limit,
      });
      console.log(renderCandidates("Repositories with good first issues", candidates));
      if (candidates.length > 0) {
        console.log(["", "Contribution ideas:", ...CONTRIBUTION_IDEAS.map((idea) => `  - ${idea}`)].join("\n"));
      }
      return EXIT_OK;
    }
    case "discussions": {
      const candidates = await new GitHubRepositorySearch(gh).findDiscussionRepositories({
        topic: parsed.topic,
        language: parsed.language,
        minStars: parsed.minStars,
        limit: parsed.limit,
      });
      console.log(renderCandidates("Repositories with Discussions enabled", candidates, "/discussions"));
      return EXIT_OK;
    }
    case "coauthor": {
      console.log(renderCoauthorSuggestions(actor, parsed.userId));
      return EXIT_OK;
    }
  }
}
