/**
 * report.ts — human-facing rendering of progress, plans and workflow runs
 *
 * Arithmetic and formatting only.
 */

import type {
  AchievementProgress,
  CompletedWorkflowRun,
  EarningPlan,
  MetricValue,
  NextTier,
  PlanEntry,
} from "./domain.js";
import { EARNING_PLAN_BUCKETS } from "./domain.js";
import { describeRef } from "./workflow.js";

export interface ProgressSummary {
  achieved: number;
  total: number;
  /** One decimal place. */
  percentage: number;
  unknown: number;
}

export interface TargetSuggestion {
  name: string;
  tier: NextTier["label"];
  remaining: number;
}

export function summarize(progressList: readonly AchievementProgress[]): ProgressSummary {
  const total = progressList.length;
  const achieved = progressList.filter((p) => p.achievedTier !== null).length;
  const unknown = progressList.filter((p) => p.reading.value.status === "unknown").length;
  const percentage = total === 0 ? 0 : Math.round((achieved / total) * 1000) / 10;
  return { achieved, total, percentage, unknown };
}

/** Sorted by remaining count; ties keep catalogue order. */
export function nextEasiestTargets(
  progressList: readonly AchievementProgress[],
  limit = 3,
): TargetSuggestion[] {
  const targets: TargetSuggestion[] = [];
  for (const progress of progressList) {
    if (!progress.nextTier) continue;
    targets.push({
      name: progress.definition.name,
      tier: progress.nextTier.label,
      remaining: progress.nextTier.remaining,
    });
  }
  return targets.sort((a, b) => a.remaining - b.remaining).slice(0, limit);
}

export function formatValue(value: MetricValue): string {
  if (value.status === "observed") return String(value.value);
  return `unknown (${value.cause}: ${value.detail})`;
}

function shortValue(value: MetricValue): string {
  return value.status === "observed" ? String(value.value) : "?";
}

function statusMarker(progress: AchievementProgress): string {
  switch (progress.achievedTier) {
    case "Gold":
      return "[gold]";
    case "Silver":
      return "[silver]";
    case "Bronze":
      return "[bronze]";
    case "Default":
      return "[done]";
    case null:
      return progress.reading.value.status === "unknown" ? "[?]" : "[ ]";
  }
}

function nextGoal(progress: AchievementProgress): string {
  if (progress.nextTier) return `${progress.nextTier.label} (${progress.nextTier.remaining} more)`;
  if (progress.reading.value.status === "unknown") return "Unknown";
  return "Max achieved!";
}

function pad(value: string, width: number): string {
  const clipped = value.length > width ? value.slice(0, width) : value;
  return clipped.padEnd(width);
}

export function renderProgressTable(progressList: readonly AchievementProgress[]): string {
  const columns: Array<[string, number]> = [
    ["Status", 8],
    ["Badge", 20],
    ["Current", 8],
    ["Tier", 8],
    ["Next Goal", 25],
  ];
  const header = columns.map(([label, width]) => pad(label, width)).join(" | ");
  const rule = columns.map(([, width]) => "-".repeat(width)).join("-+-");
  const rows = progressList.map((progress) =>
    [
      pad(statusMarker(progress), 8),
      pad(progress.definition.name, 20),
      pad(shortValue(progress.reading.value), 8),
      pad(progress.achievedTier ?? "None", 8),
      pad(nextGoal(progress), 25),
    ].join(" | "),
  );
  return [header, rule, ...rows].map((line) => line.trimEnd()).join("\n");
}

export function renderProgressDetail(progress: AchievementProgress): string[] {
  const { definition, reading } = progress;
  const lines = [
    definition.name,
    `   ${definition.description}`,
    `   Current: ${formatValue(reading.value)}`,
    progress.achievedTier ? `   Achieved: ${progress.achievedTier} tier` : "   Not yet achieved",
  ];

  const tierInfo = definition.tiers.map((tier) => {
    const mark =
      reading.value.status === "unknown" ? "?" : reading.value.value >= tier.threshold ? "x" : " ";
    return `[${mark}] ${tier.label}: ${tier.threshold}`;
  });
  lines.push(`   Tiers: ${tierInfo.join(" | ")}`);

  if (progress.nextTier) {
    lines.push(
      `   Next: ${progress.nextTier.label} tier (${progress.nextTier.remaining} more needed)`,
    );
  }
  return lines;
}

export function renderProgressReport(
  actor: string,
  progressList: readonly AchievementProgress[],
  generatedAt: Date = new Date(),
): string {
  const lines = [
    "GitHub Achievement Progress Report",
    `User: ${actor}`,
    `Generated: ${generatedAt.toISOString()}`,
    "",
    renderProgressTable(progressList),
    "",
    "Detailed Breakdown:",
    "",
  ];
  for (const progress of progressList) {
    lines.push(...renderProgressDetail(progress), "");
  }
  const summary = summarize(progressList);
  lines.push(`Total Progress: ${summary.achieved}/${summary.total} badges achieved (${summary.percentage.toFixed(1)}%)`);
  return lines.join("\n");
}

export function renderSummary(actor: string, progressList: readonly AchievementProgress[]): string {
  const lines = [`Quick Badge Summary for ${actor}`, ""];
  for (const progress of progressList) {
    const mark = progress.achievedTier ? "[x]" : "[ ]";
    lines.push(`  ${mark} ${progress.definition.name}: ${progress.achievedTier ?? "Not achieved"}`);
  }

  const summary = summarize(progressList);
  lines.push(
    "",
    `Total Progress: ${summary.achieved}/${summary.total} badges achieved (${summary.percentage.toFixed(1)}%)`,
  );
  if (summary.unknown > 0) {
    lines.push(`${summary.unknown} badge(s) could not be measured and need manual verification`);
  }

  const targets = nextEasiestTargets(progressList);
  if (targets.length > 0) {
    lines.push("", "Next Easiest Targets:");
    for (const target of targets) {
      lines.push(`  - ${target.name}: ${target.remaining} more for ${target.tier} tier`);
    }
  }
  return lines.join("\n");
}

function renderPlanEntry(entry: PlanEntry): string[] {
  const { definition } = entry.progress;
  const lines = [`  ${definition.name}`, `     ${definition.description}`];
  if (entry.progress.nextTier) {
    const next = entry.progress.nextTier;
    lines.push(`     Next: ${next.label} tier (${next.remaining} more needed)`);
  }
  switch (entry.guidance.kind) {
    case "automated":
      lines.push(`     Automated: ${entry.guidance.workflow} workflow`);
      break;
    case "manual-steps":
      entry.guidance.steps.forEach((step, i) => lines.push(`     ${i + 1}. ${step}`));
      break;
    case "tool-hint":
      lines.push(`     Tip: ${entry.guidance.hint}`, `     Use: ${entry.guidance.command}`);
      break;
    case "strategy":
      lines.push(`     Strategy: ${entry.guidance.strategy}`);
      if (entry.guidance.command) lines.push(`     Use: ${entry.guidance.command}`);
      break;
    case "none":
      break;
  }
  return lines;
}

const BUCKET_HEADINGS = {
  immediate: "Available for Immediate Earning (automated)",
  quick: "Quick Wins (manual, 5-30 minutes)",
  shortTerm: "Short-term Goals (tool-assisted, days to weeks)",
  longTerm: "Long-term Goals (manual, months)",
} as const;

export function renderPlan(plan: EarningPlan): string {
  const lines = [`Badge Earning Plan for ${plan.actor}`];

  const completed = plan.entries.completed;
  if (completed.length > 0) {
    lines.push("", `Already Earned (${completed.length}):`);
    for (const entry of completed) {
      lines.push(`  ${entry.progress.definition.name} (${entry.progress.achievedTier ?? "?"} tier)`);
    }
  }

  for (const bucket of EARNING_PLAN_BUCKETS) {
    if (bucket === "completed") continue;
    const entries = plan.entries[bucket];
    if (entries.length === 0) continue;
    lines.push("", `${BUCKET_HEADINGS[bucket]} (${entries.length}):`);
    for (const entry of entries) lines.push(...renderPlanEntry(entry));
  }
  return lines.join("\n");
}

export function renderWorkflowRun(run: CompletedWorkflowRun): string {
  const lines = [
    `${run.kind} run ${run.runId}: ${run.state}`,
    `  States: ${run.history.join(" → ")}`,
  ];
  if (run.result.status === "failure") {
    const { reason } = run.result;
    lines.push(`  Failed during ${reason.stage} (${reason.step}): ${reason.message}`);
  }
  for (const status of run.cleanup) {
    const target = describeRef(status.ref);
    switch (status.outcome) {
      case "removed":
        lines.push(`  Cleaned up ${target}`);
        break;
      case "skipped":
        lines.push(`  Left ${target} (${status.reason})`);
        break;
      case "failed":
        lines.push(`  Could not clean up ${target}: ${status.message}`);
        break;
    }
  }
  return lines.join("\n");
}

export interface ProgressJson {
  current: number | null;
  status: MetricValue["status"];
  achieved_tier: string | null;
  next_requirement: { tier: string; count: number; needed: number } | null;
  description: string;
  tiers: Record<string, number>;
  error?: string;
}

/** The `--format json` shape, keyed by achievement name. */
export function progressToJson(
  progressList: readonly AchievementProgress[],
): Record<string, ProgressJson> {
  const result: Record<string, ProgressJson> = {};
  for (const progress of progressList) {
    const { definition, reading } = progress;
    const tiers: Record<string, number> = {};
    for (const tier of definition.tiers) tiers[tier.label] = tier.threshold;

    const entry: ProgressJson = {
      current: reading.value.status === "observed" ? reading.value.value : null,
      status: reading.value.status,
      achieved_tier: progress.achievedTier,
      next_requirement: progress.nextTier
        ? {
            tier: progress.nextTier.label,
            count: progress.nextTier.threshold,
            needed: progress.nextTier.remaining,
          }
        : null,
      description: definition.description,
      tiers,
    };
    if (reading.value.status === "unknown") entry.error = reading.value.detail;
    result[definition.name] = entry;
  }
  return result;
}
