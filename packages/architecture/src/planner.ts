/**
 * planner.ts — partition achievements by automation feasibility
 *
 * The capability table is fixed; it is not user-configurable. Within each
 * bucket entries keep the order they arrive in, which is catalogue order.
 */

import type {
  AchievementName,
  AchievementProgress,
  CapabilityClass,
  EarningPlan,
  EarningPlanBucket,
  EarningPlanBuckets,
  PlanEntry,
  PlanGuidance,
  WorkflowKind,
} from "./domain.js";

export type CapabilityTable = Readonly<Record<AchievementName, CapabilityClass>>;

export const CAPABILITY_TABLE: CapabilityTable = Object.freeze({
  Quickdraw: "immediate",
  YOLO: "immediate",
  "Public Sponsor": "quick",
  "Heart On Your Sleeve": "shortTerm",
  "Open Sourcerer": "shortTerm",
  "Pair Extraordinaire": "shortTerm",
  "Pull Shark": "longTerm",
  "Galaxy Brain": "longTerm",
  Starstruck: "longTerm",
} satisfies Record<AchievementName, CapabilityClass>);

const WORKFLOW_KINDS: Partial<Record<AchievementName, WorkflowKind>> = {
  Quickdraw: "fast-close",
  YOLO: "unreviewed-merge",
};

const MANUAL_STEPS: Partial<Record<AchievementName, string[]>> = {
  "Public Sponsor": ["Go to GitHub Sponsors", "Sponsor any developer at $1/month"],
};

interface ToolHint {
  hint: string;
  command: string;
}

const TOOL_HINTS: Partial<Record<AchievementName, ToolHint>> = {
  "Heart On Your Sleeve": {
    hint: "Find a good first issue in an active repository and open a small fix",
    command: "badge-engine find-repos",
  },
  "Open Sourcerer": {
    hint: "Spread small contributions across several repositories in your language",
    command: "badge-engine find-repos --language <your-language>",
  },
  "Pair Extraordinaire": {
    hint: "Add Co-authored-by trailers to commits you pair on",
    command: "badge-engine coauthor",
  },
};

const STRATEGIES: Partial<Record<AchievementName, { strategy: string; command?: string }>> = {
  Starstruck: { strategy: "Create useful open source projects and share them" },
  "Galaxy Brain": {
    strategy: "Answer GitHub Discussions until answers get marked as accepted",
    command: "badge-engine discussions",
  },
  "Pull Shark": { strategy: "Keep contributing; this builds on Heart On Your Sleeve" },
};

export function emptyBuckets(): EarningPlanBuckets {
  return {
    completed: [],
    immediate: [],
    quick: [],
    shortTerm: [],
    longTerm: [],
  };
}

export function bucketFor(
  progress: AchievementProgress,
  capabilityTable: CapabilityTable = CAPABILITY_TABLE,
): EarningPlanBucket {
  if (progress.achievedTier !== null) return "completed";
  return capabilityTable[progress.definition.name];
}

export function classify(
  progressList: readonly AchievementProgress[],
  capabilityTable: CapabilityTable = CAPABILITY_TABLE,
): EarningPlanBuckets {
  const buckets = emptyBuckets();
  for (const progress of progressList) {
    buckets[bucketFor(progress, capabilityTable)].push(progress);
  }
  return buckets;
}

export function workflowKindFor(name: AchievementName): WorkflowKind | undefined {
  return WORKFLOW_KINDS[name];
}

function guidanceFor(name: AchievementName, bucket: EarningPlanBucket): PlanGuidance {
  switch (bucket) {
    case "immediate": {
      const workflow = workflowKindFor(name);
      return workflow ? { kind: "automated", workflow } : { kind: "none" };
    }
    case "quick": {
      const steps = MANUAL_STEPS[name];
      return steps ? { kind: "manual-steps", steps: [...steps] } : { kind: "none" };
    }
    case "shortTerm": {
      const hint = TOOL_HINTS[name];
      return hint ? { kind: "tool-hint", ...hint } : { kind: "none" };
    }
    case "longTerm": {
      const strategy = STRATEGIES[name];
      return strategy ? { kind: "strategy", ...strategy } : { kind: "none" };
    }
    case "completed":
      return { kind: "none" };
  }
}

export function buildEarningPlan(
  actor: string,
  progressList: readonly AchievementProgress[],
  options: { capabilityTable?: CapabilityTable; now?: Date } = {},
): EarningPlan {
  const buckets = classify(progressList, options.capabilityTable);

  const toEntries = (bucket: EarningPlanBucket): PlanEntry[] =>
    buckets[bucket].map((progress) => {
      const guidance = guidanceFor(progress.definition.name, bucket);
      return {
        progress,
        bucket,
        automated: guidance.kind === "automated",
        guidance,
      };
    });

  return {
    actor,
    builtAt: (options.now ?? new Date()).toISOString(),
    entries: {
      completed: toEntries("completed"),
      immediate: toEntries("immediate"),
      quick: toEntries("quick"),
      shortTerm: toEntries("shortTerm"),
      longTerm: toEntries("longTerm"),
    },
  };
}
