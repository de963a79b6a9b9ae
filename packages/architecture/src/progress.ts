/**
 * progress.ts — raw metric → tiered achievement state
 *
 * An unknown reading is "no data", never "zero progress": it yields neither an
 * achieved tier nor a next tier.
 */

import type {
  AchievementDefinition,
  AchievementProgress,
  MetricReading,
  MetricValue,
  NextTier,
  TierLabel,
  Unknown,
} from "./domain.js";
import { UNKNOWN } from "./domain.js";
import { metricQueryFor } from "./catalogue.js";
import { TransientQueryFailure, UnobservableMetric } from "./errors.js";
import type { ClockPort, MetricSourcePort } from "./ports.js";
import { systemClock } from "./clock.js";

export interface TierClassification {
  achievedTier: TierLabel | null;
  nextTier: NextTier | null;
}

export function classifyValue(
  definition: AchievementDefinition,
  value: MetricValue,
): TierClassification {
  if (value.status === "unknown") return { achievedTier: null, nextTier: null };

  let achievedTier: TierLabel | null = null;
  let nextTier: NextTier | null = null;

  for (const tier of definition.tiers) {
    if (tier.threshold <= value.value) {
      achievedTier = tier.label;
    } else {
      nextTier = {
        label: tier.label,
        threshold: tier.threshold,
        remaining: tier.threshold - value.value,
      };
      break;
    }
  }

  return { achievedTier, nextTier };
}

function toMetricValue(definition: AchievementDefinition, raw: number | Unknown): MetricValue {
  if (raw === UNKNOWN) {
    return {
      status: "unknown",
      cause: "unobservable",
      detail: new UnobservableMetric(definition.metricKind).message,
    };
  }
  if (!Number.isInteger(raw) || raw < 0) {
    return {
      status: "unknown",
      cause: "transient-failure",
      detail: `${definition.metricKind} returned an invalid count (${raw})`,
    };
  }
  return { status: "observed", value: raw };
}

export async function readMetric(
  definition: AchievementDefinition,
  metricSource: MetricSourcePort,
  actor: string,
  clock: ClockPort = systemClock,
): Promise<MetricReading> {
  let value: MetricValue;
  try {
    const raw = await metricQueryFor(definition)(metricSource, actor);
    value = toMetricValue(definition, raw);
  } catch (error: unknown) {
    const failure = new TransientQueryFailure(definition.metricKind, error);
    value = { status: "unknown", cause: "transient-failure", detail: failure.message };
  }

  return {
    achievementName: definition.name,
    value,
    asOf: clock.now().toISOString(),
  };
}

export async function computeProgress(
  definition: AchievementDefinition,
  metricSource: MetricSourcePort,
  actor: string,
  clock: ClockPort = systemClock,
): Promise<AchievementProgress> {
  const reading = await readMetric(definition, metricSource, actor, clock);
  const { achievedTier, nextTier } = classifyValue(definition, reading.value);
  return Object.freeze({ definition, reading, achievedTier, nextTier });
}

export interface ComputeAllOptions {
  clock?: ClockPort;
  /** Called before each query, in catalogue order. */
  onProgress?: (definition: AchievementDefinition, index: number, total: number) => void;
}

/** One query in flight at a time; results keep catalogue order. */
export async function computeAllProgress(
  definitions: readonly AchievementDefinition[],
  metricSource: MetricSourcePort,
  actor: string,
  options: ComputeAllOptions = {},
): Promise<AchievementProgress[]> {
  const results: AchievementProgress[] = [];
  for (const [index, definition] of definitions.entries()) {
    options.onProgress?.(definition, index, definitions.length);
    results.push(await computeProgress(definition, metricSource, actor, options.clock));
  }
  return results;
}

export function isAchieved(progress: AchievementProgress): boolean {
  return progress.achievedTier !== null;
}

/** Whether a specific tier is met. Unknown readings meet no tier. */
export function tierMet(progress: AchievementProgress, label: TierLabel): boolean {
  const { value } = progress.reading;
  if (value.status === "unknown") return false;
  const tier = progress.definition.tiers.find((t) => t.label === label);
  return tier !== undefined && value.value >= tier.threshold;
}

export function isUnknown(progress: AchievementProgress): boolean {
  return progress.reading.value.status === "unknown";
}
