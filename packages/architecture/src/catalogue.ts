/**
 * catalogue.ts — static registry of achievement definitions
 *
 * Definitions are frozen at module load and validated once; the catalogue
 * never changes during a process lifetime. Metric dispatch is a table keyed by
 * MetricKind so every definition resolves to a typed query up front.
 */

import type {
  AchievementDefinition,
  AchievementName,
  MetricKind,
  Tier,
  Unknown,
} from "./domain.js";
import { UNKNOWN } from "./domain.js";
import { CatalogueInvariantError, UnknownAchievementError } from "./errors.js";
import type { MetricSourcePort } from "./ports.js";

export type MetricQuery = (source: MetricSourcePort, actor: string) => Promise<number | Unknown>;

function sponsorshipAsCount(value: boolean | Unknown): number | Unknown {
  if (value === UNKNOWN) return UNKNOWN;
  return value ? 1 : 0;
}

const QUERY_TABLE: Record<MetricKind, MetricQuery> = {
  mergedPullRequests: (source, actor) => source.countMergedPullRequests(actor),
  repositoriesWithMergedPullRequests: (source, actor) =>
    source.countDistinctRepositoriesWithMergedPullRequests(actor),
  maxStars: (source, actor) => source.maxStarsAcrossOwnedPublicRepositories(actor),
  fastClosedIssues: (source, actor) => source.countFastClosedIssues(actor),
  coAuthoredCommits: (source, actor) => source.countCoAuthoredCommitsInMergedPullRequests(actor),
  acceptedDiscussionAnswers: (source, actor) => source.countAcceptedDiscussionAnswers(actor),
  unreviewedMergedPullRequests: (source, actor) => source.countUnreviewedMergedPullRequests(actor),
  activeSponsorship: async (source, actor) => sponsorshipAsCount(await source.hasActiveSponsorship(actor)),
};

export const METRIC_QUERIES: Readonly<Record<MetricKind, MetricQuery>> = Object.freeze(QUERY_TABLE);

function tiers(defaultAt: number, bronze?: number, silver?: number, gold?: number): Tier[] {
  const result: Tier[] = [{ label: "Default", threshold: defaultAt }];
  if (bronze !== undefined) result.push({ label: "Bronze", threshold: bronze });
  if (silver !== undefined) result.push({ label: "Silver", threshold: silver });
  if (gold !== undefined) result.push({ label: "Gold", threshold: gold });
  return result;
}

const RAW_DEFINITIONS: AchievementDefinition[] = [
  {
    name: "Heart On Your Sleeve",
    description: "Submit a pull request that gets merged",
    tiers: tiers(1, 2, 4, 8),
    metricKind: "mergedPullRequests",
  },
  {
    name: "Open Sourcerer",
    description: "Have pull requests merged in multiple public repositories",
    tiers: tiers(1, 2, 3, 4),
    metricKind: "repositoriesWithMergedPullRequests",
  },
  {
    name: "Starstruck",
    description: "Create a repository that has many stars",
    tiers: tiers(16, 128, 512, 4096),
    metricKind: "maxStars",
  },
  {
    name: "Quickdraw",
    description: "Close an issue or pull request within 5 minutes of opening",
    tiers: tiers(1),
    metricKind: "fastClosedIssues",
  },
  {
    name: "Pair Extraordinaire",
    description: "Coauthor commits on merged pull requests",
    tiers: tiers(1, 10, 24, 48),
    metricKind: "coAuthoredCommits",
  },
  {
    name: "Pull Shark",
    description: "Open pull requests that get merged",
    tiers: tiers(2, 16, 128, 1024),
    metricKind: "mergedPullRequests",
  },
  {
    name: "Galaxy Brain",
    description: "Answer discussions and get accepted answers",
    tiers: tiers(2, 8, 16, 32),
    metricKind: "acceptedDiscussionAnswers",
  },
  {
    name: "YOLO",
    description: "Merge a pull request without a review",
    tiers: tiers(1),
    metricKind: "unreviewedMergedPullRequests",
  },
  {
    name: "Public Sponsor",
    description: "Sponsor an open source contributor through GitHub Sponsors",
    tiers: tiers(1),
    metricKind: "activeSponsorship",
  },
];

/**
 * Throws if any definition has no tiers, a negative threshold or
 * thresholds that are not strictly increasing.
 */
export function assertStrictlyIncreasing(definitions: readonly AchievementDefinition[]): void {
  const seen = new Set<AchievementName>();
  for (const definition of definitions) {
    if (seen.has(definition.name)) {
      throw new CatalogueInvariantError(definition.name, "duplicate definition");
    }
    seen.add(definition.name);

    if (definition.tiers.length === 0) {
      throw new CatalogueInvariantError(definition.name, "no tiers defined");
    }
    let previous = -1;
    for (const tier of definition.tiers) {
      if (!Number.isInteger(tier.threshold) || tier.threshold < 0) {
        throw new CatalogueInvariantError(
          definition.name,
          `tier ${tier.label} has invalid threshold ${tier.threshold}`,
        );
      }
      if (tier.threshold <= previous) {
        throw new CatalogueInvariantError(
          definition.name,
          `tier ${tier.label} threshold ${tier.threshold} does not exceed ${previous}`,
        );
      }
      previous = tier.threshold;
    }
  }
}

function freezeDefinition(definition: AchievementDefinition): AchievementDefinition {
  return Object.freeze({
    ...definition,
    tiers: Object.freeze(definition.tiers.map((tier) => Object.freeze({ ...tier }))),
  });
}

assertStrictlyIncreasing(RAW_DEFINITIONS);

const DEFINITIONS: readonly AchievementDefinition[] = Object.freeze(
  RAW_DEFINITIONS.map(freezeDefinition),
);

const BY_NAME = new Map<string, AchievementDefinition>(
  DEFINITIONS.map((definition) => [definition.name, definition]),
);

export function allDefinitions(): readonly AchievementDefinition[] {
  return DEFINITIONS;
}

export function definitionOf(name: string): AchievementDefinition {
  const definition = BY_NAME.get(name);
  if (!definition) throw new UnknownAchievementError(name);
  return definition;
}

export function isAchievementName(value: string): value is AchievementName {
  return BY_NAME.has(value);
}

export function metricQueryFor(definition: AchievementDefinition): MetricQuery {
  return METRIC_QUERIES[definition.metricKind];
}
