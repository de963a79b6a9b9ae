/**
 * github-metric-source.ts — MetricSourcePort over the GitHub REST API
 *
 * Merged pull requests and stars are observable through search and the
 * repository listing. Co-authored commits, accepted discussion answers,
 * unreviewed merges, fast closes and sponsorships are not exposed cheaply (or
 * at all), so those report "unknown" instead of a made-up zero.
 */

import { z } from "zod";
import { UNKNOWN } from "@badge-engine/architecture";
import type { MetricSourcePort, Unknown } from "@badge-engine/architecture";
import type { GhClient } from "./gh.js";

const SEARCH_PAGE_SIZE = 100;
const REPO_PAGE_SIZE = 100;
const MAX_REPO_PAGES = 10;

const searchCountSchema = z.object({ total_count: z.number().int().nonnegative() });

const searchItemsSchema = z.object({
  total_count: z.number().int().nonnegative(),
  items: z.array(z.object({ repository_url: z.string() })),
});

const repoListSchema = z.array(
  z.object({
    full_name: z.string(),
    private: z.boolean(),
    stargazers_count: z.number().int().nonnegative(),
  }),
);

export function mergedPullRequestQuery(actor: string): string {
  return `type:pr author:${actor} is:merged`;
}

function searchEndpoint(query: string, perPage: number): string {
  return `search/issues?q=${encodeURIComponent(query)}&per_page=${perPage}`;
}

export class GitHubMetricSource implements MetricSourcePort {
  private readonly gh: GhClient;

  constructor(gh: GhClient) {
    this.gh = gh;
  }

  async countMergedPullRequests(actor: string): Promise<number> {
    const result = await this.gh.request(searchCountSchema, searchEndpoint(mergedPullRequestQuery(actor), 1));
    return result.total_count;
  }

  /** Looks at the first 100 merged pull requests, the search API's page limit. */
  async countDistinctRepositoriesWithMergedPullRequests(actor: string): Promise<number> {
    const result = await this.gh.request(
      searchItemsSchema,
      searchEndpoint(mergedPullRequestQuery(actor), SEARCH_PAGE_SIZE),
    );
    return new Set(result.items.map((item) => item.repository_url)).size;
  }

  async maxStarsAcrossOwnedPublicRepositories(actor: string): Promise<number> {
    let max = 0;
    for (let page = 1; page <= MAX_REPO_PAGES; page++) {
      const repos = await this.gh.request(
        repoListSchema,
        `users/${encodeURIComponent(actor)}/repos?type=owner&per_page=${REPO_PAGE_SIZE}&page=${page}`,
      );
      for (const repo of repos) {
        if (!repo.private && repo.stargazers_count > max) max = repo.stargazers_count;
      }
      if (repos.length < REPO_PAGE_SIZE) break;
    }
    return max;
  }

  async countFastClosedIssues(): Promise<Unknown> {
    return UNKNOWN;
  }

  async countCoAuthoredCommitsInMergedPullRequests(): Promise<Unknown> {
    return UNKNOWN;
  }

  async countAcceptedDiscussionAnswers(): Promise<Unknown> {
    return UNKNOWN;
  }

  async countUnreviewedMergedPullRequests(): Promise<Unknown> {
    return UNKNOWN;
  }

  /** Sponsorship data is private to the account. */
  async hasActiveSponsorship(): Promise<Unknown> {
    return UNKNOWN;
  }
}
