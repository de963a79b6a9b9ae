/**
 * github-repository-search.ts — Places to contribute and to answer questions
 *
 * `find-repos` looks for public repositories with open good-first issues (Heart
 * On Your Sleeve, Open Sourcerer, Pull Shark); `discussions` looks for
 * repositories with Discussions switched on (Galaxy Brain). Both go through
 * the repository search API.
 */

import { z } from "zod";
import type { GhClient } from "./gh.js";

const SEARCH_PAGE_SIZE = 100;

export const DEFAULT_CONTRIBUTION_MIN_STARS = 10;
export const DEFAULT_CONTRIBUTION_LIMIT = 20;
export const DEFAULT_DISCUSSION_MIN_STARS = 100;
export const DEFAULT_DISCUSSION_LIMIT = 15;

export const CONTRIBUTION_IDEAS: readonly string[] = [
  "Fix typos in documentation",
  "Add missing documentation",
  "Fix broken links",
  "Add tests for existing code",
  "Improve error messages",
  "Add example usage",
];

const repositorySearchSchema = z.object({
  total_count: z.number().int().nonnegative(),
  items: z.array(
    z.object({
      full_name: z.string(),
      description: z.string().nullable(),
      html_url: z.string(),
      language: z.string().nullable(),
      stargazers_count: z.number().int().nonnegative(),
      open_issues_count: z.number().int().nonnegative(),
      has_discussions: z.boolean().optional(),
    }),
  ),
});

type RepositoryItem = z.infer<typeof repositorySearchSchema>["items"][number];

export interface RepositoryCandidate {
  fullName: string;
  description: string | null;
  url: string;
  language: string | null;
  stars: number;
  openIssues: number;
}

export interface ContributionSearchOptions {
  language?: string;
  minStars?: number;
  limit?: number;
}

export interface DiscussionSearchOptions extends ContributionSearchOptions {
  topic?: string;
}

export function contributionQuery(options: ContributionSearchOptions = {}): string {
  const terms = ["is:public", "archived:false", "good-first-issues:>0"];
  if (options.language) terms.push(`language:${options.language}`);
  terms.push(`stars:>${options.minStars ?? DEFAULT_CONTRIBUTION_MIN_STARS}`);
  return terms.join(" ");
}

export function discussionQuery(options: DiscussionSearchOptions = {}): string {
  const terms = ["is:public", "archived:false"];
  if (options.topic) terms.push(`topic:${options.topic}`);
  if (options.language) terms.push(`language:${options.language}`);
  terms.push(`stars:>${options.minStars ?? DEFAULT_DISCUSSION_MIN_STARS}`);
  return terms.join(" ");
}

function toCandidate(item: RepositoryItem): RepositoryCandidate {
  return {
    fullName: item.full_name,
    description: item.description,
    url: item.html_url,
    language: item.language,
    stars: item.stargazers_count,
    openIssues: item.open_issues_count,
  };
}

export class GitHubRepositorySearch {
  private readonly gh: GhClient;

  constructor(gh: GhClient) {
    this.gh = gh;
  }

  /** Recently updated repositories with good-first issues, excluding the actor's own. */
  async findContributionTargets(
    actor: string,
    options: ContributionSearchOptions = {},
  ): Promise<RepositoryCandidate[]> {
    const items = await this.search(contributionQuery(options));
    const ownPrefix = `${actor.toLowerCase()}/`;
    return items
      .filter((item) => !item.full_name.toLowerCase().startsWith(ownPrefix))
      .slice(0, options.limit ?? DEFAULT_CONTRIBUTION_LIMIT)
      .map(toCandidate);
  }

  async findDiscussionRepositories(options: DiscussionSearchOptions = {}): Promise<RepositoryCandidate[]> {
    const items = await this.search(discussionQuery(options));
    return items
      .filter((item) => item.has_discussions === true)
      .slice(0, options.limit ?? DEFAULT_DISCUSSION_LIMIT)
      .map(toCandidate);
  }

  private async search(query: string): Promise<RepositoryItem[]> {
    const result = await this.gh.request(
      repositorySearchSchema,
      `search/repositories?q=${encodeURIComponent(query)}&sort=updated&per_page=${SEARCH_PAGE_SIZE}`,
    );
    return result.items;
  }
}
