/**
 * github-artifacts.ts — ArtifactPort over the GitHub REST API
 *
 * Containers are throwaway public repositories under the authenticated user.
 */

import { z } from "zod";
import type {
  ArtifactPort,
  ArtifactRef,
  BranchHandle,
  ContainerHandle,
  FileDraft,
  FileHandle,
  IssueDraft,
  IssueHandle,
  MergeOptions,
  PullRequestDraft,
  PullRequestHandle,
} from "@badge-engine/architecture";
import type { GhClient } from "./gh.js";

const repositorySchema = z.object({
  full_name: z.string(),
  default_branch: z.string().min(1),
  html_url: z.string().optional(),
});

const numberedSchema = z.object({
  number: z.number().int().positive(),
  html_url: z.string().optional(),
});

const refSchema = z.object({
  ref: z.string(),
  object: z.object({ sha: z.string() }),
});

const contentSchema = z.object({
  content: z.object({ sha: z.string() }),
});

const mergeSchema = z.object({
  merged: z.boolean(),
  message: z.string().optional(),
});

const stateSchema = z.object({
  state: z.enum(["open", "closed"]),
  merged: z.boolean().optional(),
});

function repoPath(container: ContainerHandle): string {
  return `repos/${container.fullName}`;
}

export class GitHubArtifacts implements ArtifactPort {
  private readonly gh: GhClient;

  constructor(gh: GhClient) {
    this.gh = gh;
  }

  async createContainer(name: string, description: string): Promise<ContainerHandle> {
    const repo = await this.gh.request(repositorySchema, "user/repos", {
      method: "POST",
      fields: { name, description },
      typedFields: { private: false, auto_init: true },
    });
    return { fullName: repo.full_name, defaultBranch: repo.default_branch, url: repo.html_url };
  }

  async deleteContainer(container: ContainerHandle): Promise<void> {
    await this.gh.send(repoPath(container), { method: "DELETE" });
  }

  async createIssue(container: ContainerHandle, draft: IssueDraft): Promise<IssueHandle> {
    const issue = await this.gh.request(numberedSchema, `${repoPath(container)}/issues`, {
      method: "POST",
      fields: { title: draft.title, body: draft.body },
    });
    return { container, number: issue.number, url: issue.html_url };
  }

  async commentOnIssue(issue: IssueHandle, body: string): Promise<void> {
    await this.gh.send(`${repoPath(issue.container)}/issues/${issue.number}/comments`, {
      method: "POST",
      fields: { body },
    });
  }

  async closeIssue(issue: IssueHandle): Promise<void> {
    await this.gh.send(`${repoPath(issue.container)}/issues/${issue.number}`, {
      method: "PATCH",
      fields: { state: "closed" },
    });
  }

  async createBranch(container: ContainerHandle, name: string): Promise<BranchHandle> {
    const base = await this.gh.request(
      refSchema,
      `${repoPath(container)}/git/ref/heads/${container.defaultBranch}`,
    );
    const created = await this.gh.request(refSchema, `${repoPath(container)}/git/refs`, {
      method: "POST",
      fields: { ref: `refs/heads/${name}`, sha: base.object.sha },
    });
    return { container, name, sha: created.object.sha };
  }

  async createFile(branch: BranchHandle, draft: FileDraft): Promise<FileHandle> {
    const result = await this.gh.request(
      contentSchema,
      `${repoPath(branch.container)}/contents/${draft.path}`,
      {
        method: "PUT",
        fields: {
          message: draft.message,
          content: Buffer.from(draft.content, "utf-8").toString("base64"),
          branch: branch.name,
        },
      },
    );
    return { branch, path: draft.path, sha: result.content.sha };
  }

  async createPullRequest(branch: BranchHandle, draft: PullRequestDraft): Promise<PullRequestHandle> {
    const pr = await this.gh.request(numberedSchema, `${repoPath(branch.container)}/pulls`, {
      method: "POST",
      fields: {
        title: draft.title,
        body: draft.body,
        head: branch.name,
        base: branch.container.defaultBranch,
      },
    });
    return { container: branch.container, number: pr.number, head: branch.name, url: pr.html_url };
  }

  async mergePullRequest(pullRequest: PullRequestHandle, options: MergeOptions): Promise<void> {
    const fields: Record<string, string> = { merge_method: "merge" };
    if (options.commitMessage) fields.commit_title = options.commitMessage;
    const result = await this.gh.request(
      mergeSchema,
      `${repoPath(pullRequest.container)}/pulls/${pullRequest.number}/merge`,
      { method: "PUT", fields },
    );
    if (!result.merged) {
      throw new Error(`Pull request #${pullRequest.number} was not merged: ${result.message ?? "no reason given"}`);
    }
  }

  async discardArtifact(ref: Exclude<ArtifactRef, { kind: "container" }>): Promise<void> {
    switch (ref.kind) {
      case "issue": {
        const { handle } = ref;
        const issue = await this.gh.request(stateSchema, `${repoPath(handle.container)}/issues/${handle.number}`);
        if (issue.state === "open") await this.closeIssue(handle);
        return;
      }
      case "pull-request": {
        const { handle } = ref;
        const path = `${repoPath(handle.container)}/pulls/${handle.number}`;
        const pr = await this.gh.request(stateSchema, path);
        if (pr.state === "open" && !pr.merged) {
          await this.gh.send(path, { method: "PATCH", fields: { state: "closed" } });
        }
        return;
      }
      case "file": {
        const { handle } = ref;
        await this.gh.send(`${repoPath(handle.branch.container)}/contents/${handle.path}`, {
          method: "DELETE",
          fields: { message: `Remove ${handle.path}`, sha: handle.sha, branch: handle.branch.name },
        });
        return;
      }
      case "branch": {
        const { handle } = ref;
        await this.gh.send(`${repoPath(handle.container)}/git/refs/heads/${handle.name}`, { method: "DELETE" });
        return;
      }
    }
  }
}
