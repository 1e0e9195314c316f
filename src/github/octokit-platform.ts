import { Octokit } from "@octokit/rest";
import { ExternalToolError } from "../errors.js";
import { logger } from "../logger.js";
import { parseReviewThreads, REVIEW_THREADS_QUERY } from "./threads.js";
import type { RepoRef, ReviewPlatform, ReviewThread } from "./types.js";

function apiError(err: unknown): unknown {
  return err instanceof Error ? new ExternalToolError("GitHub API", err.message) : err;
}

/** Talks to the GitHub API directly with a token. */
export class OctokitPlatform implements ReviewPlatform {
  constructor(private readonly octokit: Octokit) {}

  async findPullRequestForBranch(
    repo: RepoRef,
    branch: string,
  ): Promise<number | null> {
    try {
      const { data } = await this.octokit.rest.pulls.list({
        owner: repo.owner,
        repo: repo.repo,
        head: `${repo.owner}:${branch}`,
        state: "all",
        per_page: 100,
      });
      // Same preference as `gh pr view <branch>`: an open PR, else the newest
      const pr = data.find((p) => p.state === "open") ?? data[0];
      if (!pr) {
        logger.debug({ branch }, "No pull request for branch");
        return null;
      }
      return pr.number;
    } catch (err) {
      throw apiError(err);
    }
  }

  async fetchReviewThreads(
    repo: RepoRef,
    prNumber: number,
  ): Promise<ReviewThread[]> {
    let data: unknown;
    try {
      data = await this.octokit.graphql<unknown>(REVIEW_THREADS_QUERY, {
        owner: repo.owner,
        repo: repo.repo,
        pr: prNumber,
      });
    } catch (err) {
      throw apiError(err);
    }
    return parseReviewThreads(data);
  }
}
