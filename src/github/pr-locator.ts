import type { GitRepository } from "../git/repository.js";
import type { PullRequestTarget, RepoRef, ReviewPlatform } from "./types.js";

interface LocatePullRequestOptions {
  git: GitRepository;
  platform: ReviewPlatform;
  repo: RepoRef;
  prNumber?: number;
}

export async function locatePullRequest(
  options: LocatePullRequestOptions,
): Promise<PullRequestTarget> {
  const { git, platform, repo, prNumber } = options;
  if (prNumber !== undefined) {
    return { kind: "number", number: prNumber };
  }

  const branch = await git.currentBranch();
  const found = await platform.findPullRequestForBranch(repo, branch);
  return found === null
    ? { kind: "none", branch }
    : { kind: "number", number: found };
}
