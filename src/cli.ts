import { ConfigurationError, ExternalToolError } from "./errors.js";
import { parseRemoteUrl, type GitRepository } from "./git/repository.js";
import { locatePullRequest } from "./github/pr-locator.js";
import type { ReviewPlatform } from "./github/types.js";
import { logger } from "./logger.js";
import { renderReport } from "./report/formatter.js";

export const CLI_NAME = "pr-review-report";

export interface ReportDeps {
  git: GitRepository;
  platform: ReviewPlatform;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface ReportOptions {
  prNumber?: number;
  host: string;
  remote: string;
}

function noPullRequestMessage(branch: string): string {
  return [
    `No pull request found for branch '${branch}'.`,
    "",
    "Try one of:",
    `  ${CLI_NAME} <PR_NUMBER>`,
    `  gh pr list --head ${branch}`,
    "",
  ].join("\n");
}

export function describeError(err: unknown): string {
  if (err instanceof ConfigurationError) {
    return `Configuration error: ${err.message}\n`;
  }
  if (err instanceof ExternalToolError) {
    return `${err.command} failed:\n${err.stderr.trim()}\n`;
  }
  if (err instanceof Error) {
    return `Error: ${err.message}\n`;
  }
  return `Error: ${String(err)}\n`;
}

/** Runs the whole pipeline once and returns the process exit code. */
export async function runReport(
  deps: ReportDeps,
  options: ReportOptions,
): Promise<number> {
  const { git, platform, stdout, stderr } = deps;

  try {
    const remoteUrl = await git.remoteUrl(options.remote);
    const repo = parseRemoteUrl(remoteUrl, options.host);

    const target = await locatePullRequest({
      git,
      platform,
      repo,
      prNumber: options.prNumber,
    });
    if (target.kind === "none") {
      stderr(noPullRequestMessage(target.branch));
      return 0;
    }

    const log = logger.child({
      pr: `${repo.owner}/${repo.repo}#${target.number}`,
    });
    log.debug("Fetching review threads");
    const threads = await platform.fetchReviewThreads(repo, target.number);
    log.debug({ threads: threads.length }, "Fetched review threads");

    stdout(renderReport(threads, target.number));
    return 0;
  } catch (err) {
    logger.debug({ err }, "Report failed");
    stderr(describeError(err));
    return 1;
  }
}
