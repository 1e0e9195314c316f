import { Command, InvalidArgumentError } from "commander";
import { CLI_NAME } from "./cli.js";
import { createOctokit } from "./github/client.js";
import { GhCliPlatform } from "./github/gh-cli-platform.js";
import { OctokitPlatform } from "./github/octokit-platform.js";
import type { ReviewPlatform } from "./github/types.js";
import { logger } from "./logger.js";

export function parsePrNumber(value: string): number {
  const number = Number(value);
  if (!/^\d+$/.test(value) || number <= 0) {
    throw new InvalidArgumentError("PR_NUMBER must be a positive integer.");
  }
  return number;
}

interface PlatformSettings {
  token: string;
  host: string;
}

/** The GitHub API when a token is configured, the gh CLI otherwise. */
export function createPlatform(settings: PlatformSettings): ReviewPlatform {
  const { token, host } = settings;
  if (token) {
    logger.debug({ host }, "Using the GitHub API");
    return new OctokitPlatform(createOctokit({ token, host }));
  }
  logger.debug({ host }, "Using the gh CLI");
  return new GhCliPlatform(host);
}

export function createProgram(
  onRun: (prNumber: number | undefined) => Promise<void>,
): Command {
  return new Command()
    .name(CLI_NAME)
    .description(
      "Print the review threads of a pull request as Markdown, unresolved first",
    )
    .argument(
      "[PR_NUMBER]",
      "pull request number (defaults to the PR for the current branch)",
      parsePrNumber,
    )
    .allowExcessArguments(false)
    .action(async (prNumber: number | undefined) => {
      await onRun(prNumber);
    });
}
