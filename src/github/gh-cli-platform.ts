import { z } from "zod";
import { ExternalToolError } from "../errors.js";
import { logger } from "../logger.js";
import { runCommand, type CommandRunner } from "../shared/command-runner.js";
import { parseReviewThreads, REVIEW_THREADS_QUERY } from "./threads.js";
import type { RepoRef, ReviewPlatform, ReviewThread } from "./types.js";

const NO_PR_PATTERN = /no (open )?pull requests? found/i;

const graphqlEnvelopeSchema = z.object({
  data: z.unknown(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

function parseJson(raw: string, what: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse ${what} as JSON: ${reason}`);
  }
}

/** Talks to GitHub through the `gh` CLI and its stored credentials. */
export class GhCliPlatform implements ReviewPlatform {
  constructor(
    private readonly host: string = "github.com",
    private readonly run: CommandRunner = runCommand,
  ) {}

  // Without --repo gh picks its own base repo (upstream, or a fork's parent)
  private repoSelector(repo: RepoRef): string {
    const slug = `${repo.owner}/${repo.repo}`;
    return this.host === "github.com" ? slug : `${this.host}/${slug}`;
  }

  async findPullRequestForBranch(
    repo: RepoRef,
    branch: string,
  ): Promise<number | null> {
    let stdout: string;
    try {
      stdout = await this.run("gh", [
        "pr",
        "view",
        branch,
        "--repo",
        this.repoSelector(repo),
        "--json",
        "number",
        "--jq",
        ".number",
      ]);
    } catch (err) {
      if (err instanceof ExternalToolError && NO_PR_PATTERN.test(err.stderr)) {
        logger.debug({ branch }, "gh found no pull request for branch");
        return null;
      }
      throw err;
    }

    const number = Number(stdout.trim());
    if (!Number.isInteger(number) || number <= 0) {
      throw new Error(`gh pr view returned an unexpected PR number: "${stdout.trim()}"`);
    }
    return number;
  }

  async fetchReviewThreads(
    repo: RepoRef,
    prNumber: number,
  ): Promise<ReviewThread[]> {
    const args = [
      "api",
      "graphql",
      ...(this.host === "github.com" ? [] : ["--hostname", this.host]),
      "-f",
      `query=${REVIEW_THREADS_QUERY}`,
      "-f",
      `owner=${repo.owner}`,
      "-f",
      `repo=${repo.repo}`,
      "-F",
      `pr=${prNumber}`,
    ];

    const stdout = await this.run("gh", args);
    const envelope = graphqlEnvelopeSchema.safeParse(
      parseJson(stdout, "gh api graphql output"),
    );
    if (!envelope.success) {
      throw new Error("gh api graphql output is not a GraphQL response object");
    }
    const { data, errors } = envelope.data;
    if (errors && errors.length > 0) {
      throw new ExternalToolError(
        "gh api",
        errors.map((e) => e.message).join("\n"),
      );
    }
    return parseReviewThreads(data);
  }
}
