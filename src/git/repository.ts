import { ConfigurationError, ExternalToolError } from "../errors.js";
import { runCommand, type CommandRunner } from "../shared/command-runner.js";
import type { RepoRef } from "../github/types.js";

export interface GitRepository {
  remoteUrl(remote: string): Promise<string>;
  currentBranch(): Promise<string>;
}

export class LocalGitRepository implements GitRepository {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async remoteUrl(remote: string): Promise<string> {
    let stdout: string;
    try {
      stdout = await this.run("git", ["config", "--get", `remote.${remote}.url`]);
    } catch (err) {
      // git config exits 1 when the key is not set
      if (err instanceof ExternalToolError && err.exitCode === 1) {
        throw new ConfigurationError(`No URL configured for git remote '${remote}'`);
      }
      throw err;
    }

    const url = stdout.trim();
    if (!url) {
      throw new ConfigurationError(`No URL configured for git remote '${remote}'`);
    }
    return url;
  }

  async currentBranch(): Promise<string> {
    const stdout = await this.run("git", ["rev-parse", "--abbrev-ref", "HEAD"]);
    return stdout.trim();
  }
}

/**
 * Extracts owner and repository name from an SSH
 * (`git@github.com:owner/repo.git`) or HTTPS
 * (`https://github.com/owner/repo.git`) remote URL.
 */
export function parseRemoteUrl(url: string, host = "github.com"): RepoRef {
  const trimmed = url.trim();
  const marker = [`${host}:`, `${host}/`].find((m) => trimmed.includes(m));
  if (!marker) {
    throw new ConfigurationError(
      `Remote URL does not point at ${host}: ${url}`,
      url,
    );
  }

  const path = trimmed
    .slice(trimmed.indexOf(marker) + marker.length)
    .replace(/\/+$/, "")
    .replace(/\.git$/, "");
  const segments = path.split("/");
  const [owner, repo] = segments;
  if (segments.length !== 2 || !owner || !repo) {
    throw new ConfigurationError(
      `Cannot determine owner/repo from remote URL: ${url}`,
      url,
    );
  }

  return { owner, repo };
}
