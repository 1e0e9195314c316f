/**
 * The git remote is missing or does not point at a repository on the
 * configured host.
 */
export class ConfigurationError extends Error {
  readonly remoteUrl: string | undefined;

  constructor(message: string, remoteUrl?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.remoteUrl = remoteUrl;
  }
}

/**
 * An external command (git, gh) exited non-zero, or the GitHub API
 * rejected a request. `stderr` holds whatever the tool reported.
 */
export class ExternalToolError extends Error {
  readonly command: string;
  readonly stderr: string;
  readonly exitCode: number | null;

  constructor(command: string, stderr: string, exitCode: number | null = null) {
    const detail = stderr.trim();
    const code = exitCode === null ? "" : ` (exit code ${exitCode})`;
    super(`${command} failed${code}${detail ? `: ${detail}` : ""}`);
    this.name = "ExternalToolError";
    this.command = command;
    this.stderr = stderr;
    this.exitCode = exitCode;
  }
}
