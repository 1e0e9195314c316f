import { Octokit } from "@octokit/rest";

export interface OctokitClientOptions {
  token: string;
  host?: string;
  /** Replaces the global fetch, e.g. with an in-process stand-in. */
  fetch?: typeof globalThis.fetch;
}

export function createOctokit(options: OctokitClientOptions): Octokit {
  const { token, host = "github.com", fetch } = options;
  return new Octokit({
    auth: token,
    ...(host === "github.com" ? {} : { baseUrl: `https://${host}/api/v3` }),
    ...(fetch ? { request: { fetch } } : {}),
  });
}
