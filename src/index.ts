#!/usr/bin/env node
import "dotenv/config";
import { createPlatform, createProgram } from "./cli-args.js";
import { runReport } from "./cli.js";
import { config } from "./config.js";
import { LocalGitRepository } from "./git/repository.js";

const program = createProgram(async (prNumber) => {
  process.exitCode = await runReport(
    {
      git: new LocalGitRepository(),
      platform: createPlatform({
        token: config.GITHUB_TOKEN,
        host: config.GITHUB_HOST,
      }),
      stdout: (text) => process.stdout.write(text),
      stderr: (text) => process.stderr.write(text),
    },
    {
      prNumber,
      host: config.GITHUB_HOST,
      remote: config.GIT_REMOTE,
    },
  );
});

await program.parseAsync();
