import { execFile } from "node:child_process";
import { ExternalToolError } from "../errors.js";

/** Runs a command to completion and resolves with its stdout. */
export type CommandRunner = (
  command: string,
  args: readonly string[],
) => Promise<string>;

const MAX_BUFFER = 64 * 1024 * 1024;

function exitCodeOf(err: Error): number | null {
  return "code" in err && typeof err.code === "number" ? err.code : null;
}

export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      { encoding: "utf8", maxBuffer: MAX_BUFFER },
      (err, stdout, stderr) => {
        if (err) {
          reject(
            new ExternalToolError(
              `${command} ${args[0] ?? ""}`.trim(),
              stderr || err.message,
              exitCodeOf(err),
            ),
          );
          return;
        }
        resolve(stdout);
      },
    );
  });
