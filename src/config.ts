import pino from "pino";

function optionalEnv(name: string, fallback: string): string {
  const value = process.env[name];
  return value === undefined || value === "" ? fallback : value;
}

const DEFAULT_LOG_LEVEL = "warn";

/** pino throws on unknown levels, so those fall back to the default. */
export function resolveLogLevel(raw: string): string {
  return raw === "silent" || Object.hasOwn(pino.levels.values, raw)
    ? raw
    : DEFAULT_LOG_LEVEL;
}

export const config = {
  GITHUB_TOKEN: optionalEnv("GITHUB_TOKEN", ""),
  GITHUB_HOST: optionalEnv("GITHUB_HOST", "github.com"),
  GIT_REMOTE: optionalEnv("GIT_REMOTE", "origin"),
  LOG_LEVEL: resolveLogLevel(optionalEnv("LOG_LEVEL", DEFAULT_LOG_LEVEL)),
} as const;
