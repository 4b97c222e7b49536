import type { LogLevel } from "@nestjs/common";

const DEFAULT_LEVEL = "log";

const LOG_LEVELS: Record<string, LogLevel[]> = {
  fatal: ["fatal"],
  error: ["fatal", "error"],
  warn: ["fatal", "error", "warn"],
  log: ["fatal", "error", "warn", "log"],
  // "info" is what most deployment tooling sets; Nest calls that level "log".
  info: ["fatal", "error", "warn", "log"],
  debug: ["fatal", "error", "warn", "log", "debug"],
  verbose: ["fatal", "error", "warn", "log", "debug", "verbose"],
};

/** Levels enabled by LOG_LEVEL; unknown or missing values fall back to "log". */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const normalized = (level ?? "").toLowerCase().trim();
  return LOG_LEVELS[normalized] ?? LOG_LEVELS[DEFAULT_LEVEL];
}
