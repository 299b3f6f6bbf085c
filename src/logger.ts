import type { ErrorSeverity, LogLevel } from "./types/index.ts";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let activeLevel: LogLevel =
  (["debug", "info", "warn", "error", "silent"] as const).find(
    (level) => level === process.env.LOG_LEVEL?.toLowerCase()
  ) ?? "info";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

/**
 * Console logger with a scope prefix. Everything goes to stderr so stdout
 * stays reserved for command output and the protocol channel.
 */
export function createLogger(scope: string): Logger {
  const write =
    (level: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]) => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) return;
      console.error(`[${scope}] ${message}`, ...details);
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

export function levelForSeverity(
  severity: ErrorSeverity
): Exclude<LogLevel, "silent"> {
  switch (severity) {
    case "low":
      return "debug";
    case "medium":
      return "warn";
    case "high":
    case "critical":
      return "error";
  }
}
