import chalk from "chalk";
import type { Logger } from "./types";

const LEVELS = ["error", "warn", "info", "debug"] as const;

type Level = (typeof LEVELS)[number];

const LABELS: Record<Level, string> = {
  error: chalk.red("error"),
  warn: chalk.yellow("warn"),
  info: chalk.cyan("info"),
  debug: chalk.gray("debug")
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

/**
 * Logger writing to stderr. Verbosity 0 keeps errors only; each step adds
 * warnings, info and debug output in turn.
 */
export function createLogger(
  verbosity: number,
  write: (line: string) => void = (line) => console.error(line)
): Logger {
  const enabled = (level: Level): boolean => LEVELS.indexOf(level) <= verbosity;
  const log =
    (level: Level) =>
    (message: string): void => {
      if (enabled(level)) {
        write(`${LABELS[level]} ${message}`);
      }
    };
  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error")
  };
}
