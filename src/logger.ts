import chalk from "chalk";
import { LOG_LEVEL } from "./env";

const LEVELS = { debug: 10, info: 20, warn: 30, error: 40 } as const;

export type LogLevel = keyof typeof LEVELS;

export type Logger = Record<LogLevel, (message: string, ...extra: unknown[]) => void>;

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

const threshold =
  LOG_LEVEL === "silent" ? Number.POSITIVE_INFINITY : LEVELS[isLogLevel(LOG_LEVEL) ? LOG_LEVEL : "info"];

const paint: Record<LogLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

// stdout belongs to the MCP transport, so everything goes to stderr.
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel) => (message: string, ...extra: unknown[]) => {
    if (LEVELS[level] < threshold) return;
    const prefix = `${chalk.gray(new Date().toISOString())} ${paint[level](level.toUpperCase())} ${chalk.bold(`[${scope}]`)}`;
    console.error(`${prefix} ${message}`, ...extra);
  };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
