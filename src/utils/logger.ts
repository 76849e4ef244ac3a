/**
 * Levelled console logger.
 *
 * Everything goes to stderr so that `--json` output on stdout stays parseable.
 * The level is read from LOG_LEVEL on every call; DEBUG=true forces debug.
 */

import chalk from "chalk";
import type { LogLevel } from "../types/index.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: chalk.gray("[debug]"),
  info: chalk.cyan("[info] "),
  warn: chalk.yellow("[warn] "),
  error: chalk.red("[error]"),
};

export function resolveLogLevel(): LogLevel {
  if (process.env.DEBUG === "true") return "debug";
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return raw === "debug" || raw === "info" || raw === "warn" || raw === "error" ? raw : "info";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[resolveLogLevel()];
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return process.env.DEBUG === "true" && error.stack ? error.stack : `${error.name}: ${error.message}`;
  }
  return String(error);
}

function write(level: LogLevel, message: string, error?: unknown): void {
  if (!enabled(level)) return;
  const suffix = error === undefined ? "" : ` ${chalk.gray(formatError(error))}`;
  console.error(`${LEVEL_TAGS[level]} ${message}${suffix}`);
}

export const logger = {
  debug(message: string, error?: unknown): void {
    write("debug", message, error);
  },

  info(message: string): void {
    write("info", message);
  },

  warn(message: string, error?: unknown): void {
    write("warn", message, error);
  },

  error(message: string, error?: unknown): void {
    write("error", message, error);
  },

  isEnabled: enabled,
};
