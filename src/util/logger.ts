import pino from "pino";
import { cfg } from "./config.js";

export type LogLevel = pino.LevelWithSilent;

const pretty = cfg.NODE_ENV !== "production" && cfg.NODE_ENV !== "test";

// stdout carries puzzle answers, logs go to stderr
export const log = pino(
  {
    level: cfg.LOG_LEVEL,
    transport: pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            destination: 2,
          },
        }
      : undefined,
  },
  pretty ? undefined : pino.destination(2)
);

const VERBOSE_LEVELS: LogLevel[] = ["warn", "info", "debug", "trace"];

/**
 * Maps the repeatable `-v` flag and `-q` onto a pino level.
 * Without either flag the configured LOG_LEVEL applies.
 */
export function resolveLogLevel(
  verbose: number,
  quiet: boolean,
  fallback: LogLevel = cfg.LOG_LEVEL
): LogLevel {
  if (quiet) return "silent";
  if (verbose <= 0) return fallback;
  return VERBOSE_LEVELS[Math.min(verbose, VERBOSE_LEVELS.length) - 1];
}

export function setLogLevel(level: LogLevel) {
  log.level = level;
}
