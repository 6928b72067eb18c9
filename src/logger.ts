import { pino } from "pino";
import type { Logger, LoggerOptions } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
const DEFAULT_LOG_LEVEL: LogLevel = "info";

function shouldPrettyPrint(): boolean {
  if (process.env.VITEST) {
    return false;
  }
  if (process.env.MODEM_LOG_FORMAT === "json") {
    return false;
  }
  return process.stdout.isTTY === true;
}

function shouldColorizeLogs(): boolean {
  return process.env.NO_COLOR !== "1" && process.env.NO_COLOR !== "true";
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function resolveLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.trim().toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : DEFAULT_LOG_LEVEL;
}

function buildOptions(): LoggerOptions {
  const options: LoggerOptions = {
    name: "modem-envelope",
    level: resolveLevel(),
  };
  if (shouldPrettyPrint()) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: shouldColorizeLogs(),
      },
    };
  }
  return options;
}

export const logger: Logger = pino(buildOptions());
