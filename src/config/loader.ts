import fs from "node:fs";
import path from "node:path";
import type { ZodIssue } from "zod";
import { ModemConfigSchema, type ModemConfig } from "./schema.js";

export type ConfigParseResult =
  | { success: true; config: ModemConfig }
  | { success: false; errors: string[] };

export type ConfigLoadResult = ConfigParseResult & { path: string };

/**
 * Thrown when a configuration cannot be used. `errors` holds one line
 * per problem, prefixed with the offending key path.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly errors: readonly string[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

function formatIssue(issue: ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

export function resolveConfigPath(customPath?: string): string {
  if (customPath) {
    return path.resolve(customPath);
  }
  const envPath = process.env.MODEM_CONFIG;
  if (envPath) {
    return path.resolve(envPath);
  }
  return path.resolve("modem.config.json");
}

export function parseConfig(input: unknown): ConfigParseResult {
  const result = ModemConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    return { success: false, errors: result.error.issues.map(formatIssue) };
  }
  return { success: true, config: result.data };
}

export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  if (!fs.existsSync(resolvedPath)) {
    return {
      success: false,
      errors: [`Config file not found: ${resolvedPath}`],
      path: resolvedPath,
    };
  }

  try {
    const raw: unknown = JSON.parse(fs.readFileSync(resolvedPath, "utf-8"));
    return { ...parseConfig(raw), path: resolvedPath };
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
    };
  }
}

/**
 * Parse and return the configuration, or throw.
 *
 * @throws {ConfigError}
 */
export function resolveConfig(input: unknown = {}): ModemConfig {
  const result = parseConfig(input);
  if (!result.success) {
    throw new ConfigError(`Invalid modem configuration: ${result.errors.join("; ")}`, result.errors);
  }
  return result.config;
}
