/**
 * Configuration utility for the stdio MCP server
 * Provides structured access to environment variables with defaults
 */

import { isLogLevel, type LogLevel } from "./logger";

export type Environment = "development" | "production" | "test";

const ENVIRONMENTS: readonly Environment[] = [
  "development",
  "production",
  "test",
];

export const DEFAULT_SERVER_NAME = "stdio-mcp-server";
export const DEFAULT_SERVER_VERSION = "0.1.1";

interface ServerConfig {
  name: string;
  version: string;
  environment: Environment;
  instructions?: string;
}

interface LoggingConfig {
  level: LogLevel;
  file?: string;
  colors: boolean;
}

interface ToolsConfig {
  disabled: string[];
}

export interface Config {
  server: ServerConfig;
  logging: LoggingConfig;
  tools: ToolsConfig;
  /**
   * Problems found while reading the environment. The logger does not exist
   * yet when configuration is built, so these are logged by the caller.
   */
  warnings: string[];
}

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some((env) => env === value);
}

function parseBoolean(
  value: string | undefined,
  defaultValue: boolean
): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

function parseList(value: string | undefined): string[] {
  return value
    ? value
        .split(",")
        .map((p) => p.trim())
        .filter((p) => p)
    : [];
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function createConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const warnings: string[] = [];

  let environment: Environment = "development";
  if (env.NODE_ENV) {
    if (isEnvironment(env.NODE_ENV)) {
      environment = env.NODE_ENV;
    } else {
      warnings.push(
        `Invalid NODE_ENV: ${env.NODE_ENV}, using 'development' instead`
      );
    }
  }

  let level: LogLevel = "info";
  if (env.LOG_LEVEL) {
    if (isLogLevel(env.LOG_LEVEL)) {
      level = env.LOG_LEVEL;
    } else {
      warnings.push(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}, using 'info' instead`);
    }
  }

  const config: Config = {
    server: {
      name: nonEmpty(env.MCP_SERVER_NAME) ?? DEFAULT_SERVER_NAME,
      version: nonEmpty(env.MCP_SERVER_VERSION) ?? DEFAULT_SERVER_VERSION,
      environment,
      instructions: nonEmpty(env.MCP_SERVER_INSTRUCTIONS),
    },
    logging: {
      level,
      file: nonEmpty(env.LOG_FILE),
      colors: parseBoolean(env.LOG_COLORS, environment !== "production"),
    },
    tools: {
      disabled: parseList(env.MCP_DISABLED_TOOLS),
    },
    warnings,
  };

  return config;
}
