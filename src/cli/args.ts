/**
 * iotdb-mcp - Configuration Resolution
 *
 * Each field comes from its command-line flag when given, else its
 * environment variable, else a fixed default.
 */

import type { IoTDBConfig, SqlDialect } from "../types/index.js";
import { ConfigurationError, SQL_DIALECTS } from "../types/index.js";
import { isLogLevel } from "../utils/logger.js";
import type { LogLevel } from "../utils/logger.js";

/**
 * Raw option values as parsed by commander (all strings)
 */
export interface CliOptions {
  host?: string;
  port?: string;
  user?: string;
  password?: string;
  database?: string;
  sqlDialect?: string;
  logLevel?: string;
}

/**
 * Environment variable for each configuration field
 */
export const ENV_VARS = {
  host: "IOTDB_HOST",
  port: "IOTDB_PORT",
  user: "IOTDB_USER",
  password: "IOTDB_PASSWORD",
  database: "IOTDB_DATABASE",
  sqlDialect: "IOTDB_SQL_DIALECT",
  logLevel: "LOG_LEVEL",
} as const;

export const DEFAULTS = {
  host: "127.0.0.1",
  port: "6667",
  user: "root",
  password: "root",
  database: "test",
  sqlDialect: "table",
  logLevel: "info",
} as const;

export interface ResolvedArgs {
  config: IoTDBConfig;
  logLevel: LogLevel;
}

type Field = keyof typeof DEFAULTS;

function pick(field: Field, options: CliOptions, env: NodeJS.ProcessEnv): string {
  return options[field] ?? env[ENV_VARS[field]] ?? DEFAULTS[field];
}

/**
 * Parse a TCP port; anything but a whole number in range is fatal
 */
export function parsePort(value: string): number {
  const trimmed = value.trim();
  const port = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || port > 65535) {
    throw new ConfigurationError(`Invalid port: "${value}"`, { port: value });
  }
  return port;
}

/**
 * Unknown dialects fail startup rather than serving an empty tool list
 */
export function parseSqlDialect(value: string): SqlDialect {
  const dialect = SQL_DIALECTS.find((d) => d === value);
  if (dialect === undefined) {
    throw new ConfigurationError(
      `Invalid SQL dialect: "${value}" (expected tree or table)`,
      { sqlDialect: value },
    );
  }
  return dialect;
}

export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new ConfigurationError(`Invalid log level: "${value}"`, {
      logLevel: value,
    });
  }
  return value;
}

/**
 * Build the immutable IoTDB configuration and server options
 */
export function resolveArgs(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedArgs {
  const config: IoTDBConfig = Object.freeze({
    host: pick("host", options, env),
    port: parsePort(pick("port", options, env)),
    user: pick("user", options, env),
    password: pick("password", options, env),
    database: pick("database", options, env),
    sqlDialect: parseSqlDialect(pick("sqlDialect", options, env)),
  });

  return {
    config,
    logLevel: parseLogLevel(pick("logLevel", options, env)),
  };
}
