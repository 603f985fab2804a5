/**
 * iotdb-mcp - Error Types
 *
 * Custom error classes for iotdb-mcp operations.
 */

/**
 * Base error class for iotdb-mcp
 */
export class IoTDBMcpError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "IoTDBMcpError";
  }
}

/**
 * Malformed CLI or environment value
 */
export class ConfigurationError extends IoTDBMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}

/**
 * IoTDB node unreachable after all retries
 */
export class ConnectionError extends IoTDBMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONNECTION_ERROR", details);
    this.name = "ConnectionError";
  }
}

/**
 * Session pool error (exhausted, shut down)
 */
export class PoolError extends IoTDBMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "POOL_ERROR", details);
    this.name = "PoolError";
  }
}

/**
 * Statement rejected by the server
 */
export class QueryError extends IoTDBMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "QUERY_ERROR", details);
    this.name = "QueryError";
  }
}

/**
 * Validation error for tool input
 */
export class ValidationError extends IoTDBMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}
