/**
 * iotdb-mcp - Apache IoTDB MCP Server
 *
 * Tree and table model query tools for AI assistants.
 *
 * @module iotdb-mcp
 */

// Export types
export * from "./types/index.js";

// Export adapters
export {
  DatabaseAdapter,
  TableAdapter,
  TreeAdapter,
  createAdapter,
  formatDataSet,
  formatFirstColumn,
  stringifyValue,
} from "./adapters/index.js";

// Export IoTDB client binding
export * from "./iotdb/index.js";

// Export server
export { IoTDBMcpServer } from "./server/McpServer.js";

// Export utilities
export {
  ConnectionPool,
  createSessionSource,
  TREE_POOL_SETTINGS,
} from "./pool/ConnectionPool.js";
export type { SessionSource } from "./pool/ConnectionPool.js";
export { resolveArgs } from "./cli/args.js";
export type { CliOptions, ResolvedArgs } from "./cli/args.js";
export { logger } from "./utils/logger.js";
export { VERSION } from "./version.js";
