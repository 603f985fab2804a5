/**
 * Dialect adapter selection
 */

import type { ConnectionPool } from "../pool/ConnectionPool.js";
import type { IoTDBConfig } from "../types/index.js";
import type { DatabaseAdapter } from "./DatabaseAdapter.js";
import { TableAdapter } from "./table/TableAdapter.js";
import { TreeAdapter } from "./tree/TreeAdapter.js";

export { DatabaseAdapter } from "./DatabaseAdapter.js";
export { TableAdapter } from "./table/TableAdapter.js";
export { TreeAdapter } from "./tree/TreeAdapter.js";
export { formatDataSet, formatFirstColumn, stringifyValue } from "./format.js";

/**
 * Build the adapter for the configured dialect
 */
export function createAdapter(
  pool: ConnectionPool,
  config: IoTDBConfig,
): DatabaseAdapter {
  switch (config.sqlDialect) {
    case "tree":
      return new TreeAdapter(pool, config);
    case "table":
      return new TableAdapter(pool, config);
  }
}
