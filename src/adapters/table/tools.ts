/**
 * Table Dialect Tools
 *
 * Relational queries, table listing and table description over the
 * IoTDB table model.
 */

import type { TableAdapter } from "./TableAdapter.js";
import type { ToolDefinition, RequestContext } from "../../types/index.js";
import { readOnly } from "../../utils/annotations.js";
import {
  NoArgumentsShape,
  QuerySqlSchema,
  QuerySqlShape,
  TableNameSchema,
  TableNameShape,
} from "../schemas.js";
import { assertStatementPrefix } from "../validation.js";

export const READ_PREFIXES = ["SELECT", "DESCRIBE", "SHOW"] as const;

/**
 * Read-only statement in the table dialect
 */
export function createReadQueryTool(adapter: TableAdapter): ToolDefinition {
  return {
    name: "read_query",
    description:
      "Execute a SELECT query on the IoTDB. Please use table sql_dialect when generating SQL queries. " +
      "SELECT, DESCRIBE and SHOW statements are accepted. Returns comma-separated text: a header line, then one line per row.",
    inputSchema: QuerySqlShape,
    annotations: readOnly("Read Query"),
    handler: async (params: unknown, context: RequestContext) => {
      const { query_sql } = QuerySqlSchema.parse(params);
      assertStatementPrefix(
        query_sql,
        READ_PREFIXES,
        "Only SELECT queries are allowed for read_query",
      );
      return adapter.query("read_query", query_sql, context);
    },
  };
}

/**
 * List tables in the configured database
 */
export function createListTablesTool(adapter: TableAdapter): ToolDefinition {
  return {
    name: "list_tables",
    description: "List all tables in the IoTDB database.",
    inputSchema: NoArgumentsShape,
    annotations: readOnly("List Tables"),
    handler: async (_params: unknown, context: RequestContext) => {
      return adapter.listTables(context);
    },
  };
}

/**
 * Column schema of a single table
 */
export function createDescribeTableTool(adapter: TableAdapter): ToolDefinition {
  return {
    name: "describe_table",
    description: "Get the schema information for a specific table.",
    inputSchema: TableNameShape,
    annotations: readOnly("Describe Table"),
    handler: async (params: unknown, context: RequestContext) => {
      const { table_name } = TableNameSchema.parse(params);
      return adapter.query("describe_table", `DESC ${table_name}`, context);
    },
  };
}

/**
 * Get all table dialect tools
 */
export function getTableTools(adapter: TableAdapter): ToolDefinition[] {
  return [
    createReadQueryTool(adapter),
    createListTablesTool(adapter),
    createDescribeTableTool(adapter),
  ];
}
