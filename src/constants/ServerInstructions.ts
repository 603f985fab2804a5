/**
 * Server instructions sent to MCP clients during initialization,
 * one set per SQL dialect.
 */

import type { SqlDialect } from "../types/index.js";

const TREE_INSTRUCTIONS = `# iotdb-mcp (tree dialect)

Data is organised as paths: \`root.<database>.<device>.<measurement>\`.

1. Explore structure with \`metadata_query\` (SHOW DATABASES, SHOW DEVICES, SHOW TIMESERIES, SHOW CHILD PATHS/NODES, COUNT ...).
2. Read data with \`select_query\` (SELECT only).

Results are comma-separated text with a header line. Time-aligned results start with a \`Time\` column holding the raw epoch timestamp. Add LIMIT to large selects: every matching row is returned.`;

const TABLE_INSTRUCTIONS = `# iotdb-mcp (table dialect)

Data is organised as relational tables inside a database.

1. \`list_tables\` lists the tables of the configured database.
2. \`describe_table\` shows the columns of one table.
3. \`read_query\` runs SELECT, SHOW or DESCRIBE statements.

Results are comma-separated text with a header line.`;

export function getServerInstructions(dialect: SqlDialect): string {
  return dialect === "tree" ? TREE_INSTRUCTIONS : TABLE_INSTRUCTIONS;
}
