/**
 * Tree Dialect Tools
 *
 * Metadata exploration and SELECT queries over the hierarchical
 * path model (root.<database>.<device>.<measurement>).
 */

import type { TreeAdapter } from "./TreeAdapter.js";
import type { ToolDefinition, RequestContext } from "../../types/index.js";
import { readOnly } from "../../utils/annotations.js";
import { QuerySqlSchema, QuerySqlShape } from "../schemas.js";
import { assertStatementPrefix } from "../validation.js";

export const METADATA_PREFIXES = [
  "SHOW DATABASES",
  "SHOW TIMESERIES",
  "SHOW CHILD PATHS",
  "SHOW CHILD NODES",
  "SHOW DEVICES",
  "COUNT TIMESERIES",
  "COUNT NODES",
  "COUNT DEVICES",
] as const;

const METADATA_DESCRIPTION = `Execute metadata queries on IoTDB to explore database structure and statistics.

Supported statements (path defaults to root.** when omitted):
- SHOW DATABASES [path]: list databases, optionally under a path
- SHOW TIMESERIES [path]: list time series
- SHOW CHILD PATHS [path]: list child paths of a path
- SHOW CHILD NODES [path]: list child nodes of a path
- SHOW DEVICES [path]: list devices
- COUNT TIMESERIES [path]: count time series
- COUNT NODES [path]: count nodes
- COUNT DEVICES [path]: count devices

Examples:
  SHOW DATABASES root.**
  SHOW TIMESERIES root.ln.**
  SHOW CHILD PATHS root.ln.*.*
  SHOW CHILD NODES root.ln
  SHOW DEVICES root.ln.**
  COUNT TIMESERIES root.ln.**
  COUNT NODES root.ln
  COUNT DEVICES root.ln

Returns comma-separated text: a header line, then one line per result row.`;

const SELECT_DESCRIPTION = `Execute a SELECT query using the IoTDB tree SQL dialect.

Syntax:
  SELECT [LAST] selectExpr [, selectExpr] ...
    [INTO intoItem [, intoItem] ...]
    FROM prefixPath [, prefixPath] ...
    [WHERE whereCondition]
    [GROUP BY {
      ([startTime, endTime), interval [, slidingStep]) |
      LEVEL = levelNum [, levelNum] ... |
      TAGS(tagKey [, tagKey] ...) |
      VARIATION(expression [, delta] [, ignoreNull=true/false]) |
      CONDITION(expression, [keep>/>=/=/</<=]threshold [, ignoreNull=true/false]) |
      SESSION(timeInterval) |
      COUNT(expression, size [, ignoreNull=true/false])
    }]
    [HAVING havingCondition]
    [ORDER BY sortKey {ASC | DESC}]
    [FILL ({PREVIOUS | LINEAR | constant}) (, interval=DURATION_LITERAL)?)]
    [SLIMIT seriesLimit] [SOFFSET seriesOffset]
    [LIMIT rowLimit] [OFFSET rowOffset]
    [ALIGN BY {TIME | DEVICE}]

Examples:
  select temperature from root.ln.wf01.wt01 where time < 2017-11-01T00:08:00.000
  select status, temperature from root.ln.wf01.wt01 where time > 2017-11-01T00:05:00.000 and time < 2017-11-01T00:12:00.000
  select * from root.ln.** where time > 1 order by time desc limit 10

Aggregate functions include SUM, COUNT, MAX_VALUE, MIN_VALUE, AVG, VARIANCE, MAX_TIME, MIN_TIME.

Returns comma-separated text; time-aligned rows start with the raw timestamp.`;

/**
 * Metadata statements (SHOW / COUNT)
 */
export function createMetadataQueryTool(adapter: TreeAdapter): ToolDefinition {
  return {
    name: "metadata_query",
    description: METADATA_DESCRIPTION,
    inputSchema: QuerySqlShape,
    annotations: readOnly("Metadata Query"),
    handler: async (params: unknown, context: RequestContext) => {
      const { query_sql } = QuerySqlSchema.parse(params);
      assertStatementPrefix(
        query_sql,
        METADATA_PREFIXES,
        "Unsupported metadata query. Please use one of the supported query types.",
      );
      return adapter.query("metadata_query", query_sql, context);
    },
  };
}

/**
 * Tree dialect SELECT
 */
export function createSelectQueryTool(adapter: TreeAdapter): ToolDefinition {
  return {
    name: "select_query",
    description: SELECT_DESCRIPTION,
    inputSchema: QuerySqlShape,
    annotations: readOnly("Select Query"),
    handler: async (params: unknown, context: RequestContext) => {
      const { query_sql } = QuerySqlSchema.parse(params);
      assertStatementPrefix(
        query_sql,
        ["SELECT"],
        "Only SELECT queries are allowed for select_query",
      );
      return adapter.query("select_query", query_sql, context);
    },
  };
}

/**
 * Get all tree dialect tools
 */
export function getTreeTools(adapter: TreeAdapter): ToolDefinition[] {
  return [createMetadataQueryTool(adapter), createSelectQueryTool(adapter)];
}
