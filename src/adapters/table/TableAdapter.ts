/**
 * iotdb-mcp - Table Dialect Adapter
 */

import type { RequestContext, SqlDialect, ToolDefinition } from "../../types/index.js";
import { DatabaseAdapter } from "../DatabaseAdapter.js";
import { formatDataSet, formatFirstColumn } from "../format.js";
import { getTableTools } from "./tools.js";

export class TableAdapter extends DatabaseAdapter {
  override readonly dialect: SqlDialect = "table";
  override readonly name = "IoTDB Table Adapter";

  override getToolDefinitions(): ToolDefinition[] {
    return getTableTools(this);
  }

  async query(tool: string, sql: string, context: RequestContext): Promise<string> {
    return this.runQuery(tool, sql, context, (dataSet) =>
      formatDataSet(dataSet, { leadingTimestamp: false }),
    );
  }

  /**
   * `SHOW TABLES` under a `Tables_in_<database>` header
   */
  async listTables(context: RequestContext): Promise<string> {
    return this.runQuery("list_tables", "SHOW TABLES", context, (dataSet) =>
      formatFirstColumn(dataSet, `Tables_in_${this.config.database}`),
    );
  }
}
