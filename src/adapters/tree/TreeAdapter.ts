/**
 * iotdb-mcp - Tree Dialect Adapter
 */

import type { RequestContext, SqlDialect, ToolDefinition } from "../../types/index.js";
import { DatabaseAdapter } from "../DatabaseAdapter.js";
import { formatDataSet } from "../format.js";
import { getTreeTools } from "./tools.js";

export class TreeAdapter extends DatabaseAdapter {
  override readonly dialect: SqlDialect = "tree";
  override readonly name = "IoTDB Tree Adapter";

  override getToolDefinitions(): ToolDefinition[] {
    return getTreeTools(this);
  }

  /**
   * Run a tree dialect statement; time-aligned rows lead with the timestamp
   */
  async query(tool: string, sql: string, context: RequestContext): Promise<string> {
    return this.runQuery(tool, sql, context, (dataSet) =>
      formatDataSet(dataSet, { leadingTimestamp: true }),
    );
  }
}
