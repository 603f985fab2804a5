/**
 * iotdb-mcp - Dialect Adapter Base
 *
 * Abstract base class for the per-dialect tool sets. A concrete adapter
 * is chosen once at startup and carries exactly the tools of its dialect.
 */

import { randomUUID } from "node:crypto";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { SessionDataSet } from "../iotdb/index.js";
import type { ConnectionPool } from "../pool/ConnectionPool.js";
import type {
  IoTDBConfig,
  RequestContext,
  SqlDialect,
  ToolDefinition,
} from "../types/index.js";
import { logger } from "../utils/logger.js";

const queryLog = logger.forModule("QUERY");

/**
 * Abstract base class for dialect adapters
 */
export abstract class DatabaseAdapter {
  /** Dialect served by this adapter */
  abstract readonly dialect: SqlDialect;

  /** Human-readable adapter name */
  abstract readonly name: string;

  constructor(
    protected readonly pool: ConnectionPool,
    protected readonly config: IoTDBConfig,
  ) {}

  /**
   * Get all tool definitions for this adapter
   */
  abstract getToolDefinitions(): ToolDefinition[];

  // =========================================================================
  // MCP Registration
  // =========================================================================

  /**
   * Register every tool of this dialect with the MCP server
   */
  registerTools(server: McpServer): number {
    const tools = this.getToolDefinitions();
    for (const tool of tools) {
      this.registerTool(server, tool);
    }

    logger.info(
      `Registered ${String(tools.length)} tools from ${this.name}`,
      { module: "ADAPTER", tools: tools.map((t) => t.name) },
    );
    return tools.length;
  }

  /**
   * Register a single tool with the MCP server
   */
  protected registerTool(server: McpServer, tool: ToolDefinition): void {
    server.registerTool(
      tool.name,
      {
        description: tool.description,
        inputSchema: tool.inputSchema,
        ...(tool.annotations && { annotations: tool.annotations }),
        ...(tool.annotations?.title !== undefined && {
          title: tool.annotations.title,
        }),
      },
      async (params: unknown) => {
        const context = this.createContext();
        const text = await tool.handler(params, context);
        return {
          content: [{ type: "text" as const, text }],
        };
      },
    );
  }

  // =========================================================================
  // Query Execution
  // =========================================================================

  /**
   * Execute `sql` on a pooled session and read the result with `read`.
   * The session is released whether execution succeeds or throws.
   */
  protected async runQuery<T>(
    tool: string,
    sql: string,
    context: RequestContext,
    read: (dataSet: SessionDataSet) => T,
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await this.pool.withSession(async (session) => {
        const dataSet = await session.executeQueryStatement(sql);
        return read(dataSet);
      });

      queryLog.debug("Query executed", {
        tool,
        requestId: context.requestId,
        sql: sql.substring(0, 200),
        durationMs: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      queryLog.error("Query failed", {
        tool,
        requestId: context.requestId,
        sql: sql.substring(0, 200),
        error: error instanceof Error ? error.message : String(error),
        ...(error instanceof Error &&
          "code" in error &&
          typeof error.code === "string" && { code: error.code }),
      });
      throw error;
    }
  }

  /**
   * Create a request context for tool execution
   */
  createContext(requestId?: string): RequestContext {
    return {
      timestamp: new Date(),
      requestId: requestId ?? randomUUID(),
    };
  }

  /**
   * Get adapter info for logging/debugging
   */
  getInfo(): Record<string, unknown> {
    return {
      dialect: this.dialect,
      name: this.name,
      tools: this.getToolDefinitions().map((t) => t.name),
    };
  }
}
