/**
 * iotdb-mcp - MCP Server Wrapper
 *
 * Wraps the MCP SDK server with dialect adapter integration,
 * protocol logging and graceful shutdown support.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { DatabaseAdapter } from "../adapters/DatabaseAdapter.js";
import { getServerInstructions } from "../constants/ServerInstructions.js";
import { logger } from "../utils/logger.js";

export interface ServerConfig {
  name: string;
  version: string;
  adapter: DatabaseAdapter;
}

/**
 * IoTDB MCP Server
 */
export class IoTDBMcpServer {
  private readonly mcpServer: McpServer;
  private readonly adapter: DatabaseAdapter;
  private toolCount = 0;
  private started = false;

  constructor(config: ServerConfig) {
    this.adapter = config.adapter;

    this.mcpServer = new McpServer(
      {
        name: config.name,
        version: config.version,
      },
      {
        capabilities: {
          logging: {},
        },
        instructions: getServerInstructions(config.adapter.dialect),
      },
    );

    logger.setLoggerName(config.name);

    logger.info("MCP Server initialized", {
      name: config.name,
      version: config.version,
      dialect: config.adapter.dialect,
    });
  }

  /**
   * Register the adapter's tools and connect the transport
   * (stdio unless one is supplied)
   */
  async start(transport: Transport = new StdioServerTransport()): Promise<void> {
    this.toolCount = this.adapter.registerTools(this.mcpServer);

    await this.mcpServer.connect(transport);
    this.started = true;

    // Forward log records to the client now that a peer is attached
    logger.setMcpServer(this.mcpServer.server);

    logger.info("MCP Server started", {
      module: "TRANSPORT",
      tools: this.toolCount,
    });
  }

  /**
   * Gracefully stop the server
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    logger.info("Stopping MCP Server...");
    logger.setMcpServer(null);
    this.started = false;

    await this.mcpServer.close();
    logger.info("MCP Server stopped");
  }

  getMcpServer(): McpServer {
    return this.mcpServer;
  }

  getAdapter(): DatabaseAdapter {
    return this.adapter;
  }

  getToolCount(): number {
    return this.toolCount;
  }
}
