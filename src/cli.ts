#!/usr/bin/env node
/**
 * iotdb-mcp - CLI Entry Point
 *
 * Command-line interface for the IoTDB MCP server (stdio transport).
 */

import { Command } from "commander";
import { createAdapter } from "./adapters/index.js";
import { resolveArgs } from "./cli/args.js";
import type { CliOptions } from "./cli/args.js";
import { ConnectionPool } from "./pool/ConnectionPool.js";
import { IoTDBMcpServer } from "./server/McpServer.js";
import { logger } from "./utils/logger.js";
import { VERSION } from "./version.js";

const log = logger.forModule("CLI");

const program = new Command();

program
  .name("iotdb-mcp")
  .description("Apache IoTDB MCP Server - tree and table model query tools")
  .version(VERSION);

program
  .option("--host <host>", "IoTDB host (env IOTDB_HOST, default: 127.0.0.1)")
  .option("--port <port>", "IoTDB port (env IOTDB_PORT, default: 6667)")
  .option("--user <user>", "IoTDB username (env IOTDB_USER, default: root)")
  .option(
    "--password <password>",
    "IoTDB password (env IOTDB_PASSWORD, default: root)",
  )
  .option(
    "--database <database>",
    "IoTDB database for the table dialect (env IOTDB_DATABASE, default: test)",
  )
  .option(
    "--sql-dialect <dialect>",
    "SQL dialect: tree or table (env IOTDB_SQL_DIALECT, default: table)",
  )
  .option(
    "--log-level <level>",
    "Log level: debug, info, notice, warning, error, critical, alert, emergency (env LOG_LEVEL, default: info)",
  )
  .action(async (options: CliOptions) => {
    let pool: ConnectionPool | undefined;

    try {
      const { config, logLevel } = resolveArgs(options);
      logger.setLevel(logLevel);
      log.info("IoTDB config", { ...config });

      pool = new ConnectionPool(config);
      const adapter = createAdapter(pool, config);
      const server = new IoTDBMcpServer({
        name: "iotdb-mcp",
        version: VERSION,
        adapter,
      });

      const ownedPool = pool;
      const shutdown = (): void => {
        log.info("Shutting down...");
        server
          .stop()
          .then(() => ownedPool.shutdown())
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            log.error("Shutdown failed", {
              error: error instanceof Error ? error.message : String(error),
            });
            process.exit(1);
          });
      };

      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);

      await server.start();
      log.info("iotdb-mcp running with stdio transport");
    } catch (error) {
      log.error("Failed to start server", {
        error: error instanceof Error ? error.message : String(error),
        ...(error instanceof Error && error.stack !== undefined && { stack: error.stack }),
      });
      await pool?.shutdown();
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  log.error("Unexpected CLI failure", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
