/**
 * iotdb-mcp - Tool Input Schemas
 *
 * Each tool takes at most one string argument. Shapes are registered
 * with the MCP SDK; the object schemas validate at call time.
 */

import { z } from 'zod';

export const QuerySqlShape = {
    query_sql: z.string().describe('The SQL statement to execute')
};

export const QuerySqlSchema = z.object(QuerySqlShape);

export const TableNameShape = {
    table_name: z.string().describe('Name of the table to describe')
};

export const TableNameSchema = z.object(TableNameShape);

export const NoArgumentsShape = {};
