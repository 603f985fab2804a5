/**
 * iotdb-mcp - Apache IoTDB MCP Server
 *
 * Core type definitions for configuration, session pooling
 * and tool registration.
 */

import type { ZodRawShape } from 'zod';

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * IoTDB SQL dialect: hierarchical path model or relational table model
 */
export type SqlDialect = 'tree' | 'table';

export const SQL_DIALECTS: readonly SqlDialect[] = ['tree', 'table'];

/**
 * IoTDB connection configuration, resolved once at startup
 */
export interface IoTDBConfig {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    /** Default database for the table dialect (empty means none) */
    readonly database: string;
    readonly sqlDialect: SqlDialect;
}

/**
 * Session pool statistics
 */
export interface PoolStats {
    /** Connections currently held by the pool */
    size: number;

    /** Idle connections ready to be handed out */
    available: number;

    /** Connections checked out by in-flight requests */
    borrowed: number;

    /** Acquirers waiting for a connection */
    pending: number;

    /** Upper bound on pool size */
    max: number;
}

// =============================================================================
// Tool Types
// =============================================================================

/**
 * MCP Tool Annotations
 * @see https://modelcontextprotocol.io/specification/2025-06-18/server/tools
 */
export type ToolAnnotations = {
    /** Human-readable title for display */
    title?: string;
    /** Tool does not modify its environment (default: false) */
    readOnlyHint?: boolean;
    /** Tool may perform destructive updates (default: true) */
    destructiveHint?: boolean;
    /** Repeated calls with same args have no additional effect */
    idempotentHint?: boolean;
    /** Tool may interact with external systems (default: false) */
    openWorldHint?: boolean;
};

/**
 * Per-invocation context
 */
export interface RequestContext {
    /** Request timestamp */
    timestamp: Date;

    /** Request ID for tracing */
    requestId: string;
}

/**
 * Tool definition for registration
 */
export interface ToolDefinition {
    /** Unique tool name */
    name: string;

    /** Description consumed by the calling agent */
    description: string;

    /** Zod raw shape of the tool arguments */
    inputSchema: ZodRawShape;

    /** MCP behavior hints */
    annotations?: ToolAnnotations;

    /** Tool handler; resolves to the text payload */
    handler: (params: unknown, context: RequestContext) => Promise<string>;
}

export * from './errors.js';
