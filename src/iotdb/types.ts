/**
 * IoTDB client binding - Types
 *
 * Wire shapes of the IoTDB REST service and the configuration
 * accepted by the two session pool flavours.
 */

import { z } from 'zod';

// =============================================================================
// Wire Schemas
// =============================================================================

/**
 * Integers beyond Number.MAX_SAFE_INTEGER arrive as bigint
 */
const NumericSchema = z.union([z.number(), z.bigint()]);

export const FieldValueSchema = z.union([z.string(), NumericSchema, z.boolean(), z.null()]);

/**
 * A single column value as decoded from the REST payload
 */
export type FieldValue = z.infer<typeof FieldValueSchema>;

/**
 * Row time in the server's precision (ms, us or ns since the epoch)
 */
export type Timestamp = z.infer<typeof NumericSchema>;

/**
 * Tree model query response (`/rest/v2/query`).
 *
 * `values` is column-major: one array per expression / column name.
 * `timestamps` is present for time-aligned results and null for
 * metadata statements such as SHOW TIMESERIES.
 */
export const TreeQueryResponseSchema = z.object({
    expressions: z.array(z.string()).nullable().default(null),
    column_names: z.array(z.string()).nullable().default(null),
    timestamps: z.array(NumericSchema).nullable().default(null),
    values: z.array(z.array(FieldValueSchema)).default([])
});

export type TreeQueryResponse = z.infer<typeof TreeQueryResponseSchema>;

/**
 * Table model query response (`/rest/table/v1/query`).
 *
 * `values` is row-major.
 */
export const TableQueryResponseSchema = z.object({
    column_names: z.array(z.string()),
    data_types: z.array(z.string()).default([]),
    values: z.array(z.array(FieldValueSchema)).default([])
});

export type TableQueryResponse = z.infer<typeof TableQueryResponseSchema>;

/**
 * Status body returned for rejected statements and failed logins
 */
export const StatusResponseSchema = z.object({
    code: z.number(),
    message: z.string().nullable().default(null)
});

/**
 * IoTDB success status code
 */
export const SUCCESS_STATUS = 200;

// =============================================================================
// Pool Configuration
// =============================================================================

/**
 * Settings shared by both pool flavours
 */
export interface BasePoolConfig {
    /** `host:port` addresses of the IoTDB REST endpoints */
    nodeUrls: string[];
    username: string;
    password: string;
    /** Connection attempts per request, rotating through nodeUrls */
    maxRetry?: number;
    /** Maximum concurrent sessions */
    maxPoolSize?: number;
    /** How long `getSession()` waits for a free session */
    waitTimeoutInMs?: number;
}

/**
 * Tree model pool settings
 */
export interface TreePoolConfig extends BasePoolConfig {
    /** Paging batch size reported by the session; not sent to the server */
    fetchSize?: number;
    /** Session time zone, e.g. `UTC+8` */
    timeZone?: string;
}

/**
 * Table model pool settings
 */
export interface TablePoolConfig extends BasePoolConfig {
    /** Default database for statements; undefined means none */
    database?: string | undefined;
}

/**
 * `row_limit` sent with every query. The server rejects a result larger
 * than the limit instead of truncating it, so ask for the largest value
 * its Java int field holds.
 */
export const UNBOUNDED_ROW_LIMIT = 2_147_483_647;

export const DEFAULT_MAX_RETRY = 3;
export const DEFAULT_MAX_POOL_SIZE = 5;
export const DEFAULT_WAIT_TIMEOUT_MS = 60_000;
export const DEFAULT_FETCH_SIZE = 5000;
export const DEFAULT_TIME_ZONE = 'UTC+8';
