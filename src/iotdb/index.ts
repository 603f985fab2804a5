/**
 * IoTDB client binding over the REST service
 */

export { RestClient, toBaseUrl } from './RestClient.js';
export { RowRecord, SessionDataSet, TIME_COLUMN, fromTableResponse, fromTreeResponse } from './SessionDataSet.js';
export { BaseSessionPool, PooledSession, TreeSession, TreeSessionPool } from './SessionPool.js';
export type { Session } from './SessionPool.js';
export { TableSession, TableSessionPool } from './TableSessionPool.js';
export type { BasePoolConfig, FieldValue, TablePoolConfig, Timestamp, TreePoolConfig } from './types.js';
