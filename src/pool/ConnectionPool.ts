/**
 * iotdb-mcp - Session Pool Manager
 *
 * Owns the process-wide IoTDB session pool for the configured dialect
 * and hands out sessions with guaranteed release.
 */

import { TableSessionPool, TreeSessionPool } from '../iotdb/index.js';
import type { Session } from '../iotdb/index.js';
import type { IoTDBConfig, PoolStats, SqlDialect } from '../types/index.js';
import { PoolError } from '../types/index.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('POOL');

/**
 * Fixed tree model pool settings
 */
export const TREE_POOL_SETTINGS = {
    fetchSize: 1024,
    timeZone: 'UTC+8',
    maxRetry: 3,
    maxPoolSize: 5,
    waitTimeoutInMs: 3000
} as const;

/**
 * What the manager needs from an underlying pool
 */
export interface SessionSource {
    getSession(): Promise<Session>;
    getStats(): PoolStats;
    close(): Promise<void>;
}

/**
 * Build the pool for the configured dialect. Only that dialect's pool
 * is ever constructed.
 */
export function createSessionSource(config: IoTDBConfig): SessionSource {
    const nodeUrls = [`${config.host}:${String(config.port)}`];

    switch (config.sqlDialect) {
        case 'tree':
            return new TreeSessionPool({
                nodeUrls,
                username: config.user,
                password: config.password,
                ...TREE_POOL_SETTINGS
            });
        case 'table':
            return new TableSessionPool({
                nodeUrls,
                username: config.user,
                password: config.password,
                database: config.database.length === 0 ? undefined : config.database
            });
    }
}

/**
 * Session pool wrapper with scoped acquisition and graceful shutdown
 */
export class ConnectionPool {
    readonly dialect: SqlDialect;
    private readonly source: SessionSource;
    private shuttingDown = false;
    private totalQueries = 0;

    constructor(config: IoTDBConfig, source?: SessionSource) {
        this.dialect = config.sqlDialect;
        this.source = source ?? createSessionSource(config);

        log.info('Session pool created', {
            dialect: config.sqlDialect,
            host: config.host,
            port: config.port
        });
    }

    /**
     * Check out a session. The caller owns it until `release()`.
     */
    async acquire(): Promise<Session> {
        if (this.shuttingDown) {
            throw new PoolError('Session pool is shutting down');
        }
        return this.source.getSession();
    }

    /**
     * Return a session to the pool
     */
    async release(session: Session): Promise<void> {
        await session.close();
    }

    /**
     * Run `fn` with a checked-out session; the session is released on
     * every exit path.
     */
    async withSession<T>(fn: (session: Session) => Promise<T>): Promise<T> {
        const session = await this.acquire();
        this.totalQueries++;
        try {
            return await fn(session);
        } finally {
            await this.release(session);
        }
    }

    getStats(): PoolStats & { totalQueries: number } {
        return { ...this.source.getStats(), totalQueries: this.totalQueries };
    }

    /**
     * Drain and close the underlying pool. Safe to call more than once.
     */
    async shutdown(): Promise<void> {
        if (this.shuttingDown) {
            return;
        }

        log.info('Shutting down session pool...');
        this.shuttingDown = true;

        try {
            await this.source.close();
            log.info('Session pool shut down successfully');
        } catch (error) {
            log.error('Error during pool shutdown', {
                error: error instanceof Error ? error.message : 'Unknown error'
            });
            throw error;
        }
    }

    isClosing(): boolean {
        return this.shuttingDown;
    }
}
