/**
 * IoTDB client binding - Session pools
 *
 * Bounded pools of REST connections (generic-pool) handing out
 * query-capable sessions. A session is exclusive to its caller until
 * `close()`, which returns the connection; closing twice is a no-op.
 */

import genericPool from 'generic-pool';
import type { Pool } from 'generic-pool';
import type { z } from 'zod';
import { PoolError, QueryError } from '../types/errors.js';
import type { PoolStats } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { RestClient } from './RestClient.js';
import { fromTreeResponse } from './SessionDataSet.js';
import type { SessionDataSet } from './SessionDataSet.js';
import {
    DEFAULT_FETCH_SIZE,
    DEFAULT_MAX_POOL_SIZE,
    DEFAULT_MAX_RETRY,
    DEFAULT_TIME_ZONE,
    DEFAULT_WAIT_TIMEOUT_MS,
    TreeQueryResponseSchema,
    UNBOUNDED_ROW_LIMIT
} from './types.js';
import type { BasePoolConfig, TreePoolConfig } from './types.js';

const log = logger.forModule('POOL');

/**
 * Validate a REST payload against its wire schema
 */
export function parsePayload<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.output<T> {
    const result = schema.safeParse(payload);
    if (!result.success) {
        throw new QueryError('Unexpected IoTDB response shape', {
            issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        });
    }
    return result.data;
}

/**
 * A checked-out connection able to run statements
 */
export interface Session {
    executeQueryStatement(sql: string): Promise<SessionDataSet>;
    close(): Promise<void>;
    isOpen(): boolean;
}

/**
 * Common lease handling: the connection goes back to the pool exactly once
 */
export abstract class PooledSession implements Session {
    private open = true;

    constructor(
        protected readonly client: RestClient,
        private readonly release: (client: RestClient) => Promise<void>
    ) { }

    abstract executeQueryStatement(sql: string): Promise<SessionDataSet>;

    isOpen(): boolean {
        return this.open;
    }

    async close(): Promise<void> {
        if (!this.open) {
            return;
        }
        this.open = false;
        await this.release(this.client);
    }

    protected assertOpen(): void {
        if (!this.open) {
            throw new PoolError('Session is closed');
        }
    }
}

/**
 * Pool mechanics shared by the tree and table flavours
 */
export abstract class BaseSessionPool<S extends Session> {
    private readonly pool: Pool<RestClient>;
    private created = 0;
    private closed = false;

    protected constructor(config: BasePoolConfig) {
        const maxRetry = config.maxRetry ?? DEFAULT_MAX_RETRY;

        this.pool = genericPool.createPool<RestClient>(
            {
                create: () => {
                    // Stagger the first node so connections spread across the cluster
                    const client = new RestClient({
                        nodeUrls: config.nodeUrls,
                        username: config.username,
                        password: config.password,
                        maxRetry,
                        startIndex: this.created++
                    });
                    return Promise.resolve(client);
                },
                destroy: () => Promise.resolve()
            },
            {
                max: config.maxPoolSize ?? DEFAULT_MAX_POOL_SIZE,
                min: 0,
                acquireTimeoutMillis: config.waitTimeoutInMs ?? DEFAULT_WAIT_TIMEOUT_MS
            }
        );
    }

    protected abstract createSession(
        client: RestClient,
        release: (client: RestClient) => Promise<void>
    ): S;

    /**
     * Check out a session, waiting up to the configured wait timeout
     */
    async getSession(): Promise<S> {
        if (this.closed) {
            throw new PoolError('Session pool is closed');
        }

        let client: RestClient;
        try {
            client = await this.pool.acquire();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            log.warn('Failed to acquire session', { error: message, ...this.getStats() });
            throw new PoolError(`Failed to acquire session: ${message}`);
        }

        return this.createSession(client, (released) => this.pool.release(released));
    }

    getStats(): PoolStats {
        return {
            size: this.pool.size,
            available: this.pool.available,
            borrowed: this.pool.borrowed,
            pending: this.pool.pending,
            max: this.pool.max
        };
    }

    /**
     * Wait for borrowed sessions to come back, then drop every connection
     */
    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        await this.pool.drain();
        await this.pool.clear();
    }

    isClosed(): boolean {
        return this.closed;
    }
}

/**
 * Tree model session: path-based statements against `/rest/v2/query`
 */
export class TreeSession extends PooledSession {
    constructor(
        client: RestClient,
        release: (client: RestClient) => Promise<void>,
        private readonly fetchSize: number,
        private readonly timeZone: string
    ) {
        super(client, release);
    }

    getTimeZone(): string {
        return this.timeZone;
    }

    getFetchSize(): number {
        return this.fetchSize;
    }

    override async executeQueryStatement(sql: string): Promise<SessionDataSet> {
        this.assertOpen();
        const payload = await this.client.post('/rest/v2/query', {
            sql,
            row_limit: UNBOUNDED_ROW_LIMIT
        });
        return fromTreeResponse(parsePayload(TreeQueryResponseSchema, payload));
    }
}

export class TreeSessionPool extends BaseSessionPool<TreeSession> {
    private readonly fetchSize: number;
    private readonly timeZone: string;

    constructor(config: TreePoolConfig) {
        super(config);
        this.fetchSize = config.fetchSize ?? DEFAULT_FETCH_SIZE;
        this.timeZone = config.timeZone ?? DEFAULT_TIME_ZONE;
    }

    protected override createSession(
        client: RestClient,
        release: (client: RestClient) => Promise<void>
    ): TreeSession {
        return new TreeSession(client, release, this.fetchSize, this.timeZone);
    }
}
