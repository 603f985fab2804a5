/**
 * IoTDB client binding - Table model session pool
 */

import type { RestClient } from './RestClient.js';
import { fromTableResponse } from './SessionDataSet.js';
import type { SessionDataSet } from './SessionDataSet.js';
import { BaseSessionPool, PooledSession, parsePayload } from './SessionPool.js';
import { TableQueryResponseSchema, UNBOUNDED_ROW_LIMIT } from './types.js';
import type { TablePoolConfig } from './types.js';

/**
 * Table model session: relational statements against `/rest/table/v1/query`
 */
export class TableSession extends PooledSession {
    constructor(
        client: RestClient,
        release: (client: RestClient) => Promise<void>,
        private readonly database: string | undefined
    ) {
        super(client, release);
    }

    override async executeQueryStatement(sql: string): Promise<SessionDataSet> {
        this.assertOpen();
        const body: Record<string, unknown> = { sql, row_limit: UNBOUNDED_ROW_LIMIT };
        if (this.database !== undefined) {
            body['database'] = this.database;
        }
        const payload = await this.client.post('/rest/table/v1/query', body);
        return fromTableResponse(parsePayload(TableQueryResponseSchema, payload));
    }
}

export class TableSessionPool extends BaseSessionPool<TableSession> {
    private readonly database: string | undefined;

    constructor(config: TablePoolConfig) {
        super(config);
        this.database = config.database;
    }

    protected override createSession(
        client: RestClient,
        release: (client: RestClient) => Promise<void>
    ): TableSession {
        return new TableSession(client, release, this.database);
    }
}
