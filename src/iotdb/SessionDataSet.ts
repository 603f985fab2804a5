/**
 * IoTDB client binding - Result cursor
 *
 * A forward-only, single-pass view over one query result. Rows are
 * decoded from the REST payload when the statement completes and handed
 * out one at a time; once exhausted the cursor cannot be rewound.
 */

import { QueryError } from '../types/errors.js';
import type { FieldValue, TableQueryResponse, Timestamp, TreeQueryResponse } from './types.js';

/**
 * Name of the leading time column in time-aligned tree results
 */
export const TIME_COLUMN = 'Time';

/**
 * One result row
 */
export class RowRecord {
    constructor(
        private readonly timestamp: Timestamp | null,
        private readonly fields: readonly FieldValue[]
    ) { }

    /**
     * Row time as the server sent it; null for results without a time column
     */
    getTimestamp(): Timestamp | null {
        return this.timestamp;
    }

    /**
     * Column values, excluding the timestamp
     */
    getFields(): readonly FieldValue[] {
        return this.fields;
    }
}

export class SessionDataSet {
    private cursor = 0;

    constructor(
        private readonly columnNames: readonly string[],
        private readonly rows: readonly RowRecord[]
    ) { }

    getColumnNames(): readonly string[] {
        return this.columnNames;
    }

    hasNext(): boolean {
        return this.cursor < this.rows.length;
    }

    next(): RowRecord {
        const row = this.rows[this.cursor];
        if (row === undefined) {
            throw new QueryError('Result set exhausted');
        }
        this.cursor++;
        return row;
    }
}

/**
 * Decode a tree model response. Time-aligned results get a leading
 * `Time` column; the timestamp itself travels on each RowRecord.
 */
export function fromTreeResponse(response: TreeQueryResponse): SessionDataSet {
    const columns = response.expressions ?? response.column_names ?? [];
    const timestamps = response.timestamps;
    const rowCount = timestamps?.length ?? response.values[0]?.length ?? 0;

    const rows: RowRecord[] = [];
    for (let r = 0; r < rowCount; r++) {
        const fields = response.values.map(column => column[r] ?? null);
        rows.push(new RowRecord(timestamps?.[r] ?? null, fields));
    }

    const columnNames = timestamps !== null ? [TIME_COLUMN, ...columns] : [...columns];
    return new SessionDataSet(columnNames, rows);
}

/**
 * Decode a table model response. Time is an ordinary column here.
 */
export function fromTableResponse(response: TableQueryResponse): SessionDataSet {
    const rows = response.values.map(values => new RowRecord(null, values));
    return new SessionDataSet([...response.column_names], rows);
}
