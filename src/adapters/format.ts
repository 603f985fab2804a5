/**
 * Result formatting
 *
 * Turns a result cursor into the comma-delimited text block returned
 * by every query tool.
 */

import type { FieldValue, SessionDataSet } from '../iotdb/index.js';
import { TIME_COLUMN } from '../iotdb/index.js';

export interface FormatOptions {
    /**
     * Prefix each row with its raw timestamp when the first column is
     * the tree model's `Time` column
     */
    leadingTimestamp: boolean;
}

/**
 * Canonical text form of a column value. Values are not reformatted;
 * missing values print as `null`.
 */
export function stringifyValue(value: FieldValue | undefined): string {
    return value === null || value === undefined ? 'null' : String(value);
}

/**
 * Header line of column names, then one line per row. Drains the cursor.
 */
export function formatDataSet(dataSet: SessionDataSet, options: FormatOptions): string {
    const columns = dataSet.getColumnNames();
    const withTimestamp = options.leadingTimestamp && columns[0] === TIME_COLUMN;

    const lines = [columns.join(',')];
    while (dataSet.hasNext()) {
        const record = dataSet.next();
        const fields = record.getFields().map(stringifyValue).join(',');
        lines.push(withTimestamp ? `${stringifyValue(record.getTimestamp())},${fields}` : fields);
    }
    return lines.join('\n');
}

/**
 * First column of every row under a fixed header line
 */
export function formatFirstColumn(dataSet: SessionDataSet, header: string): string {
    const lines = [header];
    while (dataSet.hasNext()) {
        lines.push(stringifyValue(dataSet.next().getFields()[0]));
    }
    return lines.join('\n');
}
