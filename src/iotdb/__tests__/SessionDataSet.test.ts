/**
 * Unit tests for the result cursor and REST payload decoding
 */

import { describe, it, expect } from 'vitest';
import {
    RowRecord,
    SessionDataSet,
    fromTableResponse,
    fromTreeResponse
} from '../SessionDataSet.js';
import { QueryError } from '../../types/index.js';

describe('SessionDataSet', () => {
    it('should hand out rows once, in order', () => {
        const dataSet = new SessionDataSet(['a'], [new RowRecord(null, [1]), new RowRecord(null, [2])]);

        expect(dataSet.hasNext()).toBe(true);
        expect(dataSet.next().getFields()).toEqual([1]);
        expect(dataSet.next().getFields()).toEqual([2]);
        expect(dataSet.hasNext()).toBe(false);
    });

    it('should throw once exhausted', () => {
        const dataSet = new SessionDataSet(['a'], []);

        expect(dataSet.hasNext()).toBe(false);
        expect(() => dataSet.next()).toThrow(QueryError);
    });
});

describe('fromTreeResponse', () => {
    it('should transpose column-major values and prepend Time', () => {
        const dataSet = fromTreeResponse({
            expressions: ['root.ln.wf01.wt01.status', 'root.ln.wf01.wt01.temperature'],
            column_names: null,
            timestamps: [100, 200],
            values: [
                [true, false],
                [25.5, null]
            ]
        });

        expect(dataSet.getColumnNames()).toEqual([
            'Time',
            'root.ln.wf01.wt01.status',
            'root.ln.wf01.wt01.temperature'
        ]);

        const first = dataSet.next();
        expect(first.getTimestamp()).toBe(100);
        expect(first.getFields()).toEqual([true, 25.5]);

        const second = dataSet.next();
        expect(second.getTimestamp()).toBe(200);
        expect(second.getFields()).toEqual([false, null]);

        expect(dataSet.hasNext()).toBe(false);
    });

    it('should use column_names for metadata results without timestamps', () => {
        const dataSet = fromTreeResponse({
            expressions: null,
            column_names: ['Database', 'TTL'],
            timestamps: null,
            values: [
                ['root.ln', 'root.sg'],
                [null, 3600000]
            ]
        });

        expect(dataSet.getColumnNames()).toEqual(['Database', 'TTL']);

        const first = dataSet.next();
        expect(first.getTimestamp()).toBeNull();
        expect(first.getFields()).toEqual(['root.ln', null]);
        expect(dataSet.next().getFields()).toEqual(['root.sg', 3600000]);
        expect(dataSet.hasNext()).toBe(false);
    });

    it('should keep the header of an empty result', () => {
        const dataSet = fromTreeResponse({
            expressions: ['root.ln.wf01.wt01.status'],
            column_names: null,
            timestamps: [],
            values: [[]]
        });

        expect(dataSet.getColumnNames()).toEqual(['Time', 'root.ln.wf01.wt01.status']);
        expect(dataSet.hasNext()).toBe(false);
    });
});

describe('fromTableResponse', () => {
    it('should read row-major values without a separate timestamp', () => {
        const dataSet = fromTableResponse({
            column_names: ['time', 'region', 'temperature'],
            data_types: ['TIMESTAMP', 'STRING', 'FLOAT'],
            values: [
                [1700000000000, 'north', 21.5],
                [1700000060000, 'south', null]
            ]
        });

        expect(dataSet.getColumnNames()).toEqual(['time', 'region', 'temperature']);

        const first = dataSet.next();
        expect(first.getTimestamp()).toBeNull();
        expect(first.getFields()).toEqual([1700000000000, 'north', 21.5]);
        expect(dataSet.next().getFields()).toEqual([1700000060000, 'south', null]);
        expect(dataSet.hasNext()).toBe(false);
    });
});
