/**
 * Unit tests for result formatting
 */

import { describe, it, expect } from 'vitest';
import { formatDataSet, formatFirstColumn, stringifyValue } from '../format.js';
import { RowRecord, SessionDataSet } from '../../iotdb/index.js';

function timeAligned(): SessionDataSet {
    return new SessionDataSet(
        ['Time', 'root.ln.wf01.wt01.status'],
        [new RowRecord(100, [1]), new RowRecord(200, [0])]
    );
}

describe('stringifyValue', () => {
    it('should print missing values as null', () => {
        expect(stringifyValue(null)).toBe('null');
        expect(stringifyValue(undefined)).toBe('null');
    });

    it('should not reformat values', () => {
        expect(stringifyValue(25.5)).toBe('25.5');
        expect(stringifyValue(true)).toBe('true');
        expect(stringifyValue('north')).toBe('north');
        expect(stringifyValue('')).toBe('');
    });
});

describe('formatDataSet', () => {
    it('should lead each row with its timestamp under a Time header', () => {
        expect(formatDataSet(timeAligned(), { leadingTimestamp: true })).toBe(
            'Time,root.ln.wf01.wt01.status\n100,1\n200,0'
        );
    });

    it('should print only fields when timestamps are not wanted', () => {
        expect(formatDataSet(timeAligned(), { leadingTimestamp: false })).toBe(
            'Time,root.ln.wf01.wt01.status\n1\n0'
        );
    });

    it('should print only fields when there is no Time column', () => {
        const dataSet = new SessionDataSet(
            ['Timeseries', 'Alias', 'Database'],
            [new RowRecord(null, ['root.ln.wf01.wt01.status', null, 'root.ln'])]
        );

        expect(formatDataSet(dataSet, { leadingTimestamp: true })).toBe(
            'Timeseries,Alias,Database\nroot.ln.wf01.wt01.status,null,root.ln'
        );
    });

    it('should print the header alone for an empty result', () => {
        const dataSet = new SessionDataSet(['time', 'region'], []);

        expect(formatDataSet(dataSet, { leadingTimestamp: false })).toBe('time,region');
    });

    it('should drain the cursor', () => {
        const dataSet = timeAligned();
        formatDataSet(dataSet, { leadingTimestamp: true });

        expect(dataSet.hasNext()).toBe(false);
    });
});

describe('formatFirstColumn', () => {
    it('should list the first column under the given header', () => {
        const dataSet = new SessionDataSet(
            ['TableName', 'TTL(ms)'],
            [new RowRecord(null, ['t1', 'INF']), new RowRecord(null, ['t2', 'INF'])]
        );

        expect(formatFirstColumn(dataSet, 'Tables_in_test')).toBe('Tables_in_test\nt1\nt2');
    });

    it('should print the header alone when there are no rows', () => {
        expect(formatFirstColumn(new SessionDataSet(['TableName'], []), 'Tables_in_test')).toBe(
            'Tables_in_test'
        );
    });
});
