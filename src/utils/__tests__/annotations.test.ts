/**
 * Unit tests for Tool Annotations Presets
 */

import { describe, it, expect } from 'vitest';
import { READ_ONLY, readOnly } from '../annotations.js';

describe('Tool Annotations Presets', () => {
    it('READ_ONLY should have correct flags', () => {
        expect(READ_ONLY).toEqual({
            readOnlyHint: true,
            destructiveHint: false,
            idempotentHint: true
        });
    });

    it('readOnly should add a title', () => {
        expect(readOnly('List Tables')).toEqual({
            title: 'List Tables',
            readOnlyHint: true,
            destructiveHint: false,
            idempotentHint: true
        });
    });
});
