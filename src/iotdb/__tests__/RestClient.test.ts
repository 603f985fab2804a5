/**
 * Unit tests for the IoTDB REST transport
 *
 * fetch is stubbed; no request leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConnectionError, QueryError } from '../../types/index.js';

vi.mock('../../utils/logger.js', () => {
    const moduleLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    return { logger: { ...moduleLogger, forModule: () => moduleLogger } };
});

import { RestClient, parseNumber, toBaseUrl } from '../RestClient.js';

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' }
    });
}

function calledUrls(): unknown[] {
    return fetchMock.mock.calls.map(call => call[0]);
}

describe('toBaseUrl', () => {
    it('should add http:// to a bare host:port', () => {
        expect(toBaseUrl('127.0.0.1:18080')).toBe('http://127.0.0.1:18080');
    });

    it('should keep an explicit scheme and drop trailing slashes', () => {
        expect(toBaseUrl('https://iotdb.local:18080//')).toBe('https://iotdb.local:18080');
    });
});

describe('parseNumber', () => {
    it('should keep safe numbers as numbers', () => {
        expect(parseNumber('1700000000000')).toBe(1700000000000);
        expect(parseNumber('-42')).toBe(-42);
        expect(parseNumber('25.5')).toBe(25.5);
    });

    it('should turn integers past 2^53 into bigint', () => {
        expect(parseNumber('9007199254740993')).toBe(9007199254740993n);
        expect(parseNumber('-9223372036854775808')).toBe(-9223372036854775808n);
    });
});

describe('RestClient', () => {
    beforeEach(() => {
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should require at least one node', () => {
        expect(() => new RestClient({
            nodeUrls: [],
            username: 'root',
            password: 'test-secret',
            maxRetry: 3
        })).toThrow(ConnectionError);
    });

    it('should POST JSON with basic authentication', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ column_names: ['a'], values: [] }));
        const client = new RestClient({
            nodeUrls: ['127.0.0.1:18080'],
            username: 'root',
            password: 'test-secret',
            maxRetry: 3
        });

        const payload = await client.post('/rest/v2/query', { sql: 'SHOW DATABASES', row_limit: 1024 });

        expect(payload).toEqual({ column_names: ['a'], values: [] });
        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(fetchMock).toHaveBeenCalledWith('http://127.0.0.1:18080/rest/v2/query', {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                Authorization: `Basic ${Buffer.from('root:test-secret').toString('base64')}`
            },
            body: '{"sql":"SHOW DATABASES","row_limit":1024}'
        });
    });

    it('should start at the given node index', async () => {
        fetchMock.mockResolvedValue(jsonResponse({}));
        const client = new RestClient({
            nodeUrls: ['a:1', 'b:2'],
            username: 'root',
            password: 'test-secret',
            maxRetry: 3,
            startIndex: 3
        });

        expect(client.getCurrentNode()).toBe('http://b:2');
        await client.post('/ping', {});
        expect(calledUrls()).toEqual(['http://b:2/ping']);
    });

    it('should retry a network failure on the next node', async () => {
        fetchMock
            .mockRejectedValueOnce(new TypeError('fetch failed'))
            .mockResolvedValueOnce(jsonResponse({ ok: 1 }));
        const client = new RestClient({
            nodeUrls: ['a:1', 'b:2'],
            username: 'root',
            password: 'test-secret',
            maxRetry: 3
        });

        await expect(client.post('/q', {})).resolves.toEqual({ ok: 1 });
        expect(calledUrls()).toEqual(['http://a:1/q', 'http://b:2/q']);
        expect(client.getCurrentNode()).toBe('http://b:2');
    });

    it('should give up after maxRetry attempts', async () => {
        fetchMock.mockRejectedValue(new TypeError('fetch failed'));
        const client = new RestClient({
            nodeUrls: ['a:1', 'b:2'],
            username: 'root',
            password: 'test-secret',
            maxRetry: 3
        });

        const attempt = client.post('/q', {});
        await expect(attempt).rejects.toBeInstanceOf(ConnectionError);
        await expect(attempt).rejects.toThrow('Failed to reach IoTDB after 3 attempt(s): fetch failed');
        expect(calledUrls()).toEqual(['http://a:1/q', 'http://b:2/q', 'http://a:1/q']);
    });

    it('should make one attempt when maxRetry is zero', async () => {
        fetchMock.mockRejectedValue(new TypeError('fetch failed'));
        const client = new RestClient({
            nodeUrls: ['a:1'],
            username: 'root',
            password: 'test-secret',
            maxRetry: 0
        });

        await expect(client.post('/q', {})).rejects.toThrow(
            'Failed to reach IoTDB after 1 attempt(s): fetch failed'
        );
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should raise the server message for an error status without retrying', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ code: 700, message: 'line 1:0 mismatched input' }));
        const client = new RestClient({
            nodeUrls: ['a:1', 'b:2'],
            username: 'root',
            password: 'test-secret',
            maxRetry: 3
        });

        const attempt = client.post('/q', {});
        await expect(attempt).rejects.toBeInstanceOf(QueryError);
        await expect(attempt).rejects.toThrow('line 1:0 mismatched input');
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should pass through a success status body', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ code: 200, message: 'SUCCESS_STATUS' }));
        const client = new RestClient({
            nodeUrls: ['a:1'],
            username: 'root',
            password: 'test-secret',
            maxRetry: 1
        });

        await expect(client.post('/q', {})).resolves.toEqual({ code: 200, message: 'SUCCESS_STATUS' });
    });

    it('should reject a non-JSON response', async () => {
        fetchMock.mockResolvedValue(new Response('<html>Bad Gateway</html>', { status: 502 }));
        const client = new RestClient({
            nodeUrls: ['a:1'],
            username: 'root',
            password: 'test-secret',
            maxRetry: 1
        });

        await expect(client.post('/q', {})).rejects.toThrow('IoTDB returned a non-JSON response (HTTP 502)');
    });

    it('should reject an HTTP error without a status body', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ error: 'Internal' }, 500));
        const client = new RestClient({
            nodeUrls: ['a:1'],
            username: 'root',
            password: 'test-secret',
            maxRetry: 1
        });

        await expect(client.post('/q', {})).rejects.toThrow('IoTDB request failed with HTTP 500');
    });

    it('should decode large integers without rounding', async () => {
        fetchMock.mockResolvedValue(new Response('{"values":[[9223372036854775807,1]]}', { status: 200 }));
        const client = new RestClient({
            nodeUrls: ['a:1'],
            username: 'root',
            password: 'test-secret',
            maxRetry: 1
        });

        await expect(client.post('/q', {})).resolves.toEqual({ values: [[9223372036854775807n, 1]] });
    });
});
