/**
 * IoTDB client binding - REST transport
 *
 * Posts JSON statements to the IoTDB REST service with HTTP Basic
 * authentication. A request that fails at the network level is retried
 * on the next node in the list, up to `maxRetry` attempts in total.
 * Statement errors reported by the server are never retried.
 */

import { isInteger, isSafeNumber, parse } from 'lossless-json';
import { ConnectionError, QueryError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { StatusResponseSchema, SUCCESS_STATUS } from './types.js';

const log = logger.forModule('CLIENT');

export interface RestClientOptions {
    nodeUrls: readonly string[];
    username: string;
    password: string;
    maxRetry: number;
    /** Index into nodeUrls of the first node to try */
    startIndex?: number;
}

/**
 * Normalize a `host:port` node address into a base URL
 */
export function toBaseUrl(nodeUrl: string): string {
    const withScheme = /^https?:\/\//i.test(nodeUrl) ? nodeUrl : `http://${nodeUrl}`;
    return withScheme.replace(/\/+$/, '');
}

/**
 * Number parser for response bodies: integers that do not fit a double
 * become bigint so INT64 values keep every digit
 */
export function parseNumber(value: string): number | bigint {
    return isInteger(value) && !isSafeNumber(value) ? BigInt(value) : Number(value);
}

export class RestClient {
    private readonly baseUrls: string[];
    private readonly authorization: string;
    private readonly attempts: number;
    private nodeIndex: number;

    constructor(options: RestClientOptions) {
        if (options.nodeUrls.length === 0) {
            throw new ConnectionError('At least one IoTDB node URL is required');
        }
        this.baseUrls = options.nodeUrls.map(toBaseUrl);
        this.authorization = `Basic ${Buffer.from(`${options.username}:${options.password}`).toString('base64')}`;
        this.attempts = Math.max(1, options.maxRetry);
        this.nodeIndex = (options.startIndex ?? 0) % this.baseUrls.length;
    }

    /**
     * Base URL of the node the next request goes to
     */
    getCurrentNode(): string {
        return this.baseUrls[this.nodeIndex] ?? '';
    }

    /**
     * POST a JSON body and return the decoded JSON response.
     * Throws QueryError for a server-side status and ConnectionError once
     * every attempt failed to reach a node.
     */
    async post(path: string, body: Record<string, unknown>): Promise<unknown> {
        let lastError: unknown;

        for (let attempt = 1; attempt <= this.attempts; attempt++) {
            const url = `${this.getCurrentNode()}${path}`;
            let response: Response;
            try {
                response = await fetch(url, {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                        Authorization: this.authorization
                    },
                    body: JSON.stringify(body)
                });
            } catch (error) {
                lastError = error;
                log.warn('IoTDB node unreachable', {
                    url,
                    attempt,
                    error: error instanceof Error ? error.message : String(error)
                });
                this.nodeIndex = (this.nodeIndex + 1) % this.baseUrls.length;
                continue;
            }

            return this.decode(response, url);
        }

        const message = lastError instanceof Error ? lastError.message : String(lastError);
        throw new ConnectionError(
            `Failed to reach IoTDB after ${String(this.attempts)} attempt(s): ${message}`,
            { nodes: this.baseUrls }
        );
    }

    private async decode(response: Response, url: string): Promise<unknown> {
        const text = await response.text();

        let payload: unknown;
        try {
            payload = text.length > 0 ? parse(text, null, parseNumber) : null;
        } catch {
            throw new QueryError(
                `IoTDB returned a non-JSON response (HTTP ${String(response.status)})`,
                { url, status: response.status }
            );
        }

        const status = StatusResponseSchema.safeParse(payload);
        if (status.success && status.data.code !== SUCCESS_STATUS) {
            throw new QueryError(status.data.message ?? `IoTDB error ${String(status.data.code)}`, {
                url,
                status: response.status,
                iotdbCode: status.data.code
            });
        }

        if (!response.ok) {
            throw new QueryError(`IoTDB request failed with HTTP ${String(response.status)}`, {
                url,
                status: response.status
            });
        }

        return payload;
    }
}
