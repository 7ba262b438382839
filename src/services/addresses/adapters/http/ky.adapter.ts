import ky, { HTTPError, TimeoutError, type KyInstance, type Options } from 'ky';
import type { HttpRequestAdapter } from './http.interface';
import { HttpRequestError, TimeoutExceededError } from './http.interface';
import type { QueryParams, QueryValue } from '../../types';
import { logger } from '@/shared/utils/logger';

/**
 * Fetch implementation used by ky
 */
export type FetchFunction = NonNullable<Options['fetch']>;

export interface KyHttpAdapterOptions {
    baseUrl: string;
    timeoutMs: number;
    /** Replaces the global fetch (tests, custom agents) */
    fetch?: FetchFunction | undefined;
}

/**
 * Ky HTTP Adapter
 *
 * One ky instance and one abort controller per adapter, shared by all requests.
 * Requests are never retried.
 */
export class KyHttpAdapter implements HttpRequestAdapter {
    private client: KyInstance;
    private abortController = new AbortController();
    private closed = false;

    constructor(options: KyHttpAdapterOptions) {
        this.client = ky.create({
            prefixUrl: options.baseUrl,
            timeout: options.timeoutMs,
            retry: 0,
            headers: {
                Accept: 'application/json',
            },
            ...(options.fetch ? { fetch: options.fetch } : {}),
            hooks: {
                beforeRequest: [
                    (request) => {
                        logger.debug({
                            event: 'address.api.request',
                            url: request.url,
                        }, 'Sending address API request');
                    },
                ],
            },
        });
    }

    async get(path: string, params: QueryParams): Promise<unknown> {
        if (this.closed) {
            throw new HttpRequestError('HTTP session is closed');
        }

        try {
            return await this.client
                .get(path, {
                    searchParams: compactParams(params),
                    signal: this.abortController.signal,
                })
                .json<unknown>();
        } catch (error) {
            throw toHttpRequestError(error, path);
        }
    }

    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.abortController.abort();

        logger.debug({ event: 'address.api.closed' }, 'Address API session closed');
    }
}

/**
 * Drop undefined values, keep every key unchanged
 */
function compactParams(params: QueryParams): Record<string, QueryValue> {
    const searchParams: Record<string, QueryValue> = {};
    for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
            searchParams[key] = value;
        }
    }
    return searchParams;
}

function toHttpRequestError(error: unknown, path: string): HttpRequestError {
    if (error instanceof TimeoutError) {
        return new TimeoutExceededError(
            `Request timed out: ${error.request.url}`,
            error.request.url,
            { cause: error }
        );
    }

    if (error instanceof HTTPError) {
        return new HttpRequestError(
            `Request failed with status ${error.response.status}`,
            error.request.url,
            error.response.status,
            { cause: error }
        );
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    return new HttpRequestError(`Request to ${path} failed: ${message}`, undefined, undefined, { cause: error });
}
